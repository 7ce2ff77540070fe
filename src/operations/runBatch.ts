import { OutputDocument } from '../model/verdict'
import { discoverPersonCases } from '../services/batchService/personCases'
import { ServiceRegistry } from '../services/serviceRegistry'
import { loadSession } from '../services/sourceService/session'

/**
 * Matches every reference image in the input directory and writes the output
 * document (and the text report when a report path is configured).
 */
export const runBatch = async (serviceRegistry: ServiceRegistry): Promise<OutputDocument> => {
    const { config, log, batch, reports } = serviceRegistry

    const cases = await discoverPersonCases(config.inputDir)
    if (cases.length === 0) {
        log.warn(`No reference images found in ${config.inputDir}`)
    }

    const session = await loadSession(config.sessionFile)
    const document = await batch.run(cases, session)

    await reports.writeDocument(config.outputPath, document)
    if (config.reportPath) {
        await reports.writeReport(config.reportPath, document)
    }
    return document
}
