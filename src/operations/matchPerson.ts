import { OutputEntry } from '../model/verdict'
import { toPersonCase } from '../services/batchService/personCases'
import { ServiceRegistry } from '../services/serviceRegistry'
import { loadSession } from '../services/sourceService/session'

/**
 * Matches a single person given by name and reference image path.
 */
export const matchPerson = async (
    serviceRegistry: ServiceRegistry,
    fullName: string,
    imagePath: string
): Promise<OutputEntry> => {
    const { config, batch } = serviceRegistry
    const session = await loadSession(config.sessionFile)
    return batch.processCaseSafely(toPersonCase(fullName, imagePath), session)
}
