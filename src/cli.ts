#!/usr/bin/env node
import { logger } from '@sailpoint/connector-sdk'
import { internalConfig, safeReadConfig } from './data/config'
import { compareNames } from './operations/compareNames'
import { matchPerson } from './operations/matchPerson'
import { runBatch } from './operations/runBatch'
import { LogService } from './services/logService'
import { ScoringService } from './services/scoringService/scoringService'
import { ServiceRegistry } from './services/serviceRegistry'

const USAGE = `Usage:
  profile-match run                          match every image in MATCHER_INPUT_DIR
  profile-match match <full name> <image>    match one person
  profile-match names <name a> <name b>      compare two names`

const main = async (args: string[]): Promise<number> => {
    const [command, ...rest] = args

    if (command === 'names' && rest.length === 2) {
        // Name comparison needs no verifier, so it runs on the internal defaults
        const scoring = new ScoringService(internalConfig, new LogService())
        console.log(JSON.stringify(compareNames(scoring, rest[0], rest[1]), null, 2))
        return 0
    }

    if (command === 'run' && rest.length === 0) {
        const registry = new ServiceRegistry(safeReadConfig())
        ServiceRegistry.setCurrent(registry)
        const document = await runBatch(registry)
        const failed = document.results.filter((entry) => entry.verdict === 'CASE_FAILED').length
        return failed > 0 ? 2 : 0
    }

    if (command === 'match' && rest.length === 2) {
        const registry = new ServiceRegistry(safeReadConfig())
        ServiceRegistry.setCurrent(registry)
        const entry = await matchPerson(registry, rest[0], rest[1])
        console.log(JSON.stringify(entry, null, 2))
        return entry.verdict === 'CASE_FAILED' ? 2 : 0
    }

    console.error(USAGE)
    return 1
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code
    })
    .catch((error: unknown) => {
        logger.error(error instanceof Error ? error.message : String(error))
        process.exitCode = 1
    })
    .finally(() => ServiceRegistry.clear())
