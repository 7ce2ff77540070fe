import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { ScrapeSession } from '../../model/candidate'
import { ConfigError, errorMessage } from '../../model/errors'

/**
 * Loads the scraper's saved login state (e.g. a browser storage state file)
 * as an opaque session handle. Without a file the session is anonymous.
 */
export async function loadSession(sessionFile?: string): Promise<ScrapeSession> {
    if (!sessionFile) {
        return { id: `anonymous-${uuidv4()}` }
    }

    try {
        const payload: unknown = JSON.parse(await readFile(sessionFile, 'utf8'))
        return { id: path.basename(sessionFile), payload }
    } catch (error) {
        throw new ConfigError(`Could not load scrape session from ${sessionFile}: ${errorMessage(error)}`)
    }
}
