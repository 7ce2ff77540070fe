import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { ScrapeSession, SourceIdentity } from '../../model/candidate'
import { errorMessage, ScrapeFailedError } from '../../model/errors'
import { slugify } from './helpers'
import { CandidateSource } from './types'

/**
 * Reads candidates that a scraper run dumped to disk, one JSON file per
 * person named after the slug of the full name (`jane-doe.json`).
 *
 * The file holds either an array of entries or an object with a
 * `candidates` array. Relative photo paths are resolved by the validator
 * against the dump directory.
 */
export class FileCandidateSource implements CandidateSource {
    constructor(readonly scrapeDir: string) {}

    fileFor(identity: SourceIdentity): string {
        return path.join(this.scrapeDir, `${slugify(identity.fullName)}.json`)
    }

    async discover(identity: SourceIdentity, _session: ScrapeSession): Promise<unknown[]> {
        const file = this.fileFor(identity)

        let content: string
        try {
            content = await readFile(file, 'utf8')
        } catch (error) {
            throw new ScrapeFailedError(`No scrape results for "${identity.fullName}" at ${file}: ${errorMessage(error)}`)
        }

        let parsed: unknown
        try {
            parsed = JSON.parse(content)
        } catch (error) {
            throw new ScrapeFailedError(`Scrape results at ${file} are not valid JSON: ${errorMessage(error)}`)
        }

        if (Array.isArray(parsed)) {
            return parsed
        }
        if (typeof parsed === 'object' && parsed !== null && 'candidates' in parsed && Array.isArray(parsed.candidates)) {
            return parsed.candidates
        }
        throw new ScrapeFailedError(`Scrape results at ${file} hold no candidate list`)
    }
}
