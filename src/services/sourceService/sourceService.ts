import { ScrapeSession, SourceIdentity } from '../../model/candidate'
import { errorMessage, ScrapeFailedError } from '../../model/errors'
import { LogService } from '../logService'
import { CandidateSource, DiscoveryResult } from './types'
import { validateCandidates } from './validation'

/**
 * Boundary between the scraping collaborator and the candidate store.
 * Everything the scraper returns passes through validation here.
 */
export class SourceService {
    constructor(
        private source: CandidateSource,
        private log: LogService,
        private candidateLimit: number = Number.POSITIVE_INFINITY,
        private baseDir?: string
    ) {}

    /**
     * Discovers and validates the candidates of one person. A scrape failure
     * for the whole person is reported in `failure`, not thrown.
     */
    async discover(identity: SourceIdentity, session: ScrapeSession): Promise<DiscoveryResult> {
        let entries: unknown[]
        try {
            entries = await this.source.discover(identity, session)
        } catch (error) {
            if (error instanceof ScrapeFailedError) {
                this.log.warn(`Discovery failed for "${identity.fullName}"`, error)
                return { accepted: [], rejected: [], photoless: 0, failure: errorMessage(error) }
            }
            throw error
        }

        const result = validateCandidates(entries, this.baseDir)
        for (const rejected of result.rejected) {
            this.log.warn(`Rejected scraped entry #${rejected.index} for "${identity.fullName}": ${rejected.reason}`)
        }
        if (result.photoless > 0) {
            this.log.warn(`${result.photoless} scraped photo(s) for "${identity.fullName}" could not be decoded`)
        }

        if (result.accepted.length > this.candidateLimit) {
            this.log.info(
                `Keeping the first ${this.candidateLimit} of ${result.accepted.length} candidates for "${identity.fullName}"`
            )
            result.accepted = result.accepted.slice(0, this.candidateLimit)
        }

        this.log.debug(`Discovered ${result.accepted.length} candidate(s) for "${identity.fullName}"`)
        return result
    }
}
