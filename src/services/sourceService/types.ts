import { RawCandidate, ScrapeSession, SourceIdentity } from '../../model/candidate'

/**
 * The browser automation side of the pipeline. Implementations return
 * whatever the scraper produced; the SourceService validates it.
 *
 * @throws {ScrapeFailedError} when discovery fails for the whole person
 */
export interface CandidateSource {
    discover(identity: SourceIdentity, session: ScrapeSession): Promise<unknown[]>
}

/**
 * A scraped entry that did not pass boundary validation.
 */
export type RejectedCandidate = {
    index: number
    reason: string
}

export type ValidationResult = {
    accepted: RawCandidate[]
    rejected: RejectedCandidate[]
    /** Accepted entries whose photo could not be decoded and were downgraded to no-image */
    photoless: number
}

export type DiscoveryResult = ValidationResult & {
    /** Set when discovery failed for the whole person */
    failure?: string
}
