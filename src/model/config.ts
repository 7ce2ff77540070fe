import { LogLevel } from '../services/logService'

/**
 * Settings for the face verification endpoint.
 */
export interface VerifierSection {
    /** Base URL of a DeepFace-compatible API, e.g. http://localhost:5005 */
    verifyUrl: string
    /** Embedding model name passed to the verifier */
    modelName: string
    /** Face detector backend passed to the verifier */
    detectorBackend: string
    /** Per-request timeout in milliseconds */
    requestTimeout: number
    /** Retries for network errors, 429 and 5xx responses */
    maxRetries: number
}

/**
 * Matching policy constants.
 */
export interface MatchingSection {
    /** Steepness `k` of the distance-to-similarity sigmoid */
    sigmoidSteepness: number
    /** Minimum token-sort score (0-100) for PROBABLE_MATCH_FUZZY_NAME */
    fuzzyNameThreshold: number
}

/**
 * File locations used by a batch run.
 */
export interface PathsSection {
    /** Directory holding one reference image per person */
    inputDir: string
    /** Directory holding scraped candidate dumps, one JSON file per person */
    scrapeDir: string
    /** Directory for per-person state files */
    stateDir: string
    /** Where the consolidated output document is written */
    outputPath: string
    /** Optional text report path */
    reportPath?: string
    /** Optional file with the opaque scraping session artifact */
    sessionFile?: string
}

export interface RuntimeSection {
    logLevel: LogLevel
    /** Number of person cases processed in parallel */
    caseConcurrency: number
    /** Number of candidates of one case scored in parallel */
    candidateConcurrency: number
    /** Maximum number of candidates kept per person case */
    candidateLimit: number
}

export type MatcherConfig = VerifierSection & MatchingSection & PathsSection & RuntimeSection
