/**
 * Default number of retry attempts for verifier requests
 */
export const DEFAULT_RETRIES = 3

/**
 * Base delay for exponential backoff (in milliseconds)
 */
export const BASE_RETRY_DELAY_MS = 1000

/**
 * Maximum retry delay cap (in milliseconds)
 */
export const MAX_RETRY_DELAY_MS = 30000

/**
 * Jitter factor for retry delays (30% of exponential delay)
 */
export const RETRY_JITTER_FACTOR = 0.3

/**
 * Default per-request timeout (in milliseconds). Face models are slow on first load.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60000

/**
 * Verification endpoint path of a DeepFace-compatible API
 */
export const VERIFY_PATH = '/verify'

/**
 * Error text the verifier returns when an image holds no detectable face
 */
export const NO_FACE_PATTERN = /face could not be detected|no face/i
