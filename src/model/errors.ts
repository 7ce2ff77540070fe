import { ConnectorError, ConnectorErrorType } from '@sailpoint/connector-sdk'

/**
 * Error codes raised by the matcher. A candidate without a photo is a
 * normal state and has no code.
 */
export type MatcherErrorCode =
    | 'INVALID_INPUT'
    | 'UNKNOWN_CANDIDATE'
    | 'FACE_DETECTION_FAILED'
    | 'SCRAPE_FAILED'
    | 'CASE_FAILED'
    | 'CONFIG'

/**
 * Base class for every error the matcher throws on purpose.
 * Extends the SDK's ConnectorError so callers can keep a single catch type.
 */
export class MatcherError extends ConnectorError {
    constructor(
        message: string,
        public readonly code: MatcherErrorCode
    ) {
        super(message, ConnectorErrorType.Generic)
        this.name = new.target.name
        Object.setPrototypeOf(this, new.target.prototype)
    }
}

/** A distance, threshold or other numeric argument outside its domain. */
export class InvalidInputError extends MatcherError {
    constructor(message: string) {
        super(message, 'INVALID_INPUT')
    }
}

/** A score or face error was attached to a profile URL that was never upserted. */
export class UnknownCandidateError extends MatcherError {
    constructor(public readonly profileUrl: string) {
        super(`Unknown candidate: ${profileUrl}`, 'UNKNOWN_CANDIDATE')
    }
}

/** The face verifier found no usable face in one of the two images. */
export class FaceDetectionFailedError extends MatcherError {
    constructor(message: string) {
        super(message, 'FACE_DETECTION_FAILED')
    }
}

/** Candidate discovery or a photo download failed. */
export class ScrapeFailedError extends MatcherError {
    constructor(message: string) {
        super(message, 'SCRAPE_FAILED')
    }
}

/** A whole person case could not be decided. */
export class CaseFailedError extends MatcherError {
    constructor(message: string) {
        super(message, 'CASE_FAILED')
    }
}

/** Missing or malformed configuration. */
export class ConfigError extends MatcherError {
    constructor(message: string) {
        super(message, 'CONFIG')
    }
}

/**
 * Extracts a printable message from anything that was thrown.
 */
export const errorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message
    return String(error)
}
