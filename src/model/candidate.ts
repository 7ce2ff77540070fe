// ============================================================================
// Images
// ============================================================================

/** An image on disk. */
export interface ImagePath {
    kind: 'path'
    path: string
}

/** An image held in memory, e.g. a decoded base64 thumbnail. */
export interface ImageBytes {
    kind: 'bytes'
    data: Buffer
    mimeType: string
}

export type ImageRef = ImagePath | ImageBytes

/** Marker persisted in place of a photo path when a candidate has no retrievable photo. */
export const NO_IMAGE_TOKEN = 'no_image'

// ============================================================================
// Identities and candidates
// ============================================================================

/**
 * The person being searched for. Created once per input image and never
 * changed afterwards.
 */
export interface SourceIdentity {
    readonly fullName: string
    readonly faceReference: ImageRef
}

/**
 * Face comparison result for one candidate photo against the source reference.
 */
export interface FaceScore {
    /** Model distance between the two embeddings, lower is closer */
    readonly distance: number
    /** The model's own decision threshold for `distance` */
    readonly threshold: number
    /** Sigmoid-normalized similarity in [0, 1] used for ranking */
    readonly similarity: number
    /** Verifier's own verdict (distance within threshold), independent of `similarity` */
    readonly verified: boolean
    readonly modelName: string
    readonly detectorName: string
}

/**
 * A discovered profile. `photo` undefined means the candidate is in the
 * no-image state; `faceError` is set when scoring was attempted and the
 * verifier found no usable face.
 */
export interface CandidateRecord {
    readonly profileUrl: string
    candidateName: string
    photo?: ImageRef
    faceScore?: FaceScore
    faceError?: string
}

/**
 * A scored candidate. Narrowed from CandidateRecord by {@link isScored}.
 */
export type ScoredCandidate = CandidateRecord & { faceScore: FaceScore }

export const isScored = (candidate: CandidateRecord): candidate is ScoredCandidate =>
    candidate.faceScore !== undefined

/**
 * Raw tuple handed over by the scraping collaborator, before boundary validation.
 */
export interface RawCandidate {
    profileUrl: string
    candidateName: string
    photo?: ImageRef
}

/**
 * Opaque credential/session artifact for the scraping collaborator.
 * The matcher only passes it through.
 */
export interface ScrapeSession {
    readonly id: string
    readonly payload?: unknown
}

/**
 * A source identity together with its candidate set, processed as one unit.
 */
export interface PersonCase {
    /** Stable key, also used for the persisted state file and the case lock */
    key: string
    identity: SourceIdentity
}
