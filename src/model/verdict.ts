import { CandidateRecord, FaceScore, ScoredCandidate } from './candidate'

// ============================================================================
// Verdict labels
// ============================================================================

export const VerdictLabel = {
    NoCandidates: 'NO_CANDIDATES',
    Match: 'MATCH',
    ProbableMatchFuzzyName: 'PROBABLE_MATCH_FUZZY_NAME',
    NoMatch: 'NO_MATCH',
} as const

export type VerdictLabel = (typeof VerdictLabel)[keyof typeof VerdictLabel]

/** Label used in the output document for a person case that failed entirely. */
export const CASE_FAILED = 'CASE_FAILED'

export type OutputVerdict = VerdictLabel | typeof CASE_FAILED

/**
 * Why a case ended as NO_CANDIDATES. Both map to the same external label but
 * stay distinguishable in the output document.
 */
export const EmptyReason = {
    NoneFound: 'NONE_FOUND',
    NoneScorable: 'NONE_SCORABLE',
} as const

export type EmptyReason = (typeof EmptyReason)[keyof typeof EmptyReason]

// ============================================================================
// Name comparison
// ============================================================================

export interface NameComparison {
    exact: boolean
    /** Token-sort similarity, 0-100 */
    fuzzyScore: number
}

// ============================================================================
// Verdict
// ============================================================================

export type Verdict =
    | {
          label: typeof VerdictLabel.NoCandidates
          reason: EmptyReason
      }
    | {
          label: Exclude<VerdictLabel, typeof VerdictLabel.NoCandidates>
          winner: ScoredCandidate
          nameMatch: NameComparison
      }

// ============================================================================
// Output document
// ============================================================================

export interface BestCandidateEntry {
    profile_url: string | null
    distance: number | null
    threshold: number | null
    similarity: number | null
    verified: boolean | null
    model: string | null
    detector: string | null
}

export interface CandidateEntry {
    profile_url: string
    name: string
    has_photo: boolean
    similarity: number | null
    verified: boolean | null
    face_error: string | null
}

export interface OutputEntry {
    name: string
    verdict: OutputVerdict
    best_candidate: BestCandidateEntry
    name_match: { exact: boolean; fuzzy_score: number }
    candidates: CandidateEntry[]
    reason?: EmptyReason
    error?: string
}

export interface OutputDocument {
    run_id: string
    generated_at: string
    results: OutputEntry[]
}

export const emptyBestCandidate = (): BestCandidateEntry => ({
    profile_url: null,
    distance: null,
    threshold: null,
    similarity: null,
    verified: null,
    model: null,
    detector: null,
})

export const toBestCandidateEntry = (profileUrl: string, score: FaceScore): BestCandidateEntry => ({
    profile_url: profileUrl,
    distance: score.distance,
    threshold: score.threshold,
    similarity: score.similarity,
    verified: score.verified,
    model: score.modelName,
    detector: score.detectorName,
})

export const toCandidateEntry = (candidate: CandidateRecord): CandidateEntry => ({
    profile_url: candidate.profileUrl,
    name: candidate.candidateName,
    has_photo: candidate.photo !== undefined,
    similarity: candidate.faceScore?.similarity ?? null,
    verified: candidate.faceScore?.verified ?? null,
    face_error: candidate.faceError ?? null,
})
