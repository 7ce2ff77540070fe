import { CandidateRecord, isScored, ScoredCandidate } from '../../model/candidate'
import { EmptyReason } from '../../model/verdict'

/**
 * Highest-similarity scored candidate. Ties go to the candidate seen first,
 * so the result depends only on insertion order. Unscored candidates (no
 * photo, failed face detection) are skipped.
 */
export function selectBest(candidates: Iterable<Readonly<CandidateRecord>>): ScoredCandidate | undefined {
    let best: ScoredCandidate | undefined
    for (const candidate of candidates) {
        if (!isScored(candidate)) continue
        // strict comparison keeps the earliest of equal scores
        if (!best || candidate.faceScore.similarity > best.faceScore.similarity) {
            best = candidate
        }
    }
    return best
}

/**
 * All scored candidates by descending similarity, insertion order among equals.
 */
export function rankCandidates(candidates: Iterable<Readonly<CandidateRecord>>): ScoredCandidate[] {
    const scored: ScoredCandidate[] = []
    for (const candidate of candidates) {
        if (isScored(candidate)) scored.push(candidate)
    }
    // Array.prototype.sort is stable
    return scored.sort((a, b) => b.faceScore.similarity - a.faceScore.similarity)
}

/**
 * Why there is nothing to rank: no candidates at all, or none with a score.
 * Returns undefined when at least one candidate is scored.
 */
export function classifyEmptiness(candidates: Iterable<Readonly<CandidateRecord>>): EmptyReason | undefined {
    let seen = false
    for (const candidate of candidates) {
        if (isScored(candidate)) return undefined
        seen = true
    }
    return seen ? EmptyReason.NoneScorable : EmptyReason.NoneFound
}
