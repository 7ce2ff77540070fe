import { CandidateRecord } from '../../model/candidate'
import {
    CASE_FAILED,
    emptyBestCandidate,
    OutputEntry,
    toBestCandidateEntry,
    toCandidateEntry,
    Verdict,
    VerdictLabel,
} from '../../model/verdict'

/**
 * Output document entry for a decided person case.
 */
export function toOutputEntry(
    name: string,
    verdict: Verdict,
    candidates: Iterable<Readonly<CandidateRecord>>
): OutputEntry {
    const candidateEntries = Array.from(candidates, toCandidateEntry)

    if (verdict.label === VerdictLabel.NoCandidates) {
        return {
            name,
            verdict: verdict.label,
            best_candidate: emptyBestCandidate(),
            name_match: { exact: false, fuzzy_score: 0 },
            candidates: candidateEntries,
            reason: verdict.reason,
        }
    }

    return {
        name,
        verdict: verdict.label,
        best_candidate: toBestCandidateEntry(verdict.winner.profileUrl, verdict.winner.faceScore),
        name_match: { exact: verdict.nameMatch.exact, fuzzy_score: verdict.nameMatch.fuzzyScore },
        candidates: candidateEntries,
    }
}

/**
 * Output document entry for a person case that could not be decided.
 */
export function toFailedEntry(
    name: string,
    error: string,
    candidates: Iterable<Readonly<CandidateRecord>> = []
): OutputEntry {
    return {
        name,
        verdict: CASE_FAILED,
        best_candidate: emptyBestCandidate(),
        name_match: { exact: false, fuzzy_score: 0 },
        candidates: Array.from(candidates, toCandidateEntry),
        error,
    }
}
