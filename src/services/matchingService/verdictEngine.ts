import { CandidateRecord, SourceIdentity } from '../../model/candidate'
import { EmptyReason, NameComparison, Verdict, VerdictLabel } from '../../model/verdict'
import { compareNames, FUZZY_NAME_THRESHOLD } from '../scoringService/nameMatching'
import { classifyEmptiness, selectBest } from './ranker'

export type VerdictOptions = {
    fuzzyNameThreshold?: number
    compare?: (sourceName: string, candidateName: string) => NameComparison
}

/**
 * Name tier of the decision, applied to the top face candidate:
 * exact name → MATCH, fuzzy score at or above the threshold →
 * PROBABLE_MATCH_FUZZY_NAME, anything else → NO_MATCH.
 */
export function classifyNameStatus(
    comparison: NameComparison,
    fuzzyNameThreshold: number = FUZZY_NAME_THRESHOLD
): Exclude<VerdictLabel, typeof VerdictLabel.NoCandidates> {
    if (comparison.exact) return VerdictLabel.Match
    if (comparison.fuzzyScore >= fuzzyNameThreshold) return VerdictLabel.ProbableMatchFuzzyName
    return VerdictLabel.NoMatch
}

/**
 * Decides the verdict of one person case from its final candidate set.
 *
 * Face similarity ranks first; the name only grades the winner. A candidate
 * with the exact name but a lower similarity never wins on its name.
 * Does not modify the candidates.
 */
export function decideVerdict(
    identity: SourceIdentity,
    candidates: Iterable<Readonly<CandidateRecord>>,
    options: VerdictOptions = {}
): Verdict {
    // one pass only: the input may be a one-shot iterable
    const records = Array.from(candidates)
    const winner = selectBest(records)
    if (!winner) {
        return {
            label: VerdictLabel.NoCandidates,
            reason: classifyEmptiness(records) ?? EmptyReason.NoneScorable,
        }
    }

    const compare = options.compare ?? compareNames
    const nameMatch = compare(identity.fullName, winner.candidateName)
    return {
        label: classifyNameStatus(nameMatch, options.fuzzyNameThreshold),
        winner,
        nameMatch,
    }
}
