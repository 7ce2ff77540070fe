import { NameComparison, VerdictLabel } from '../model/verdict'
import { classifyNameStatus } from '../services/matchingService/verdictEngine'
import { ScoringService } from '../services/scoringService/scoringService'

export type NameCheck = NameComparison & {
    /** Label the pair would get if the candidate were the top face match */
    label: Exclude<VerdictLabel, typeof VerdictLabel.NoCandidates>
}

/**
 * Name tier of the decision on its own, for checking a pair of names.
 */
export const compareNames = (scoring: ScoringService, sourceName: string, candidateName: string): NameCheck => {
    const comparison = scoring.compareNames(sourceName, candidateName)
    return { ...comparison, label: classifyNameStatus(comparison, scoring.fuzzyNameThreshold) }
}
