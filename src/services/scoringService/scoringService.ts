import { FaceScore } from '../../model/candidate'
import { MatcherConfig } from '../../model/config'
import { NameComparison } from '../../model/verdict'
import { LogService } from '../logService'
import { compareNames, FUZZY_NAME_THRESHOLD } from './nameMatching'
import { DEFAULT_SIGMOID_STEEPNESS, normalizeSimilarity } from './similarity'
import { FaceVerification } from './types'

/**
 * Turns raw collaborator output into comparable scores: face distances into
 * FaceScores, name pairs into NameComparisons.
 */
export class ScoringService {
    readonly steepness: number
    readonly fuzzyNameThreshold: number

    constructor(
        config: Pick<MatcherConfig, 'sigmoidSteepness' | 'fuzzyNameThreshold'>,
        private log: LogService
    ) {
        this.steepness = config.sigmoidSteepness ?? DEFAULT_SIGMOID_STEEPNESS
        this.fuzzyNameThreshold = config.fuzzyNameThreshold ?? FUZZY_NAME_THRESHOLD
    }

    public scoreFace(verification: FaceVerification): FaceScore {
        const similarity = normalizeSimilarity(verification.distance, verification.threshold, this.steepness)
        this.log.debug(
            `distance ${verification.distance} (threshold ${verification.threshold}) -> similarity ${similarity.toFixed(4)}`
        )
        return {
            distance: verification.distance,
            threshold: verification.threshold,
            similarity,
            verified: verification.verified,
            modelName: verification.modelName,
            detectorName: verification.detectorName,
        }
    }

    public compareNames(sourceName: string, candidateName: string): NameComparison {
        return compareNames(sourceName, candidateName)
    }
}
