import { LogService } from '../../logService'
import { ScoringService } from '../scoringService'

jest.mock('../../logService')

describe('ScoringService', () => {
    let scoring: ScoringService

    beforeEach(() => {
        scoring = new ScoringService({ sigmoidSteepness: 20, fuzzyNameThreshold: 92 }, new LogService())
    })

    it('should turn a verification into a face score', () => {
        const score = scoring.scoreFace({
            distance: 0.4,
            threshold: 0.4,
            verified: true,
            modelName: 'Facenet512',
            detectorName: 'retinaface',
        })
        expect(score).toEqual({
            distance: 0.4,
            threshold: 0.4,
            similarity: 0.5,
            verified: true,
            modelName: 'Facenet512',
            detectorName: 'retinaface',
        })
    })

    it('should keep the verifier flag independent of similarity', () => {
        const score = scoring.scoreFace({
            distance: 0.45,
            threshold: 0.4,
            verified: true,
            modelName: 'ArcFace',
            detectorName: 'opencv',
        })
        expect(score.similarity).toBeLessThan(0.5)
        expect(score.verified).toBe(true)
    })

    it('should use the configured steepness', () => {
        const gentle = new ScoringService({ sigmoidSteepness: 1, fuzzyNameThreshold: 92 }, new LogService())
        const verification = { distance: 0.2, threshold: 0.4, verified: true, modelName: 'm', detectorName: 'd' }
        expect(gentle.scoreFace(verification).similarity).toBeLessThan(scoring.scoreFace(verification).similarity)
    })

    it('should compare names', () => {
        expect(scoring.compareNames('Jane A. Doe', 'doe jane a.')).toEqual({ exact: true, fuzzyScore: 100 })
        expect(scoring.fuzzyNameThreshold).toBe(92)
    })
})
