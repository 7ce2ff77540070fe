import { InvalidInputError } from '../../../model/errors'
import { DEFAULT_SIGMOID_STEEPNESS, normalizeSimilarity } from '../similarity'

describe('normalizeSimilarity', () => {
    it('should return exactly 0.5 at the threshold', () => {
        expect(normalizeSimilarity(0.4, 0.4, 20)).toBe(0.5)
        expect(normalizeSimilarity(10, 10, 0.1)).toBe(0.5)
        expect(normalizeSimilarity(0.68, 0.68)).toBe(0.5)
    })

    it('should decrease strictly as distance grows', () => {
        const distances = [0, 0.1, 0.3, 0.39, 0.4, 0.41, 0.6, 1.2]
        const scores = distances.map((distance) => normalizeSimilarity(distance, 0.4, DEFAULT_SIGMOID_STEEPNESS))
        for (let i = 1; i < scores.length; i++) {
            expect(scores[i]).toBeLessThan(scores[i - 1])
        }
    })

    it('should stay within (0, 1) and approach the bounds', () => {
        expect(normalizeSimilarity(0, 0.4, 20)).toBeGreaterThan(0.999)
        expect(normalizeSimilarity(0, 0.4, 20)).toBeLessThanOrEqual(1)
        expect(normalizeSimilarity(2, 0.4, 20)).toBeLessThan(0.001)
        expect(normalizeSimilarity(2, 0.4, 20)).toBeGreaterThanOrEqual(0)
    })

    it('should follow the logistic formula', () => {
        expect(normalizeSimilarity(0.2, 0.4, 20)).toBeCloseTo(1 / (1 + Math.exp(-4)), 12)
        expect(normalizeSimilarity(0.5, 0.4, 10)).toBeCloseTo(1 / (1 + Math.exp(1)), 12)
    })

    it('should reject a negative distance', () => {
        expect(() => normalizeSimilarity(-0.01, 0.4)).toThrow(InvalidInputError)
    })

    it('should reject non-finite inputs', () => {
        expect(() => normalizeSimilarity(Number.NaN, 0.4)).toThrow(InvalidInputError)
        expect(() => normalizeSimilarity(0.2, Number.POSITIVE_INFINITY)).toThrow(InvalidInputError)
    })

    it('should reject a steepness that is not positive', () => {
        expect(() => normalizeSimilarity(0.2, 0.4, 0)).toThrow(InvalidInputError)
        expect(() => normalizeSimilarity(0.2, 0.4, -5)).toThrow(InvalidInputError)
    })

    it('should carry the INVALID_INPUT code', () => {
        let thrown: unknown
        try {
            normalizeSimilarity(-1, 0.4)
        } catch (error) {
            thrown = error
        }
        expect(thrown).toMatchObject({ code: 'INVALID_INPUT' })
    })
})
