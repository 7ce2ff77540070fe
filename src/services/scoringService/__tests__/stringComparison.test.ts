import { indelDistance, longestCommonSubsequence, ratio, sortTokens, tokenSortRatio } from '../stringComparison'

describe('stringComparison', () => {
    describe('longestCommonSubsequence', () => {
        it('should find the longest common subsequence length', () => {
            expect(longestCommonSubsequence('abcde', 'ace')).toBe(3)
            expect(longestCommonSubsequence('john smith', 'jon smyth')).toBe(8)
        })

        it('should return 0 when either string is empty', () => {
            expect(longestCommonSubsequence('', 'abc')).toBe(0)
            expect(longestCommonSubsequence('abc', '')).toBe(0)
        })
    })

    describe('indelDistance', () => {
        it('should count insertions and deletions', () => {
            expect(indelDistance('abcde', 'ace')).toBe(2)
            expect(indelDistance('doe', 'doeh')).toBe(1)
        })

        it('should cost a substitution as two edits', () => {
            expect(indelDistance('cat', 'cut')).toBe(2)
        })
    })

    describe('ratio', () => {
        it('should return 100 for identical strings', () => {
            expect(ratio('jane doe', 'jane doe')).toBe(100)
        })

        it('should return 100 for two empty strings', () => {
            expect(ratio('', '')).toBe(100)
        })

        it('should return 0 when only one string is empty', () => {
            expect(ratio('abc', '')).toBe(0)
        })

        it('should normalize by the combined length', () => {
            expect(ratio('abcde', 'ace')).toBe(75)
            expect(ratio('doe jane', 'doeh jane')).toBeCloseTo(1600 / 17, 10)
        })
    })

    describe('sortTokens', () => {
        it('should sort tokens and collapse whitespace', () => {
            expect(sortTokens('  smith   john ')).toBe('john smith')
            expect(sortTokens('')).toBe('')
        })
    })

    describe('tokenSortRatio', () => {
        it('should ignore token order', () => {
            expect(tokenSortRatio('jane a doe', 'doe jane a')).toBe(100)
        })

        it('should score differing names below 100', () => {
            expect(tokenSortRatio('john smith', 'jon smyth')).toBeCloseTo((100 * 16) / 19, 10)
        })
    })
})
