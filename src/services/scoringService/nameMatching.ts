/**
 * Name comparison for the verdict engine.
 *
 * Two tiers:
 * - exact: the normalized names hold the same tokens, in any order
 * - fuzzy: token sort ratio of the normalized names (0-100), used as a fallback
 */

import { transliterate } from 'transliteration'
import { NameComparison } from '../../model/verdict'
import { sortTokens, tokenSortRatio } from './stringComparison'

/** Minimum fuzzy score for the fallback PROBABLE_MATCH_FUZZY_NAME label */
export const FUZZY_NAME_THRESHOLD = 92

/**
 * Normalize a name for comparison: ASCII transliteration, lowercase,
 * anything other than letters, digits, spaces, apostrophes and hyphens
 * becomes a space, whitespace collapsed and trimmed.
 *
 * @example
 * normalizeName('  José  A. Núñez ') // 'jose a nunez'
 */
export function normalizeName(name: string): string {
    return transliterate(name ?? '')
        .toLowerCase()
        .replace(/[^a-z0-9\s'-]+/g, ' ')
        .replace(/\s+/g, ' ')
        .trim()
}

/**
 * True when both names normalize to the same set of tokens.
 */
export function isExactName(name1: string, name2: string): boolean {
    return sortTokens(normalizeName(name1)) === sortTokens(normalizeName(name2))
}

/**
 * Token sort similarity of the normalized names, 0-100.
 * Two empty names score 100; one empty name scores 0.
 */
export function nameSimilarity(name1: string, name2: string): number {
    const normalized1 = normalizeName(name1)
    const normalized2 = normalizeName(name2)
    if (normalized1.length === 0 || normalized2.length === 0) {
        return normalized1.length === normalized2.length ? 100 : 0
    }
    return tokenSortRatio(normalized1, normalized2)
}

/**
 * Compare a source name with a candidate name.
 */
export function compareNames(sourceName: string, candidateName: string): NameComparison {
    return {
        exact: isExactName(sourceName, candidateName),
        fuzzyScore: nameSimilarity(sourceName, candidateName),
    }
}

/**
 * Fallback acceptance test on the fuzzy score alone.
 */
export function isFuzzyMatch(comparison: NameComparison, threshold: number = FUZZY_NAME_THRESHOLD): boolean {
    return comparison.fuzzyScore >= threshold
}
