/**
 * Edit-distance based string comparison used by the name matcher.
 * Scores follow the 0-100 convention of the fuzzy matching family
 * (ratio, token sort ratio).
 */

/**
 * Length of the longest common subsequence of two strings.
 * Two-row dynamic programming, O(|a| * |b|) time and O(|b|) memory.
 */
export function longestCommonSubsequence(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0

    let previous = new Array<number>(b.length + 1).fill(0)
    let current = new Array<number>(b.length + 1).fill(0)

    for (let i = 1; i <= a.length; i++) {
        for (let j = 1; j <= b.length; j++) {
            if (a[i - 1] === b[j - 1]) {
                current[j] = previous[j - 1] + 1
            } else {
                current[j] = Math.max(previous[j], current[j - 1])
            }
        }
        ;[previous, current] = [current, previous]
        current.fill(0)
    }

    return previous[b.length]
}

/**
 * Indel distance: the minimum number of insertions and deletions turning
 * `a` into `b` (substitutions cost 2).
 */
export function indelDistance(a: string, b: string): number {
    return a.length + b.length - 2 * longestCommonSubsequence(a, b)
}

/**
 * Normalized Indel similarity scaled to 0-100.
 * Two empty strings are identical (100).
 */
export function ratio(a: string, b: string): number {
    const total = a.length + b.length
    if (total === 0) return 100
    return 100 * (1 - indelDistance(a, b) / total)
}

/**
 * Splits on whitespace, sorts the tokens and joins them with single spaces,
 * so word order stops mattering.
 */
export function sortTokens(value: string): string {
    return value
        .split(/\s+/)
        .filter((token) => token.length > 0)
        .sort()
        .join(' ')
}

/**
 * {@link ratio} of the token-sorted strings. "jane a doe" and "doe jane a" score 100.
 */
export function tokenSortRatio(a: string, b: string): number {
    return ratio(sortTokens(a), sortTokens(b))
}
