import { InvalidInputError } from '../../model/errors'

/** Default sigmoid steepness. Steep enough that scores sit near 0 or 1 away from the threshold */
export const DEFAULT_SIGMOID_STEEPNESS = 20

/**
 * Maps a face distance to a similarity in (0, 1):
 *
 *     similarity = 1 / (1 + exp(k * (distance - threshold)))
 *
 * Strictly decreasing in `distance` and exactly 0.5 at `distance === threshold`.
 *
 * @throws {InvalidInputError} on a negative or non-finite distance, a non-finite
 * threshold, or a steepness that is not a positive number
 */
export function normalizeSimilarity(
    distance: number,
    threshold: number,
    steepness: number = DEFAULT_SIGMOID_STEEPNESS
): number {
    if (!Number.isFinite(distance) || distance < 0) {
        throw new InvalidInputError(`Distance must be a finite number >= 0, got ${distance}`)
    }
    if (!Number.isFinite(threshold)) {
        throw new InvalidInputError(`Threshold must be a finite number, got ${threshold}`)
    }
    if (!Number.isFinite(steepness) || steepness <= 0) {
        throw new InvalidInputError(`Steepness must be a positive number, got ${steepness}`)
    }
    return 1 / (1 + Math.exp(steepness * (distance - threshold)))
}
