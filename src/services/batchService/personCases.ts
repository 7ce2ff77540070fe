import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { PersonCase } from '../../model/candidate'
import { ConfigError, errorMessage } from '../../model/errors'
import { slugify } from '../sourceService/helpers'

export const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.webp'])

/**
 * Person name from a reference image file name: the stem with underscores,
 * hyphens and dots turned into spaces ("Jane_A_Doe.jpg" gives "Jane A Doe").
 */
export function nameFromFileName(fileName: string): string {
    const stem = path.basename(fileName, path.extname(fileName))
    return stem.replace(/[_.-]+/g, ' ').replace(/\s+/g, ' ').trim()
}

/**
 * Builds a person case for a named reference image.
 */
export function toPersonCase(fullName: string, imagePath: string): PersonCase {
    return {
        key: slugify(fullName),
        identity: { fullName, faceReference: { kind: 'path', path: imagePath } },
    }
}

/**
 * One person case per reference image in `inputDir`, sorted by file name.
 * Every image yields a case; a key already taken gets a numeric suffix
 * (`jane-doe`, `jane-doe-2`).
 */
export async function discoverPersonCases(inputDir: string): Promise<PersonCase[]> {
    let fileNames: string[]
    try {
        fileNames = await readdir(inputDir)
    } catch (error) {
        throw new ConfigError(`Cannot read input directory ${inputDir}: ${errorMessage(error)}`)
    }

    const cases: PersonCase[] = []
    const keys = new Set<string>()
    for (const fileName of [...fileNames].sort()) {
        if (!IMAGE_EXTENSIONS.has(path.extname(fileName).toLowerCase())) continue

        const personCase = toPersonCase(nameFromFileName(fileName), path.join(inputDir, fileName))
        const baseKey = personCase.key
        for (let suffix = 2; keys.has(personCase.key); suffix++) {
            personCase.key = `${baseKey}-${suffix}`
        }
        keys.add(personCase.key)
        cases.push(personCase)
    }
    return cases
}
