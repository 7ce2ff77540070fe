import path from 'node:path'
import { ImageRef, NO_IMAGE_TOKEN, RawCandidate } from '../../model/candidate'
import { normalizeProfileUrl, parseDataUrl, titleToName } from './helpers'
import { ValidationResult } from './types'

type Fields = Record<string, unknown>

const isFields = (value: unknown): value is Fields =>
    typeof value === 'object' && value !== null && !Array.isArray(value)

const firstString = (fields: Fields, keys: readonly string[]): string | undefined => {
    for (const key of keys) {
        const value = fields[key]
        if (typeof value === 'string' && value.trim().length > 0) {
            return value.trim()
        }
    }
    return undefined
}

const URL_KEYS = ['profile_url', 'profileUrl', 'href', 'url'] as const
const NAME_KEYS = ['name', 'candidate_name', 'candidateName'] as const
const TITLE_KEYS = ['title'] as const
const PHOTO_KEYS = ['photo', 'photo_path', 'photoPath', 'image_file', 'data_url', 'dataUrl'] as const

type PhotoParse = { photo?: ImageRef; undecodable: boolean }

/**
 * Reads a scraped photo field. `no_image`, a missing field or a data URL that
 * does not decode all mean the candidate has no photo.
 */
export function parsePhotoField(value: string | undefined, baseDir?: string): PhotoParse {
    if (!value || value === NO_IMAGE_TOKEN) {
        return { undecodable: false }
    }
    if (value.startsWith('data:')) {
        const photo = parseDataUrl(value)
        return photo ? { photo, undecodable: false } : { undecodable: true }
    }
    const resolved = baseDir && !path.isAbsolute(value) ? path.resolve(baseDir, value) : value
    return { photo: { kind: 'path', path: resolved }, undecodable: false }
}

/**
 * Converts loosely-shaped scraper output into RawCandidates.
 *
 * Entries without a usable profile URL are rejected. A name comes from an
 * explicit name field, else from the result title. Duplicate URLs inside one
 * scrape are merged: the first occurrence keeps its position, later ones only
 * fill in what it lacks.
 *
 * @param baseDir - directory relative photo paths are resolved against
 */
export function validateCandidates(entries: readonly unknown[], baseDir?: string): ValidationResult {
    const result: ValidationResult = { accepted: [], rejected: [], photoless: 0 }
    const byUrl = new Map<string, RawCandidate>()

    entries.forEach((entry, index) => {
        if (!isFields(entry)) {
            result.rejected.push({ index, reason: 'entry is not an object' })
            return
        }

        const href = firstString(entry, URL_KEYS)
        if (!href) {
            result.rejected.push({ index, reason: 'missing profile URL' })
            return
        }
        const profileUrl = normalizeProfileUrl(href)
        if (!profileUrl) {
            result.rejected.push({ index, reason: `invalid profile URL: ${href}` })
            return
        }

        const candidateName = firstString(entry, NAME_KEYS) ?? titleToName(firstString(entry, TITLE_KEYS))
        const { photo, undecodable } = parsePhotoField(firstString(entry, PHOTO_KEYS), baseDir)
        if (undecodable) {
            result.photoless++
        }

        const existing = byUrl.get(profileUrl)
        if (existing) {
            if (!existing.candidateName) existing.candidateName = candidateName
            if (!existing.photo && photo) existing.photo = photo
            return
        }

        const candidate: RawCandidate = { profileUrl, candidateName, photo }
        byUrl.set(profileUrl, candidate)
        result.accepted.push(candidate)
    })

    return result
}
