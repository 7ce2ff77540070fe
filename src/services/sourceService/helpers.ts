import { slugify as transliterateSlug } from 'transliteration'
import { ImageBytes } from '../../model/candidate'

const LINKEDIN_HOST = 'linkedin.com'

/**
 * Lowercase ASCII slug of letters and digits joined by single hyphens.
 * Non-Latin scripts are transliterated first.
 *
 * @example
 * slugify('Jane A. Doe') // 'jane-a-doe'
 * slugify('José Núñez') // 'jose-nunez'
 */
export function slugify(value: string): string {
    const slug = transliterateSlug(value ?? '', {
        lowercase: true,
        separator: '-',
        allowedChars: 'a-zA-Z0-9',
    })
    return slug || 'image'
}

const parseUrl = (value: string): URL | undefined => {
    try {
        return new URL(value)
    } catch {
        return undefined
    }
}

/**
 * Unwraps search engine redirects of the form `/url?url=<target>` (or `?q=`).
 * Relative redirect links are resolved against google.com.
 */
export function unwrapRedirect(href: string): string {
    const url = parseUrl(href) ?? parseUrl(`https://www.google.com${href.startsWith('/') ? '' : '/'}${href}`)
    if (url?.pathname === '/url') {
        const target = url.searchParams.get('url') ?? url.searchParams.get('q')
        if (target) return target
    }
    return href
}

/**
 * Canonical form of a profile URL: redirect unwrapped, query and hash
 * dropped, LinkedIn member pages reduced to `https://www.linkedin.com/in/<handle>`.
 * Returns undefined for anything that is not an absolute http(s) URL.
 */
export function normalizeProfileUrl(href: string): string | undefined {
    const url = parseUrl(unwrapRedirect(href.trim()))
    if (!url || !['http:', 'https:'].includes(url.protocol)) {
        return undefined
    }

    const parts = url.pathname.split('/').filter((part) => part.length > 0)
    if (url.hostname.endsWith(LINKEDIN_HOST) && parts.length >= 2 && parts[0] === 'in') {
        return `https://www.${LINKEDIN_HOST}/in/${parts[1]}`
    }
    const path = url.pathname.replace(/\/+$/, '')
    return `${url.protocol}//${url.host}${path}`
}

/**
 * Member handle of a LinkedIn profile URL, or a slug of the URL otherwise.
 */
export function profileHandle(profileUrl: string): string {
    const url = parseUrl(profileUrl)
    const parts = url ? url.pathname.split('/').filter((part) => part.length > 0) : []
    if (parts.length >= 2 && parts[0] === 'in') {
        return parts[1]
    }
    return slugify(profileUrl)
}

/**
 * Person name guessed from a search result title: the text before the first
 * spaced dash ("Jane Doe - Engineer - Acme" gives "Jane Doe").
 */
export function titleToName(title: string | undefined): string {
    const trimmed = (title ?? '').trim()
    if (!trimmed) return ''
    return trimmed.split(/\s[-–—|]\s/, 1)[0].trim()
}

const DATA_URL_PATTERN = /^data:(image\/[^;,]+);base64,(.+)$/is
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/

/**
 * Decodes a base64 `data:image/...` URL. Returns undefined when the URL is
 * not an image data URL or the payload is not valid base64.
 */
export function parseDataUrl(dataUrl: string): ImageBytes | undefined {
    const match = DATA_URL_PATTERN.exec(dataUrl.trim())
    if (!match) return undefined

    const mimeType = match[1].toLowerCase()
    const payload = match[2].replace(/\s+/g, '')
    if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
        return undefined
    }
    const data = Buffer.from(payload, 'base64')
    if (data.length === 0) return undefined

    return { kind: 'bytes', data, mimeType: mimeType === 'image/jpg' ? 'image/jpeg' : mimeType }
}

/**
 * Encodes in-memory image bytes as a data URL.
 */
export function toDataUrl(image: ImageBytes): string {
    return `data:${image.mimeType};base64,${image.data.toString('base64')}`
}

/**
 * MIME type from an image file name, by extension.
 */
export function mimeTypeFor(fileName: string): string {
    const extension = fileName.toLowerCase().split('.').pop()
    switch (extension) {
        case 'jpg':
        case 'jpeg':
            return 'image/jpeg'
        case 'png':
            return 'image/png'
        case 'webp':
            return 'image/webp'
        default:
            return 'application/octet-stream'
    }
}
