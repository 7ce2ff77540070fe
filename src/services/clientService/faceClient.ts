import axios, { AxiosInstance, isAxiosError } from 'axios'
import axiosRetry from 'axios-retry'
import { readFile } from 'node:fs/promises'
import { ImageBytes, ImageRef } from '../../model/candidate'
import { errorMessage, FaceDetectionFailedError, ScrapeFailedError } from '../../model/errors'
import { LogService } from '../logService'
import { mimeTypeFor, toDataUrl } from '../sourceService/helpers'
import { FaceVerification } from '../scoringService/types'
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_RETRIES, NO_FACE_PATTERN, VERIFY_PATH } from './constants'
import { createRetriesConfig } from './helpers'
import { FaceClientConfig, FaceVerifier, VerifyRequest } from './types'

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Reads the verifier's answer. Missing model or detector names fall back to
 * what was requested.
 */
export function parseVerifyResponse(body: unknown, request: VerifyRequest): FaceVerification {
    if (!isRecord(body)) {
        throw new Error('Verifier response is not an object')
    }
    const { distance, threshold, verified, model, detector_backend } = body
    if (typeof distance !== 'number' || typeof threshold !== 'number' || typeof verified !== 'boolean') {
        throw new Error(`Verifier response is missing distance, threshold or verified: ${JSON.stringify(body)}`)
    }
    return {
        distance,
        threshold,
        verified,
        modelName: typeof model === 'string' ? model : request.model_name,
        detectorName: typeof detector_backend === 'string' ? detector_backend : request.detector_backend,
    }
}

/**
 * HTTP client for a DeepFace-compatible face verification API.
 * Network errors, 429 and 5xx are retried by axios-retry; a 4xx reporting
 * that no face was found becomes a FaceDetectionFailedError.
 */
export class FaceClient implements FaceVerifier {
    private readonly http: AxiosInstance
    private readonly referenceCache = new Map<string, string>()

    constructor(
        private config: FaceClientConfig,
        private log: LogService,
        http?: AxiosInstance
    ) {
        this.http =
            http ??
            axios.create({
                baseURL: config.verifyUrl,
                timeout: config.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
                headers: { 'Content-Type': 'application/json' },
            })
        axiosRetry(this.http, createRetriesConfig(config.maxRetries ?? DEFAULT_RETRIES))
        this.log.info(`Face verifier ready: ${config.verifyUrl} (${config.modelName}/${config.detectorBackend})`)
    }

    async verify(reference: ImageRef, candidate: ImageRef): Promise<FaceVerification> {
        const request: VerifyRequest = {
            img1: await this.encodeReference(reference),
            img2: await encodeImage(candidate),
            model_name: this.config.modelName,
            detector_backend: this.config.detectorBackend,
            enforce_detection: true,
        }

        try {
            const response = await this.http.post<unknown>(VERIFY_PATH, request)
            return parseVerifyResponse(response.data, request)
        } catch (error) {
            if (isAxiosError(error) && error.response && error.response.status < 500) {
                const detail = JSON.stringify(error.response.data ?? '')
                if (NO_FACE_PATTERN.test(detail)) {
                    throw new FaceDetectionFailedError(`No face detected: ${detail}`)
                }
            }
            throw error
        }
    }

    // The reference image is the same for every candidate of a case
    private async encodeReference(reference: ImageRef): Promise<string> {
        if (reference.kind !== 'path') {
            return encodeImage(reference)
        }
        const cached = this.referenceCache.get(reference.path)
        if (cached) return cached
        const encoded = await encodeImage(reference)
        this.referenceCache.set(reference.path, encoded)
        return encoded
    }
}

/**
 * Image held in memory, read from disk when given by path.
 * @throws {ScrapeFailedError} when an image file cannot be read
 */
export async function loadImage(image: ImageRef): Promise<ImageBytes> {
    if (image.kind === 'bytes') {
        return image
    }
    try {
        const data = await readFile(image.path)
        return { kind: 'bytes', data, mimeType: mimeTypeFor(image.path) }
    } catch (error) {
        throw new ScrapeFailedError(`Cannot read image ${image.path}: ${errorMessage(error)}`)
    }
}

/**
 * Image as a base64 data URL.
 * @throws {ScrapeFailedError} when an image file cannot be read
 */
export async function encodeImage(image: ImageRef): Promise<string> {
    return toDataUrl(await loadImage(image))
}
