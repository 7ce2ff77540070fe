import { ImageRef } from '../../model/candidate'
import { FaceVerification } from '../scoringService/types'

/**
 * Face verification collaborator. One call per (reference, candidate) pair.
 *
 * @throws {FaceDetectionFailedError} when either image holds no usable face
 * @throws {ScrapeFailedError} when an image cannot be read
 */
export interface FaceVerifier {
    verify(reference: ImageRef, candidate: ImageRef): Promise<FaceVerification>
}

export type FaceClientConfig = {
    verifyUrl: string
    modelName: string
    detectorBackend: string
    requestTimeout?: number
    maxRetries?: number
}

/**
 * Request body of a DeepFace-compatible `/verify` endpoint. Images are sent
 * as base64 data URLs.
 */
export type VerifyRequest = {
    img1: string
    img2: string
    model_name: string
    detector_backend: string
    enforce_detection: boolean
}
