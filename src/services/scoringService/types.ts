/**
 * What the face verification collaborator reports for one image pair.
 */
export type FaceVerification = {
    distance: number
    threshold: number
    verified: boolean
    modelName: string
    detectorName: string
}
