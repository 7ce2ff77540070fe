import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CandidateRecord, FaceScore, ImageRef, NO_IMAGE_TOKEN, PersonCase } from '../../model/candidate'
import { errorMessage } from '../../model/errors'
import { LogService } from '../logService'
import { parsePhotoField } from '../sourceService/validation'
import { toDataUrl } from '../sourceService/helpers'
import { CandidateStore } from './candidateStore'

// ============================================================================
// Persisted document
// ============================================================================

type PersistedFace =
    | {
          distance: number
          threshold: number
          sigmoid: number
          verified: boolean
          model: string
          detector: string
      }
    | { error: string }

type PersistedCandidate = {
    profile_url: string
    name: string
    photo_path: string
    face?: PersistedFace
}

type PersistedPerson = {
    query_name: string
    source_images: string[]
    candidates: PersistedCandidate[]
}

const photoToField = (photo: ImageRef | undefined): string => {
    if (!photo) return NO_IMAGE_TOKEN
    return photo.kind === 'path' ? photo.path : toDataUrl(photo)
}

const faceToField = (record: CandidateRecord): PersistedFace | undefined => {
    if (record.faceScore) {
        const score = record.faceScore
        return {
            distance: score.distance,
            threshold: score.threshold,
            sigmoid: score.similarity,
            verified: score.verified,
            model: score.modelName,
            detector: score.detectorName,
        }
    }
    return record.faceError ? { error: record.faceError } : undefined
}

const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value)

const fieldToFace = (face: unknown): Pick<CandidateRecord, 'faceScore' | 'faceError'> => {
    if (typeof face !== 'object' || face === null) return {}
    if ('error' in face && typeof face.error === 'string') {
        return { faceError: face.error }
    }
    if (
        'distance' in face &&
        isNumber(face.distance) &&
        'threshold' in face &&
        isNumber(face.threshold) &&
        'sigmoid' in face &&
        isNumber(face.sigmoid)
    ) {
        const faceScore: FaceScore = {
            distance: face.distance,
            threshold: face.threshold,
            similarity: face.sigmoid,
            verified: 'verified' in face && face.verified === true,
            modelName: 'model' in face && typeof face.model === 'string' ? face.model : 'unknown',
            detectorName: 'detector' in face && typeof face.detector === 'string' ? face.detector : 'unknown',
        }
        return { faceScore }
    }
    return {}
}

const fieldToRecord = (entry: unknown): CandidateRecord | undefined => {
    if (typeof entry !== 'object' || entry === null) return undefined
    if (!('profile_url' in entry) || typeof entry.profile_url !== 'string' || !entry.profile_url) return undefined

    const name = 'name' in entry && typeof entry.name === 'string' ? entry.name : ''
    const photoField = 'photo_path' in entry && typeof entry.photo_path === 'string' ? entry.photo_path : undefined
    const { photo } = parsePhotoField(photoField)
    const face = 'face' in entry ? fieldToFace(entry.face) : {}

    return { profileUrl: entry.profile_url, candidateName: name, photo, ...face }
}

// ============================================================================
// Repository
// ============================================================================

/**
 * Persists each person's candidate store as one JSON document in `stateDir`,
 * written after every change so an interrupted run can resume without
 * re-scoring candidates that already carry a score.
 */
export class CandidateRepository {
    constructor(
        private stateDir: string,
        private log: LogService
    ) {}

    fileFor(personCase: PersonCase): string {
        return path.join(this.stateDir, `${personCase.key}.json`)
    }

    /**
     * Loads a previously saved store. A missing file yields an empty store;
     * an unreadable one is logged and ignored.
     */
    async load(personCase: PersonCase): Promise<CandidateStore> {
        const file = this.fileFor(personCase)

        let content: string
        try {
            content = await readFile(file, 'utf8')
        } catch {
            return new CandidateStore()
        }

        try {
            const parsed: unknown = JSON.parse(content)
            const entries =
                typeof parsed === 'object' && parsed !== null && 'candidates' in parsed && Array.isArray(parsed.candidates)
                    ? parsed.candidates
                    : []
            const records: CandidateRecord[] = []
            for (const entry of entries) {
                const record = fieldToRecord(entry)
                if (record) records.push(record)
            }
            this.log.info(`Resuming "${personCase.identity.fullName}" with ${records.length} saved candidate(s)`)
            return CandidateStore.fromRecords(records)
        } catch (error) {
            this.log.warn(`Ignoring unreadable state file ${file}: ${errorMessage(error)}`)
            return new CandidateStore()
        }
    }

    /**
     * Writes the store to a temporary file and renames it over the previous state.
     */
    async save(personCase: PersonCase, store: CandidateStore): Promise<void> {
        const { identity } = personCase
        const document: PersistedPerson = {
            query_name: identity.fullName,
            source_images: identity.faceReference.kind === 'path' ? [identity.faceReference.path] : [],
            candidates: Array.from(store.listCandidates(), (record) => ({
                profile_url: record.profileUrl,
                name: record.candidateName,
                photo_path: photoToField(record.photo),
                face: faceToField(record),
            })),
        }

        const file = this.fileFor(personCase)
        const temporary = `${file}.tmp`
        await mkdir(this.stateDir, { recursive: true })
        await writeFile(temporary, JSON.stringify(document, null, 2), 'utf8')
        await rename(temporary, file)
    }
}
