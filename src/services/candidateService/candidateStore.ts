import { CandidateRecord, FaceScore, ImageRef } from '../../model/candidate'
import { InvalidInputError, UnknownCandidateError } from '../../model/errors'

/**
 * Append-only, de-duplicated candidate set of one person case, keyed by
 * profile URL. Records are never removed; a re-discovered URL updates the
 * existing record in place. Map iteration order is insertion order, which
 * the ranker relies on for tie-breaks.
 */
export class CandidateStore {
    private readonly records = new Map<string, CandidateRecord>()

    /**
     * Rebuilds a store from persisted records, keeping their order and scores.
     */
    static fromRecords(records: Iterable<CandidateRecord>): CandidateStore {
        const store = new CandidateStore()
        for (const record of records) {
            store.records.set(record.profileUrl, { ...record })
        }
        return store
    }

    get size(): number {
        return this.records.size
    }

    /**
     * Inserts a candidate, or refreshes name and photo of a known one.
     * An attached FaceScore survives. An empty name or an absent photo never
     * erases what is already known.
     */
    upsert(profileUrl: string, candidateName: string, photo?: ImageRef): Readonly<CandidateRecord> {
        if (profileUrl.trim().length === 0) {
            throw new InvalidInputError('Profile URL must not be empty')
        }

        const existing = this.records.get(profileUrl)
        if (!existing) {
            const record: CandidateRecord = { profileUrl, candidateName, photo }
            this.records.set(profileUrl, record)
            return record
        }

        if (candidateName.trim().length > 0) {
            existing.candidateName = candidateName
        }
        if (photo) {
            existing.photo = photo
        }
        return existing
    }

    /**
     * Sets the face score of a known candidate. Re-scoring overwrites, last write wins.
     * @throws {UnknownCandidateError} if the URL was never upserted
     */
    attachScore(profileUrl: string, faceScore: FaceScore): Readonly<CandidateRecord> {
        const record = this.require(profileUrl)
        record.faceScore = faceScore
        record.faceError = undefined
        return record
    }

    /**
     * Records that scoring was attempted and failed, so a resumed run skips it.
     * @throws {UnknownCandidateError} if the URL was never upserted
     */
    markFaceError(profileUrl: string, reason: string): Readonly<CandidateRecord> {
        const record = this.require(profileUrl)
        record.faceError = reason
        return record
    }

    get(profileUrl: string): Readonly<CandidateRecord> | undefined {
        return this.records.get(profileUrl)
    }

    has(profileUrl: string): boolean {
        return this.records.has(profileUrl)
    }

    /** True once a score or a face error has been recorded */
    isProcessed(profileUrl: string): boolean {
        const record = this.records.get(profileUrl)
        return record?.faceScore !== undefined || record?.faceError !== undefined
    }

    /**
     * Lazy view over all records in insertion order. Every iteration starts over.
     */
    listCandidates(): Iterable<Readonly<CandidateRecord>> {
        const records = this.records
        return {
            *[Symbol.iterator]() {
                yield* records.values()
            },
        }
    }

    private require(profileUrl: string): CandidateRecord {
        const record = this.records.get(profileUrl)
        if (!record) {
            throw new UnknownCandidateError(profileUrl)
        }
        return record
    }
}
