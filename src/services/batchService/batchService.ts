import { formatISO } from 'date-fns'
import { v4 as uuidv4 } from 'uuid'
import { CandidateRecord, ImageRef, PersonCase, ScrapeSession } from '../../model/candidate'
import { MatcherConfig } from '../../model/config'
import { CaseFailedError, errorMessage, FaceDetectionFailedError, ScrapeFailedError } from '../../model/errors'
import { OutputDocument, OutputEntry } from '../../model/verdict'
import { batch } from '../../utils/batch'
import { CandidateRepository } from '../candidateService/candidateRepository'
import { CandidateStore } from '../candidateService/candidateStore'
import { FaceVerifier } from '../clientService/types'
import { LockService } from '../lockService'
import { LogService } from '../logService'
import { loadImage } from '../clientService/faceClient'
import { decideVerdict } from '../matchingService/verdictEngine'
import { ScoringService } from '../scoringService/scoringService'
import { SourceService } from '../sourceService/sourceService'
import { toFailedEntry, toOutputEntry } from './helpers'

/** Recorded on a candidate whose photo holds no detectable face */
export const NO_FACE_METRICS = 'no_face_metrics'
/** Recorded on a candidate whose photo could not be read */
export const PHOTO_UNAVAILABLE = 'photo_unavailable'

type BatchConfig = Pick<MatcherConfig, 'caseConcurrency' | 'candidateConcurrency'>

type PendingCandidate = { profileUrl: string; photo: ImageRef }

/**
 * Drives every person case through discovery, face scoring and the verdict
 * engine, and collects one output entry per case.
 *
 * Cases share no state and run in parallel slices of `caseConcurrency`.
 * Store mutations of a case are serialized under the case key.
 */
export class BatchService {
    constructor(
        private config: BatchConfig,
        private log: LogService,
        private locks: LockService,
        private sources: SourceService,
        private verifier: FaceVerifier,
        private scoring: ScoringService,
        private repository?: CandidateRepository
    ) {}

    /**
     * Processes all cases. The result holds exactly one entry per case, in input order.
     */
    async run(cases: readonly PersonCase[], session: ScrapeSession): Promise<OutputDocument> {
        const runId = uuidv4()
        this.log.info(`Run ${runId}: ${cases.length} person case(s)`)

        const results = await batch(
            cases,
            (personCase) => this.processCaseSafely(personCase, session),
            this.config.caseConcurrency,
            (processed, total) => this.log.info(`Processed ${processed}/${total} person case(s)`)
        )
        await this.locks.waitForAllPendingOperations()

        return { run_id: runId, generated_at: formatISO(new Date()), results }
    }

    /**
     * Processes one case; any unexpected error becomes a CASE_FAILED entry.
     */
    async processCaseSafely(personCase: PersonCase, session: ScrapeSession): Promise<OutputEntry> {
        const { fullName } = personCase.identity
        let store: CandidateStore | undefined
        try {
            store = await this.loadStore(personCase)
            return await this.processCase(personCase, session, store)
        } catch (error) {
            this.log.error(`Person case "${fullName}" failed`, error)
            return toFailedEntry(fullName, errorMessage(error), store?.listCandidates())
        }
    }

    /**
     * Processes one case on the `loaded` store, read from the repository when not given.
     * @throws {CaseFailedError} when the reference image cannot be read or a verifier call fails
     */
    async processCase(personCase: PersonCase, session: ScrapeSession, loaded?: CandidateStore): Promise<OutputEntry> {
        const { identity } = personCase
        const store = loaded ?? (await this.loadStore(personCase))

        const discovery = await this.sources.discover(identity, session)
        if (discovery.accepted.length > 0) {
            await this.mutate(personCase, store, () => {
                for (const raw of discovery.accepted) {
                    store.upsert(raw.profileUrl, raw.candidateName, raw.photo)
                }
            })
        }

        const pending = collectPending(store.listCandidates(), store)
        this.log.debug(`"${identity.fullName}": ${store.size} candidate(s), ${pending.length} to score`)
        if (pending.length > 0) {
            const reference = await this.loadReference(personCase)
            await batch(
                pending,
                (candidate) => this.scoreCandidate(personCase, store, reference, candidate),
                this.config.candidateConcurrency
            )
        }

        const verdict = decideVerdict(identity, store.listCandidates(), {
            fuzzyNameThreshold: this.scoring.fuzzyNameThreshold,
            compare: (sourceName, candidateName) => this.scoring.compareNames(sourceName, candidateName),
        })
        this.log.info(`"${identity.fullName}": ${verdict.label}`)

        const entry = toOutputEntry(identity.fullName, verdict, store.listCandidates())
        return discovery.failure ? { ...entry, error: discovery.failure } : entry
    }

    private async loadStore(personCase: PersonCase): Promise<CandidateStore> {
        return this.repository ? this.repository.load(personCase) : new CandidateStore()
    }

    // Read once per case; a failure here marks no candidate
    private async loadReference(personCase: PersonCase): Promise<ImageRef> {
        try {
            return await loadImage(personCase.identity.faceReference)
        } catch (error) {
            throw new CaseFailedError(`Reference image unavailable: ${errorMessage(error)}`)
        }
    }

    /**
     * Scores one candidate photo against the reference. A photo without a
     * face or an unreadable photo only excludes this candidate from ranking.
     * @throws {CaseFailedError} on any other verifier failure
     */
    private async scoreCandidate(
        personCase: PersonCase,
        store: CandidateStore,
        reference: ImageRef,
        candidate: PendingCandidate
    ): Promise<void> {
        const { profileUrl, photo } = candidate
        try {
            const verification = await this.verifier.verify(reference, photo)
            const faceScore = this.scoring.scoreFace(verification)
            await this.mutate(personCase, store, () => store.attachScore(profileUrl, faceScore))
        } catch (error) {
            if (error instanceof FaceDetectionFailedError) {
                this.log.warn(`No face for ${profileUrl}`, error)
                await this.mutate(personCase, store, () => store.markFaceError(profileUrl, NO_FACE_METRICS))
                return
            }
            if (error instanceof ScrapeFailedError) {
                this.log.warn(`Photo unavailable for ${profileUrl}`, error)
                await this.mutate(personCase, store, () => store.markFaceError(profileUrl, PHOTO_UNAVAILABLE))
                return
            }
            throw new CaseFailedError(`Scoring ${profileUrl} failed: ${errorMessage(error)}`)
        }
    }

    private async mutate(personCase: PersonCase, store: CandidateStore, change: () => void): Promise<void> {
        await this.locks.withLock(personCase.key, async () => {
            change()
            await this.repository?.save(personCase, store)
        })
    }
}

/**
 * Candidates with a photo that have not been scored or marked as failed.
 */
function collectPending(candidates: Iterable<Readonly<CandidateRecord>>, store: CandidateStore): PendingCandidate[] {
    const pending: PendingCandidate[] = []
    for (const candidate of candidates) {
        if (candidate.photo && !store.isProcessed(candidate.profileUrl)) {
            pending.push({ profileUrl: candidate.profileUrl, photo: candidate.photo })
        }
    }
    return pending
}
