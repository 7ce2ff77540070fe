import { MatcherConfig } from '../model/config'
import { MatcherError } from '../model/errors'
import { BatchService } from './batchService/batchService'
import { CandidateRepository } from './candidateService/candidateRepository'
import { FaceClient } from './clientService/faceClient'
import { FaceVerifier } from './clientService/types'
import { InMemoryLockService, LockService } from './lockService'
import { LogService } from './logService'
import { ReportService } from './reportService/reportService'
import { ScoringService } from './scoringService/scoringService'
import { FileCandidateSource } from './sourceService/fileCandidateSource'
import { SourceService } from './sourceService/sourceService'
import { CandidateSource } from './sourceService/types'

/**
 * Pre-built collaborators that replace the defaults, e.g. in tests or when
 * a live scraper is plugged in instead of the file dumps.
 */
export type ServiceOverrides = {
    logService?: LogService
    lockService?: LockService
    candidateSource?: CandidateSource
    faceVerifier?: FaceVerifier
    /** `null` disables persistence */
    candidateRepository?: CandidateRepository | null
}

/**
 * Dependency injection container for a matcher run.
 *
 * Instantiates and wires all services in dependency order. A static
 * reference tracks the registry of the active operation.
 */
export class ServiceRegistry {
    private static current?: ServiceRegistry
    public log: LogService
    public locks: LockService
    public sources: SourceService
    public verifier: FaceVerifier
    public scoring: ScoringService
    public repository?: CandidateRepository
    public batch: BatchService
    public reports: ReportService

    constructor(
        public config: MatcherConfig,
        overrides: ServiceOverrides = {}
    ) {
        this.log = overrides.logService ?? new LogService({ logLevel: config.logLevel })
        this.locks = overrides.lockService ?? new InMemoryLockService(this.log)

        const candidateSource = overrides.candidateSource ?? new FileCandidateSource(config.scrapeDir)
        this.sources = new SourceService(candidateSource, this.log, config.candidateLimit, config.scrapeDir)
        this.verifier = overrides.faceVerifier ?? new FaceClient(config, this.log)
        this.scoring = new ScoringService(config, this.log)
        this.repository =
            overrides.candidateRepository === null
                ? undefined
                : (overrides.candidateRepository ?? new CandidateRepository(config.stateDir, this.log))
        this.reports = new ReportService(this.log)

        this.batch = new BatchService(
            config,
            this.log,
            this.locks,
            this.sources,
            this.verifier,
            this.scoring,
            this.repository
        )
    }

    /**
     * Sets the active registry for the current operation.
     */
    static setCurrent(reg: ServiceRegistry) {
        this.current = reg
    }

    /**
     * @throws {MatcherError} If no registry has been set via {@link setCurrent}
     */
    static getCurrent(): ServiceRegistry {
        if (!this.current) {
            throw new MatcherError('ServiceRegistry not found', 'CONFIG')
        }
        return this.current
    }

    static clear() {
        this.current = undefined
    }
}
