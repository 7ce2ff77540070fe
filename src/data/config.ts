import env from 'dotenv'
import { readFileSync } from 'node:fs'
import { logger } from '@sailpoint/connector-sdk'
import { MatcherConfig } from '../model/config'
import { ConfigError, errorMessage } from '../model/errors'
import { isLogLevel } from '../services/logService'

/**
 * Hard assertion for configuration values
 */
function assert(condition: boolean, message: string): asserts condition
function assert<T>(value: T | null | undefined, message: string): asserts value is T
function assert<T>(valueOrCondition: T | null | undefined | boolean, message: string): asserts valueOrCondition is T {
    if (valueOrCondition === null || valueOrCondition === undefined || valueOrCondition === false) {
        logger.error(`safeReadConfig: ${message}`)
        throw new ConfigError(message)
    }
}

export const internalConfig = {
    sigmoidSteepness: 20,
    fuzzyNameThreshold: 92,
    modelName: 'Facenet512',
    detectorBackend: 'retinaface',
    requestTimeout: 60 * 1000,
    maxRetries: 3,
    caseConcurrency: 2,
    candidateConcurrency: 1,
    candidateLimit: 12,
    inputDir: 'input',
    scrapeDir: 'scraped',
    stateDir: 'state',
    outputPath: 'output/results.json',
}

/**
 * Environment variables recognised by the matcher, by config key.
 */
export const ENV_KEYS = {
    inputDir: 'MATCHER_INPUT_DIR',
    scrapeDir: 'MATCHER_SCRAPE_DIR',
    stateDir: 'MATCHER_STATE_DIR',
    outputPath: 'MATCHER_OUTPUT_PATH',
    reportPath: 'MATCHER_REPORT_PATH',
    sessionFile: 'MATCHER_SESSION_FILE',
    verifyUrl: 'MATCHER_VERIFY_URL',
    modelName: 'MATCHER_MODEL',
    detectorBackend: 'MATCHER_DETECTOR',
    logLevel: 'MATCHER_LOG_LEVEL',
    caseConcurrency: 'MATCHER_CASE_CONCURRENCY',
    candidateConcurrency: 'MATCHER_CANDIDATE_CONCURRENCY',
    candidateLimit: 'MATCHER_CANDIDATE_LIMIT',
    maxRetries: 'MATCHER_MAX_RETRIES',
    sigmoidSteepness: 'MATCHER_SIGMOID_STEEPNESS',
} as const satisfies Partial<Record<keyof MatcherConfig, string>>

const CONFIG_FILE_KEY = 'MATCHER_CONFIG_FILE'

type Environment = Record<string, string | undefined>

type FileConfig = Record<string, unknown>

const readNumber = (environment: Environment, key: string): number | undefined => {
    const raw = environment[key]
    if (raw === undefined || raw.trim() === '') return undefined
    const value = Number(raw)
    assert(Number.isFinite(value), `${key} must be a number, got "${raw}"`)
    return value
}

const fileString = (fileConfig: FileConfig, key: keyof MatcherConfig): string | undefined => {
    const value = fileConfig[key]
    if (value === undefined) return undefined
    assert(typeof value === 'string', `${key} in the config file must be a string`)
    return value
}

const fileNumber = (fileConfig: FileConfig, key: keyof MatcherConfig): number | undefined => {
    const value = fileConfig[key]
    if (value === undefined) return undefined
    assert(typeof value === 'number' && Number.isFinite(value), `${key} in the config file must be a number`)
    return value
}

const readConfigFile = (file: string): FileConfig => {
    let parsed: unknown
    try {
        parsed = JSON.parse(readFileSync(file, 'utf8'))
    } catch (error) {
        throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`)
    }
    assert(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed), `${file} must hold a JSON object`)
    return Object.fromEntries(Object.entries(parsed))
}

/**
 * Resolves the matcher configuration. Precedence, highest first: environment
 * variables (a `.env` file is loaded first), the JSON file named by
 * MATCHER_CONFIG_FILE, internal defaults.
 *
 * @throws {ConfigError} when a required value is missing or malformed
 */
export const safeReadConfig = (environment: Environment = process.env, loadDotEnv: boolean = true): MatcherConfig => {
    if (loadDotEnv) env.config()
    logger.debug('Reading matcher configuration')

    const configFile = environment[CONFIG_FILE_KEY]
    const fileConfig: FileConfig = configFile ? readConfigFile(configFile) : {}

    const text = (key: keyof typeof ENV_KEYS): string | undefined =>
        environment[ENV_KEYS[key]] ?? fileString(fileConfig, key)
    const number = (key: keyof typeof ENV_KEYS): number | undefined =>
        readNumber(environment, ENV_KEYS[key]) ?? fileNumber(fileConfig, key)

    const logLevel = text('logLevel') ?? 'info'
    assert(isLogLevel(logLevel), `${ENV_KEYS.logLevel} must be one of debug, info, warn, error`)

    const config: MatcherConfig = {
        logLevel,
        verifyUrl: text('verifyUrl') ?? '',
        modelName: text('modelName') ?? internalConfig.modelName,
        detectorBackend: text('detectorBackend') ?? internalConfig.detectorBackend,
        requestTimeout: fileNumber(fileConfig, 'requestTimeout') ?? internalConfig.requestTimeout,
        maxRetries: number('maxRetries') ?? internalConfig.maxRetries,
        sigmoidSteepness: number('sigmoidSteepness') ?? internalConfig.sigmoidSteepness,
        fuzzyNameThreshold: fileNumber(fileConfig, 'fuzzyNameThreshold') ?? internalConfig.fuzzyNameThreshold,
        inputDir: text('inputDir') ?? internalConfig.inputDir,
        scrapeDir: text('scrapeDir') ?? internalConfig.scrapeDir,
        stateDir: text('stateDir') ?? internalConfig.stateDir,
        outputPath: text('outputPath') ?? internalConfig.outputPath,
        reportPath: text('reportPath'),
        sessionFile: text('sessionFile'),
        caseConcurrency: number('caseConcurrency') ?? internalConfig.caseConcurrency,
        candidateConcurrency: number('candidateConcurrency') ?? internalConfig.candidateConcurrency,
        candidateLimit: number('candidateLimit') ?? internalConfig.candidateLimit,
    }

    assert(config.verifyUrl.length > 0, `${ENV_KEYS.verifyUrl} is required`)
    assert(/^https?:\/\//.test(config.verifyUrl), `${ENV_KEYS.verifyUrl} must be an http(s) URL`)
    assert(config.sigmoidSteepness > 0, 'sigmoidSteepness must be positive')
    assert(config.fuzzyNameThreshold >= 0 && config.fuzzyNameThreshold <= 100, 'fuzzyNameThreshold must be within 0-100')
    assert(Number.isInteger(config.caseConcurrency) && config.caseConcurrency >= 1, 'caseConcurrency must be a positive integer')
    assert(
        Number.isInteger(config.candidateConcurrency) && config.candidateConcurrency >= 1,
        'candidateConcurrency must be a positive integer'
    )
    assert(Number.isInteger(config.candidateLimit) && config.candidateLimit >= 1, 'candidateLimit must be a positive integer')
    assert(Number.isInteger(config.maxRetries) && config.maxRetries >= 0, 'maxRetries must be a non-negative integer')

    logger.debug('Configuration loaded')
    return config
}
