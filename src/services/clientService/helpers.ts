import axiosRetry, { IAxiosRetryConfig } from 'axios-retry'
import { AxiosError } from 'axios'
import { logger } from '@sailpoint/connector-sdk'
import { BASE_RETRY_DELAY_MS, DEFAULT_RETRIES, MAX_RETRY_DELAY_MS, RETRY_JITTER_FACTOR } from './constants'

/**
 * Determine if an error should trigger a retry: network errors, idempotent
 * retryable errors, rate limiting, 5xx and timeouts. A 4xx (such as a
 * verifier rejecting a photo without a face) is final.
 */
export function shouldRetry(error: AxiosError | undefined): boolean {
    if (!error) return false

    if (axiosRetry.isNetworkError(error) || axiosRetry.isRetryableError(error)) {
        return true
    }

    const status = error.response?.status
    if (status === 429) {
        return true
    }
    if (status !== undefined && status >= 500 && status < 600) {
        return true
    }

    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
}

/**
 * Delay before retry number `retryCount`: the server's retry-after on 429,
 * otherwise exponential backoff with jitter, capped.
 */
export function calculateRetryDelay(retryCount: number, error?: AxiosError): number {
    if (error?.response?.status === 429) {
        const retryAfter = error.response.headers?.['retry-after']
        const seconds = typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : NaN
        if (!isNaN(seconds)) {
            return seconds * 1000
        }
    }

    const exponentialDelay = BASE_RETRY_DELAY_MS * Math.pow(2, retryCount)
    const jitter = Math.random() * RETRY_JITTER_FACTOR * exponentialDelay
    return Math.min(exponentialDelay + jitter, MAX_RETRY_DELAY_MS)
}

/**
 * Creates an axios retry configuration
 * @param retries - Maximum number of retry attempts (defaults to DEFAULT_RETRIES constant)
 */
export function createRetriesConfig(retries: number = DEFAULT_RETRIES): IAxiosRetryConfig {
    return {
        retries,
        retryDelay: (retryCount, error) => calculateRetryDelay(retryCount, error),
        retryCondition: (error) => shouldRetry(error),
        onRetry: (retryCount, error, requestConfig) => {
            const url = requestConfig.url || 'unknown'
            const status = error?.response?.status || error?.code || 'unknown'
            logger.debug(`Retrying verifier [${url}] due to error [${status}]. Retry number [${retryCount}/${retries}]`)
        },
    }
}
