import { AxiosError, AxiosHeaders } from 'axios'
import { BASE_RETRY_DELAY_MS, MAX_RETRY_DELAY_MS } from '../constants'
import { calculateRetryDelay, createRetriesConfig, shouldRetry } from '../helpers'

const responseError = (status: number, headers: Record<string, string> = {}): AxiosError =>
    new AxiosError('failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
        status,
        statusText: '',
        headers,
        config: { headers: new AxiosHeaders() },
        data: null,
    })

describe('clientService helpers', () => {
    describe('shouldRetry', () => {
        it('should retry rate limiting and server errors', () => {
            expect(shouldRetry(responseError(429))).toBe(true)
            expect(shouldRetry(responseError(503))).toBe(true)
        })

        it('should not retry client errors', () => {
            expect(shouldRetry(responseError(400))).toBe(false)
            expect(shouldRetry(responseError(404))).toBe(false)
        })

        it('should retry timeouts', () => {
            expect(shouldRetry(new AxiosError('timeout', 'ECONNABORTED'))).toBe(true)
        })

        it('should not retry without an error', () => {
            expect(shouldRetry(undefined)).toBe(false)
        })
    })

    describe('calculateRetryDelay', () => {
        it('should honor retry-after on 429', () => {
            expect(calculateRetryDelay(0, responseError(429, { 'retry-after': '3' }))).toBe(3000)
        })

        it('should back off exponentially with jitter', () => {
            const delay = calculateRetryDelay(2)
            expect(delay).toBeGreaterThanOrEqual(BASE_RETRY_DELAY_MS * 4)
            expect(delay).toBeLessThan(BASE_RETRY_DELAY_MS * 4 * 1.3)
        })

        it('should cap the delay', () => {
            expect(calculateRetryDelay(10)).toBe(MAX_RETRY_DELAY_MS)
        })
    })

    describe('createRetriesConfig', () => {
        it('should use the given retry count', () => {
            expect(createRetriesConfig(5).retries).toBe(5)
        })

        it('should default to three retries', () => {
            expect(createRetriesConfig().retries).toBe(3)
        })
    })
})
