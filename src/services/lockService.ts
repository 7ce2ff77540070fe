import { LogService } from './logService'

/**
 * Serializes async sections per key. The batch uses one key per person case
 * around every store mutation.
 */
export interface LockService {
    withLock<T>(key: string, fn: () => Promise<T>): Promise<T>
    /** Resolves once every queued section, for every key, has finished */
    waitForAllPendingOperations(): Promise<void>
}

export class InMemoryLockService implements LockService {
    // Tail of the promise chain for each key
    private queues = new Map<string, Promise<void>>()

    constructor(private log: LogService) {}

    async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
        let release: () => void = () => undefined
        const next = new Promise<void>((resolve) => {
            release = resolve
        })

        // Read the tail and register ours synchronously, before awaiting,
        // so a concurrent caller always queues behind us.
        const prev = this.queues.get(key) ?? Promise.resolve()
        this.queues.set(key, next)

        await prev
        this.log.debug(`Lock acquired for key: ${key}`)

        try {
            return await fn()
        } catch (error) {
            this.log.error(`Error in lock-protected section for key "${key}"`, error)
            throw error
        } finally {
            release()
            if (this.queues.get(key) === next) {
                this.queues.delete(key)
            }
        }
    }

    async waitForAllPendingOperations(): Promise<void> {
        const pending = Array.from(this.queues.values())
        if (pending.length > 0) {
            this.log.debug(`Waiting for ${pending.length} pending lock operation(s) to complete`)
            await Promise.all(pending)
        }
    }
}
