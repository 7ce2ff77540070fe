import { InMemoryLockService } from '../lockService'
import { LogService } from '../logService'

jest.mock('../logService')

describe('InMemoryLockService', () => {
    let locks: InMemoryLockService

    beforeEach(() => {
        locks = new InMemoryLockService(new LogService())
    })

    it('should run sections of the same key one after another', async () => {
        const events: string[] = []
        let releaseFirst: () => void = () => undefined
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve
        })

        const first = locks.withLock('jane-doe', async () => {
            events.push('first:start')
            await firstGate
            events.push('first:end')
        })
        const second = locks.withLock('jane-doe', async () => {
            events.push('second:start')
        })

        await Promise.resolve()
        releaseFirst()
        await Promise.all([first, second])

        expect(events).toEqual(['first:start', 'first:end', 'second:start'])
    })

    it('should not block other keys', async () => {
        const events: string[] = []
        let releaseFirst: () => void = () => undefined
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve
        })

        const first = locks.withLock('jane-doe', async () => {
            await firstGate
            events.push('jane-doe')
        })
        await locks.withLock('john-smith', async () => {
            events.push('john-smith')
        })
        releaseFirst()
        await first

        expect(events).toEqual(['john-smith', 'jane-doe'])
    })

    it('should return the section result', async () => {
        await expect(locks.withLock('k', async () => 42)).resolves.toBe(42)
    })

    it('should release the lock after an error', async () => {
        await expect(
            locks.withLock('k', async () => {
                throw new Error('boom')
            })
        ).rejects.toThrow('boom')

        await expect(locks.withLock('k', async () => 'next')).resolves.toBe('next')
    })

    it('should wait for pending sections', async () => {
        let done = false
        const section = locks.withLock('k', async () => {
            await new Promise((resolve) => setTimeout(resolve, 5))
            done = true
        })

        await locks.waitForAllPendingOperations()

        expect(done).toBe(true)
        await section
    })
})
