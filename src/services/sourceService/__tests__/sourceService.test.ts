import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { SourceIdentity } from '../../../model/candidate'
import { ConfigError, ScrapeFailedError } from '../../../model/errors'
import { LogService } from '../../logService'
import { FileCandidateSource } from '../fileCandidateSource'
import { loadSession } from '../session'
import { SourceService } from '../sourceService'
import { CandidateSource } from '../types'

jest.mock('../../logService')

const identity: SourceIdentity = {
    fullName: 'Jane Doe',
    faceReference: { kind: 'path', path: '/input/Jane_Doe.jpg' },
}
const session = { id: 'test-session' }

describe('SourceService', () => {
    let log: LogService

    beforeEach(() => {
        log = new LogService()
    })

    const sourceOf = (discover: CandidateSource['discover']): CandidateSource => ({ discover })

    it('should validate what the source returns', async () => {
        const source = sourceOf(async () => [
            { profile_url: 'https://www.linkedin.com/in/jdoe', name: 'Jane Doe' },
            { name: 'No Link' },
        ])
        const service = new SourceService(source, log)

        const result = await service.discover(identity, session)

        expect(result.accepted).toHaveLength(1)
        expect(result.rejected).toEqual([{ index: 1, reason: 'missing profile URL' }])
        expect(log.warn).toHaveBeenCalledWith('Rejected scraped entry #1 for "Jane Doe": missing profile URL')
    })

    it('should pass identity and session to the source', async () => {
        const discover = jest.fn(async () => [])
        const service = new SourceService(sourceOf(discover), log)

        await service.discover(identity, session)

        expect(discover).toHaveBeenCalledWith(identity, session)
    })

    it('should keep only the first candidates up to the limit', async () => {
        const source = sourceOf(async () => [
            { profile_url: 'https://example.com/a' },
            { profile_url: 'https://example.com/b' },
            { profile_url: 'https://example.com/c' },
        ])
        const service = new SourceService(source, log, 2)

        const result = await service.discover(identity, session)

        expect(result.accepted.map((candidate) => candidate.profileUrl)).toEqual([
            'https://example.com/a',
            'https://example.com/b',
        ])
    })

    it('should report a scrape failure instead of throwing', async () => {
        const source = sourceOf(async () => {
            throw new ScrapeFailedError('captcha')
        })
        const service = new SourceService(source, log)

        const result = await service.discover(identity, session)

        expect(result).toEqual({ accepted: [], rejected: [], photoless: 0, failure: 'captcha' })
    })

    it('should rethrow other errors', async () => {
        const source = sourceOf(async () => {
            throw new Error('browser crashed')
        })
        const service = new SourceService(source, log)

        await expect(service.discover(identity, session)).rejects.toThrow('browser crashed')
    })
})

describe('FileCandidateSource', () => {
    let scrapeDir: string

    beforeEach(async () => {
        scrapeDir = await mkdtemp(path.join(os.tmpdir(), 'profile-match-scrape-'))
    })

    afterEach(async () => {
        await rm(scrapeDir, { recursive: true, force: true })
    })

    it('should read an array of entries', async () => {
        await writeFile(path.join(scrapeDir, 'jane-doe.json'), JSON.stringify([{ href: 'https://example.com/a' }]))

        const entries = await new FileCandidateSource(scrapeDir).discover(identity, session)

        expect(entries).toEqual([{ href: 'https://example.com/a' }])
    })

    it('should read a candidates object', async () => {
        await writeFile(path.join(scrapeDir, 'jane-doe.json'), JSON.stringify({ candidates: [{ href: 'https://example.com/a' }] }))

        const entries = await new FileCandidateSource(scrapeDir).discover(identity, session)

        expect(entries).toHaveLength(1)
    })

    it('should fail the scrape when the file is missing', async () => {
        await expect(new FileCandidateSource(scrapeDir).discover(identity, session)).rejects.toThrow(ScrapeFailedError)
    })

    it('should fail the scrape on invalid content', async () => {
        await writeFile(path.join(scrapeDir, 'jane-doe.json'), '{ nope')
        await expect(new FileCandidateSource(scrapeDir).discover(identity, session)).rejects.toThrow(ScrapeFailedError)

        await writeFile(path.join(scrapeDir, 'jane-doe.json'), JSON.stringify({ results: [] }))
        await expect(new FileCandidateSource(scrapeDir).discover(identity, session)).rejects.toThrow(
            'hold no candidate list'
        )
    })
})

describe('loadSession', () => {
    it('should return an anonymous session without a file', async () => {
        const loaded = await loadSession()

        expect(loaded.id).toMatch(/^anonymous-[0-9a-f-]{36}$/)
        expect(loaded.payload).toBeUndefined()
    })

    it('should load the payload of a session file', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'profile-match-session-'))
        const file = path.join(dir, 'storage_state.json')
        await writeFile(file, JSON.stringify({ cookies: [] }))

        await expect(loadSession(file)).resolves.toEqual({ id: 'storage_state.json', payload: { cookies: [] } })
        await rm(dir, { recursive: true, force: true })
    })

    it('should fail on a missing session file', async () => {
        await expect(loadSession('/nonexistent/session.json')).rejects.toThrow(ConfigError)
    })
})
