import { mkdtemp, readFile, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { emptyBestCandidate, OutputDocument } from '../../../model/verdict'
import { LogService } from '../../logService'
import { ReportService, summarize } from '../reportService'

jest.mock('../../logService')

const document: OutputDocument = {
    run_id: 'run-1',
    generated_at: 'not-a-date',
    results: [
        {
            name: 'John Smith',
            verdict: 'MATCH',
            best_candidate: {
                profile_url: 'https://www.linkedin.com/in/john-smith',
                distance: 0.2,
                threshold: 0.4,
                similarity: 0.982,
                verified: true,
                model: 'Facenet512',
                detector: 'retinaface',
            },
            name_match: { exact: true, fuzzy_score: 100 },
            candidates: [
                {
                    profile_url: 'https://www.linkedin.com/in/john-smith',
                    name: 'John Smith',
                    has_photo: true,
                    similarity: 0.982,
                    verified: true,
                    face_error: null,
                },
                {
                    profile_url: 'https://www.linkedin.com/in/nophoto',
                    name: 'John Smith',
                    has_photo: false,
                    similarity: null,
                    verified: null,
                    face_error: null,
                },
            ],
        },
        {
            name: 'Ghost Person',
            verdict: 'NO_CANDIDATES',
            best_candidate: emptyBestCandidate(),
            name_match: { exact: false, fuzzy_score: 0 },
            candidates: [],
            reason: 'NONE_FOUND',
        },
        {
            name: 'Crash Case',
            verdict: 'CASE_FAILED',
            best_candidate: emptyBestCandidate(),
            name_match: { exact: false, fuzzy_score: 0 },
            candidates: [],
            error: 'verifier down',
        },
    ],
}

describe('summarize', () => {
    it('should count every verdict in a fixed order', () => {
        expect(summarize(document)).toEqual([
            { label: 'MATCH', count: 1 },
            { label: 'PROBABLE_MATCH_FUZZY_NAME', count: 0 },
            { label: 'NO_MATCH', count: 0 },
            { label: 'NO_CANDIDATES', count: 1 },
            { label: 'CASE_FAILED', count: 1 },
        ])
    })
})

describe('ReportService', () => {
    let service: ReportService

    beforeEach(() => {
        service = new ReportService(new LogService())
    })

    it('should render the header', () => {
        const lines = service.render(document).split('\n')

        expect(lines.slice(0, 3)).toEqual(['Profile match report', 'Run: run-1', 'Generated: not-a-date'])
    })

    it('should render the best candidate of a match', () => {
        const lines = service.render(document).split('\n')

        expect(lines).toContain('John Smith: MATCH')
        expect(lines).toContain('  Best candidate: https://www.linkedin.com/in/john-smith')
        expect(lines).toContain('  Similarity: 0.9820 (distance 0.2000, threshold 0.4000, verified: yes)')
        expect(lines).toContain('  Name: exact yes, fuzzy 100.0')
        expect(lines).toContain('  Candidates: 2')
    })

    it('should render reasons and errors', () => {
        const lines = service.render(document).split('\n')

        expect(lines).toContain('Ghost Person: NO_CANDIDATES (NONE_FOUND)')
        expect(lines).toContain('Crash Case: CASE_FAILED - verifier down')
    })

    it('should render the summary', () => {
        const lines = service.render(document).split('\n')

        expect(lines.slice(lines.indexOf('Summary:') + 1, lines.indexOf('Summary:') + 6)).toEqual([
            '  MATCH: 1',
            '  PROBABLE_MATCH_FUZZY_NAME: 0',
            '  NO_MATCH: 0',
            '  NO_CANDIDATES: 1',
            '  CASE_FAILED: 1',
        ])
    })

    it('should write the document as JSON', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'profile-match-report-'))
        const outputPath = path.join(dir, 'nested', 'results.json')

        await service.writeDocument(outputPath, document)

        expect(JSON.parse(await readFile(outputPath, 'utf8'))).toEqual(document)
        await rm(dir, { recursive: true, force: true })
    })
})
