import Handlebars from 'handlebars'
import type { TemplateDelegate as HandlebarsTemplateDelegate } from 'handlebars'
import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { MATCH_REPORT_TEMPLATE } from '../../model/messages'
import { CASE_FAILED, OutputDocument, OutputVerdict, VerdictLabel } from '../../model/verdict'
import { LogService } from '../logService'
import { registerHandlebarsHelpers } from './helpers'

const SUMMARY_ORDER: readonly OutputVerdict[] = [
    VerdictLabel.Match,
    VerdictLabel.ProbableMatchFuzzyName,
    VerdictLabel.NoMatch,
    VerdictLabel.NoCandidates,
    CASE_FAILED,
]

export type VerdictCount = { label: OutputVerdict; count: number }

/**
 * Count of entries per verdict, in a fixed order, zero counts included.
 */
export function summarize(document: OutputDocument): VerdictCount[] {
    return SUMMARY_ORDER.map((label) => ({
        label,
        count: document.results.filter((entry) => entry.verdict === label).length,
    }))
}

/**
 * Writes the output document and renders its human-readable report.
 */
export class ReportService {
    private template?: HandlebarsTemplateDelegate

    constructor(private log: LogService) {}

    render(document: OutputDocument): string {
        if (!this.template) {
            registerHandlebarsHelpers()
            this.template = Handlebars.compile(MATCH_REPORT_TEMPLATE, { noEscape: true })
        }
        return this.template({ ...document, summary: summarize(document) })
    }

    async writeDocument(outputPath: string, document: OutputDocument): Promise<void> {
        await mkdir(path.dirname(outputPath), { recursive: true })
        await writeFile(outputPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8')
        this.log.info(`Wrote ${document.results.length} result(s) to ${outputPath}`)
    }

    async writeReport(reportPath: string, document: OutputDocument): Promise<void> {
        await mkdir(path.dirname(reportPath), { recursive: true })
        await writeFile(reportPath, this.render(document), 'utf8')
        this.log.info(`Wrote report to ${reportPath}`)
    }
}
