// ============================================================================
// Report Template Definitions
// ============================================================================

/**
 * Plain text summary of an output document.
 * Rendered with `noEscape`, so values appear as-is.
 */
export const MATCH_REPORT_TEMPLATE = `Profile match report
Run: {{run_id}}
Generated: {{formatDate generated_at}}

{{#each results}}
{{name}}: {{verdict}}{{#if reason}} ({{reason}}){{/if}}{{#if error}} - {{error}}{{/if}}
{{#if best_candidate.profile_url}}
  Best candidate: {{best_candidate.profile_url}}
  Similarity: {{formatScore best_candidate.similarity}} (distance {{formatScore best_candidate.distance}}, threshold {{formatScore best_candidate.threshold}}, verified: {{yesNo best_candidate.verified}})
  Name: exact {{yesNo name_match.exact}}, fuzzy {{formatScore name_match.fuzzy_score 1}}
{{/if}}
  Candidates: {{candidates.length}}
{{/each}}

Summary:
{{#each summary}}
  {{label}}: {{count}}
{{/each}}
`
