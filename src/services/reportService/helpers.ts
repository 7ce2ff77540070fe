import Handlebars from 'handlebars'
import { format, isValid, parseISO } from 'date-fns'

// ============================================================================
// Handlebars Helpers
// ============================================================================

/**
 * Register Handlebars helpers used by the report template
 */
export const registerHandlebarsHelpers = (): void => {
    // Fixed-point number, 4 digits unless given; N/A for missing values
    Handlebars.registerHelper('formatScore', (value: unknown, digits: unknown) => {
        if (typeof value !== 'number' || Number.isNaN(value)) return 'N/A'
        return value.toFixed(typeof digits === 'number' ? digits : 4)
    })

    Handlebars.registerHelper('yesNo', (value: unknown) => {
        if (value === null || value === undefined) return 'N/A'
        return value ? 'yes' : 'no'
    })

    Handlebars.registerHelper('formatDate', (value: unknown) => {
        if (typeof value !== 'string') return 'N/A'
        const date = parseISO(value)
        return isValid(date) ? format(date, 'yyyy-MM-dd HH:mm:ss') : value
    })
}
