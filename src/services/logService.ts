import { logger } from '@sailpoint/connector-sdk'

type Logger = typeof logger

/**
 * Log levels in order of priority (lowest to highest)
 * debug < info < warn < error
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value)

type LogConfig = {
    logLevel?: LogLevel
}

/**
 * Top-level operation names, printed in brackets when they are the log origin
 */
const OPERATION_NAMES = new Set(['runBatch', 'matchPerson', 'compareNames'])

/**
 * Extracts the caller service and method name from the stack trace
 * @param skipFrames Number of stack frames to skip (default: 2 to skip this function and the logging method)
 */
export function getCallerInfo(skipFrames: number = 2): string {
    const stack = new Error().stack
    if (!stack) return 'unknown'

    const callerLine = stack.split('\n')[skipFrames + 1]
    if (!callerLine) return 'unknown'

    // "at ClassName.methodName (file:line:col)"
    const classMethodMatch = callerLine.match(/at\s+(?:async\s+)?(\w+)\.(\w+)\s*\(/)
    if (classMethodMatch) {
        const [, className, methodName] = classMethodMatch
        return className !== 'Object' ? `${className}>${methodName}` : methodName
    }

    // "at functionName (file:line:col)"
    const functionMatch = callerLine.match(/at\s+(?:async\s+)?(?:new\s+)?(\w+)\s*\(/)
    if (functionMatch) {
        const functionName = functionMatch[1]
        if (OPERATION_NAMES.has(functionName) || callerLine.includes('/operations/')) {
            return `[${functionName}]`
        }
        return functionName
    }

    const fileMatch = callerLine.match(/[/\\]([^/\\]+)\.(?:ts|js)/)
    return fileMatch ? fileMatch[1] : 'unknown'
}

/**
 * Formats a log message with caller origin and optional data payload.
 */
export function formatMessage(message: string, data?: unknown, origin?: string): string {
    const prefix = origin ? `${origin}: ` : ''

    if (data === undefined || data === null) {
        return `${prefix}${message}`
    }
    if (data instanceof Error) {
        return `${prefix}${message} [${data.name}: ${data.message}]`
    }
    if (typeof data !== 'object') {
        return `${prefix}${message} ${String(data)}`
    }
    try {
        return `${prefix}${message} ${JSON.stringify(data)}`
    } catch {
        return `${prefix}${message} [Unserializable data]`
    }
}

/**
 * Structured logging service wrapping the SDK logger.
 *
 * Caller origin is resolved from the stack trace only at debug level.
 */
export class LogService {
    private logger: Logger
    private configuredLevel: LogLevel

    constructor(config: LogConfig = {}) {
        this.logger = logger
        this.configuredLevel = config.logLevel ?? 'info'
        logger.level = this.configuredLevel
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        const origin = this.configuredLevel === 'debug' ? getCallerInfo(3) : undefined
        this.logger[level](formatMessage(message, data, origin))
    }

    info(message: string, data?: unknown): void {
        this.log('info', message, data)
    }

    debug(message: string, data?: unknown): void {
        this.log('debug', message, data)
    }

    warn(message: string, data?: unknown): void {
        this.log('warn', message, data)
    }

    error(message: string, data?: unknown): void {
        this.log('error', message, data)
    }
}
