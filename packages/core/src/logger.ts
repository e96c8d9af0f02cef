/**
 * Console logger with a `[vgmkit]` prefix
 * Threshold comes from VGMKIT_LOG_LEVEL (debug, info, warn, error, silent), default warn
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

function isLogLevel(value: string | undefined): value is LogLevel {
	return value !== undefined && value in LEVEL_ORDER
}

function initialLevel(): LogLevel {
	const fromEnv = typeof process !== 'undefined' ? process.env.VGMKIT_LOG_LEVEL?.toLowerCase() : undefined
	return isLogLevel(fromEnv) ? fromEnv : 'warn'
}

let threshold: LogLevel = initialLevel()

export function setLogLevel(level: LogLevel): void {
	threshold = level
}

export function getLogLevel(): LogLevel {
	return threshold
}

export interface Logger {
	debug(message: string, ...details: unknown[]): void
	info(message: string, ...details: unknown[]): void
	warn(message: string, ...details: unknown[]): void
	error(message: string, ...details: unknown[]): void
}

/**
 * Logger for a named subsystem, printed as `[vgmkit:scope]`
 */
export function createLogger(scope?: string): Logger {
	const prefix = scope ? `[vgmkit:${scope}]` : '[vgmkit]'
	const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]

	return {
		debug(message, ...details) {
			if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
		},
		info(message, ...details) {
			if (enabled('info')) console.log(`${prefix} ${message}`, ...details)
		},
		warn(message, ...details) {
			if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
		},
		error(message, ...details) {
			if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
		},
	}
}

export const logger = createLogger()
