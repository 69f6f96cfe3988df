import type { ILogger } from './types'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const levelPriorities: Record<LogLevel, number> = {
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value)
}

export interface ConsoleLoggerOptions {
	/** The minimum level of messages to log. Defaults to 'info'. */
	level?: LogLevel
	/** Writes every level through `console.error`. */
	stderr?: boolean
}

/**
 * A logger implementation that outputs to the console.
 * Messages below the configured minimum level are dropped.
 */
export class ConsoleLogger implements ILogger {
	private minLevel: LogLevel
	private stderr: boolean

	constructor(options: ConsoleLoggerOptions = {}) {
		this.minLevel = options.level ?? 'info'
		this.stderr = options.stderr ?? false
	}

	private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
		if (levelPriorities[level] < levelPriorities[this.minLevel]) return

		const write = this.stderr ? console.error : console[level]
		const fullMessage = `[${level.toUpperCase()}] ${message}`
		if (meta && Object.keys(meta).length > 0) {
			write(fullMessage, meta)
		} else {
			write(fullMessage)
		}
	}

	debug(message: string, meta?: Record<string, unknown>): void {
		this.log('debug', message, meta)
	}

	info(message: string, meta?: Record<string, unknown>): void {
		this.log('info', message, meta)
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		this.log('warn', message, meta)
	}

	error(message: string, meta?: Record<string, unknown>): void {
		this.log('error', message, meta)
	}
}

/** A logger implementation that does nothing (no-op). */
export class NullLogger implements ILogger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}
