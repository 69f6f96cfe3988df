/**
 * A single, comprehensive error class for the pipeline engine.
 * Use this for all errors to ensure consistent structure and easy debugging.
 */
export class PipelineError extends Error {
	public readonly nodeId?: string
	public readonly blueprintId?: string
	public readonly executionId?: string
	public readonly isFatal: boolean

	constructor(
		message: string,
		options: {
			cause?: unknown
			nodeId?: string
			blueprintId?: string
			executionId?: string
			isFatal?: boolean
		} = {},
	) {
		super(message, { cause: options.cause })
		this.name = 'PipelineError'

		this.nodeId = options.nodeId
		this.blueprintId = options.blueprintId
		this.executionId = options.executionId
		this.isFatal = options.isFatal ?? false
	}
}

/** Raised when required settings are missing or invalid. Always fatal. */
export class ConfigurationError extends PipelineError {
	constructor(message: string, options: { cause?: unknown } = {}) {
		super(message, { ...options, isFatal: true })
		this.name = 'ConfigurationError'
	}
}

/** Normalizes any thrown value into an `Error`. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
