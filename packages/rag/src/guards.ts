import type { Document, FetchedResource, GeneratorOutput, PromptOutput, ScoredDocument } from './types'

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

export function isFetchedResource(value: unknown): value is FetchedResource {
	if (!isRecord(value) || typeof value.url !== 'string') return false
	if (value.status === 'ok') return typeof value.mimeType === 'string' && value.data instanceof Uint8Array
	return value.status === 'failed' && typeof value.error === 'string'
}

export function isDocument(value: unknown): value is Document {
	return (
		isRecord(value) &&
		typeof value.id === 'string' &&
		typeof value.content === 'string' &&
		isRecord(value.meta) &&
		typeof value.meta.url === 'string'
	)
}

export function isScoredDocument(value: unknown): value is ScoredDocument {
	return isDocument(value) && typeof value.score === 'number'
}

export function isPromptOutput(value: unknown): value is PromptOutput {
	return (
		isRecord(value) &&
		typeof value.prompt === 'string' &&
		Array.isArray(value.documents) &&
		value.documents.every(isScoredDocument)
	)
}

export function isGeneratorOutput(value: unknown): value is GeneratorOutput {
	return isRecord(value) && isStringArray(value.replies) && Array.isArray(value.meta)
}

/**
 * Narrows a node's input to an array of `T`, or throws a `TypeError` naming the node.
 */
export function expectArrayOf<T>(input: unknown, guard: (item: unknown) => item is T, nodeName: string, what: string): T[] {
	if (!Array.isArray(input) || !input.every(guard)) {
		throw new TypeError(`${nodeName} expects an array of ${what} as input.`)
	}
	return input
}
