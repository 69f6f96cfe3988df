import type { ISerializer } from './types'

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * A default serializer using standard JSON.
 *
 * @warning This implementation is lossy: `Map`, `Set`, `Date`, typed arrays and
 * `undefined` do not survive a round trip. Provide a serializer such as one built
 * on `superjson` when the run state holds them.
 */
export class JsonSerializer implements ISerializer {
	serialize(data: Record<string, unknown>): string {
		try {
			return JSON.stringify(data)
		} catch (error) {
			return JSON.stringify({
				_unserializable: true,
				message: error instanceof Error ? error.message : String(error),
			})
		}
	}

	deserialize(text: string): Record<string, unknown> {
		const parsed: unknown = JSON.parse(text)
		if (!isRecord(parsed)) {
			throw new TypeError('Serialized run state must be a JSON object.')
		}
		return parsed
	}
}
