import type { ISerializer } from '@sourcewise/core'
import SuperJSON from 'superjson'
import { isRecord } from './guards'

// Fetched page bodies are Uint8Array; store them as base64.
SuperJSON.registerCustom<Uint8Array, string>(
	{
		isApplicable: (value): value is Uint8Array => value instanceof Uint8Array,
		serialize: (value) => Buffer.from(value).toString('base64'),
		deserialize: (text) => new Uint8Array(Buffer.from(text, 'base64')),
	},
	'Uint8Array',
)

/** A serializer adapter that keeps the run state's binary payloads. */
export class SuperJsonSerializer implements ISerializer {
	serialize(data: Record<string, unknown>): string {
		return SuperJSON.stringify(data)
	}

	deserialize(text: string): Record<string, unknown> {
		const parsed: unknown = SuperJSON.parse(text)
		if (!isRecord(parsed)) {
			throw new TypeError('Serialized run state must be an object.')
		}
		return parsed
	}
}
