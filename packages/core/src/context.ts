import type { IAsyncContext, ISyncContext } from './types'

/**
 * A default, in-memory implementation of ISyncContext.
 */
export class Context<TContext extends object> implements ISyncContext<TContext> {
	public readonly type = 'sync' as const
	private data: Partial<TContext>

	constructor(initialData: Partial<TContext> = {}) {
		this.data = { ...initialData }
	}

	get<K extends keyof TContext & string>(key: K): TContext[K] | undefined {
		return this.data[key]
	}

	set<K extends keyof TContext & string>(key: K, value: TContext[K]): void {
		this.data[key] = value
	}

	has(key: keyof TContext & string): boolean {
		return Object.prototype.hasOwnProperty.call(this.data, key)
	}

	delete(key: keyof TContext & string): boolean {
		if (!this.has(key)) return false
		delete this.data[key]
		return true
	}

	/** Reads a value by a key only known at run time, such as a node's declared `inputs`. */
	lookup(key: string): unknown {
		return new Map<string, unknown>(Object.entries(this.data)).get(key)
	}

	toJSON(): Partial<TContext> {
		return { ...this.data }
	}
}

/**
 * An adapter that provides a consistent, Promise-based view of a synchronous context.
 * This is created by the runtime and is transparent to the node author.
 */
export class AsyncContextView<TContext extends object> implements IAsyncContext<TContext> {
	public readonly type = 'async' as const

	constructor(private syncContext: ISyncContext<TContext>) {}

	get<K extends keyof TContext & string>(key: K): Promise<TContext[K] | undefined> {
		return Promise.resolve(this.syncContext.get(key))
	}

	set<K extends keyof TContext & string>(key: K, value: TContext[K]): Promise<void> {
		this.syncContext.set(key, value)
		return Promise.resolve()
	}

	has(key: keyof TContext & string): Promise<boolean> {
		return Promise.resolve(this.syncContext.has(key))
	}

	delete(key: keyof TContext & string): Promise<boolean> {
		return Promise.resolve(this.syncContext.delete(key))
	}

	toJSON(): Promise<Partial<TContext>> {
		return Promise.resolve(this.syncContext.toJSON())
	}
}
