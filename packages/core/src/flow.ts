import { randomUUID } from 'node:crypto'
import { BaseNode } from './node'
import type { NodeDefinition, NodeImplementation, WorkflowBlueprint } from './types'

/**
 * A fluent API for declaring a pipeline as named nodes joined by explicit edges.
 *
 * @example
 * const flow = createFlow<{ text: string }>('shout')
 *   .node('read', async ({ context }) => ({ output: await context.get('text') }))
 *   .node('upper', async ({ input }) => ({ output: String(input).toUpperCase() }))
 *   .edge('read', 'upper')
 *
 * await new FlowRuntime({ dependencies: {} }).run(flow.toBlueprint(), { text: 'hi' }, { functionRegistry: flow.getFunctionRegistry() })
 */
export class Flow<TContext extends object = Record<string, unknown>, TDependencies extends object = Record<string, unknown>> {
	private blueprint: WorkflowBlueprint
	private functionRegistry: Map<string, NodeImplementation<TContext, TDependencies>>

	constructor(id: string) {
		this.blueprint = { id, nodes: [], edges: [] }
		this.functionRegistry = new Map()
	}

	/**
	 * Declares a named node.
	 * @param options.inputs A context key to read this node's input from.
	 * @param options.config Retry settings for the node's `exec` phase.
	 */
	node(
		id: string,
		implementation: NodeImplementation<TContext, TDependencies>,
		options?: Omit<NodeDefinition, 'id' | 'uses'>,
	): this {
		if (this.blueprint.nodes.some((n) => n.id === id)) {
			throw new Error(`A node with id '${id}' is already defined in flow '${this.blueprint.id}'.`)
		}
		const maxRetries = options?.config?.maxRetries
		if (maxRetries !== undefined && (!Number.isInteger(maxRetries) || maxRetries < 1)) {
			throw new RangeError(`Node '${id}': maxRetries must be a positive integer, got ${maxRetries}.`)
		}
		const retryDelay = options?.config?.retryDelay
		if (retryDelay !== undefined && (!Number.isFinite(retryDelay) || retryDelay < 0)) {
			throw new RangeError(`Node '${id}': retryDelay must be a non-negative number, got ${retryDelay}.`)
		}

		const usesKey =
			implementation instanceof BaseNode ? `${implementation.constructor.name}_${id}` : `fn_${randomUUID()}`
		this.functionRegistry.set(usesKey, implementation)

		this.blueprint.nodes.push({ id, uses: usesKey, ...options })
		return this
	}

	/** Connects the output of `source` to the input of `target`. */
	edge(source: string, target: string): this {
		this.blueprint.edges.push({ source, target })
		return this
	}

	toBlueprint(): WorkflowBlueprint {
		if (this.blueprint.nodes.length === 0) {
			throw new Error('Cannot build a blueprint with no nodes.')
		}
		return {
			id: this.blueprint.id,
			nodes: this.blueprint.nodes.map((node) => ({ ...node })),
			edges: this.blueprint.edges.map((edge) => ({ ...edge })),
		}
	}

	getFunctionRegistry(): Map<string, NodeImplementation<TContext, TDependencies>> {
		return this.functionRegistry
	}
}

/**
 * Helper function to create a new Flow builder instance.
 */
export function createFlow<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = Record<string, unknown>,
>(id: string): Flow<TContext, TDependencies> {
	return new Flow(id)
}
