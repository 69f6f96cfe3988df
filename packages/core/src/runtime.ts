import { randomUUID } from 'node:crypto'
import { setTimeout as sleep } from 'node:timers/promises'
import { analyzeBlueprint } from './analysis'
import { AsyncContextView, Context } from './context'
import { PipelineError, toError } from './errors'
import { lintBlueprint } from './linter'
import { NullLogger } from './logger'
import { BaseNode } from './node'
import { JsonSerializer } from './serializer'
import type {
	IEventBus,
	ILogger,
	ISerializer,
	NodeContext,
	NodeDefinition,
	NodeImplementation,
	NodeResult,
	RuntimeOptions,
	WorkflowBlueprint,
	WorkflowError,
	WorkflowResult,
} from './types'

export interface RunOptions<TContext extends object, TDependencies extends object> {
	/** The implementations the blueprint's `uses` keys resolve to, usually `flow.getFunctionRegistry()`. */
	functionRegistry?: ReadonlyMap<string, NodeImplementation<TContext, TDependencies>>
}

interface ExecutionScope {
	blueprintId: string
	executionId: string
}

/**
 * Executes linear pipeline blueprints. Each node runs to completion before the
 * next one starts, and a node's output is the sole input of its successor.
 */
export class FlowRuntime<TContext extends object = Record<string, unknown>, TDependencies extends object = Record<string, unknown>> {
	public readonly logger: ILogger
	public readonly eventBus: IEventBus
	public readonly serializer: ISerializer
	public readonly dependencies: TDependencies

	constructor(options: RuntimeOptions<TDependencies> & { dependencies: TDependencies }) {
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus ?? { emit: () => {} }
		this.serializer = options.serializer ?? new JsonSerializer()
		this.dependencies = options.dependencies
	}

	/**
	 * Runs a blueprint once.
	 *
	 * An invalid blueprint is rejected before any node runs. A node failure does not
	 * reject the promise: it ends the run with status `failed` and an error entry.
	 */
	async run(
		blueprint: WorkflowBlueprint,
		initialState: Partial<TContext> = {},
		options: RunOptions<TContext, TDependencies> = {},
	): Promise<WorkflowResult<TContext>> {
		const executionId = randomUUID()
		const scope: ExecutionScope = { blueprintId: blueprint.id, executionId }
		const registry = options.functionRegistry ?? new Map<string, NodeImplementation<TContext, TDependencies>>()

		const lint = lintBlueprint(blueprint, registry)
		if (!lint.isValid) {
			throw new PipelineError(
				`Blueprint '${blueprint.id}' is not a runnable pipeline: ${lint.issues.map((i) => i.message).join(' ')}`,
				{ ...scope, isFatal: true },
			)
		}

		const { executionOrder } = analyzeBlueprint(blueprint)
		const state = new Context<TContext>(initialState)
		const context = new AsyncContextView(state)
		const outputs: Record<string, unknown> = {}
		const errors: WorkflowError[] = []
		let previousOutput: unknown

		await this.eventBus.emit({ type: 'workflow:start', payload: scope })
		this.logger.info(`Starting pipeline '${blueprint.id}'`, { executionId, nodes: executionOrder })

		for (const nodeId of executionOrder) {
			const nodeDef = blueprint.nodes.find((n) => n.id === nodeId)
			const implementation = nodeDef ? registry.get(nodeDef.uses) : undefined
			if (!nodeDef || !implementation) {
				throw new PipelineError(`Node '${nodeId}' has no implementation.`, { ...scope, nodeId, isFatal: true })
			}

			const input = nodeDef.inputs !== undefined ? state.lookup(nodeDef.inputs) : previousOutput
			const nodeContext: NodeContext<TContext, TDependencies> = {
				nodeId,
				executionId,
				context,
				input,
				dependencies: { ...this.dependencies, logger: this.logger },
			}

			await this.eventBus.emit({ type: 'node:start', payload: { ...scope, nodeId, input } })
			this.logger.debug(`Node '${nodeId}' started`, { executionId })

			try {
				const result = await this.executeNode(nodeDef, implementation, nodeContext, scope)
				outputs[nodeId] = result.output
				previousOutput = result.output
				await this.eventBus.emit({ type: 'node:finish', payload: { ...scope, nodeId, result } })
				this.logger.debug(`Node '${nodeId}' finished`, { executionId })
			} catch (e) {
				const cause = toError(e)
				const error = new PipelineError(`Node '${nodeId}' failed: ${cause.message}`, {
					...scope,
					cause,
					nodeId,
					isFatal: cause instanceof PipelineError && cause.isFatal,
				})
				errors.push({ nodeId, message: error.message, timestamp: new Date().toISOString(), error })
				await this.eventBus.emit({ type: 'node:error', payload: { ...scope, nodeId, error } })
				this.logger.error(`Node '${nodeId}' failed`, { executionId, error: cause.message })
				break
			}
		}

		const status = errors.length > 0 ? 'failed' : 'completed'
		await this.eventBus.emit({
			type: 'workflow:finish',
			payload: { ...scope, status, errors: errors.length > 0 ? errors : undefined },
		})
		this.logger.info(`Pipeline '${blueprint.id}' ${status}`, { executionId })

		const finalContext = state.toJSON()
		return {
			status,
			executionId,
			context: finalContext,
			outputs,
			output: status === 'completed' ? previousOutput : undefined,
			serializedContext: this.serializer.serialize({ context: finalContext, outputs }),
			errors: errors.length > 0 ? errors : undefined,
		}
	}

	private async executeNode(
		nodeDef: NodeDefinition,
		implementation: NodeImplementation<TContext, TDependencies>,
		context: NodeContext<TContext, TDependencies>,
		scope: ExecutionScope,
	): Promise<NodeResult> {
		if (!(implementation instanceof BaseNode)) {
			const fn = implementation
			return this.withRetries(() => fn(context), nodeDef, scope)
		}

		const node = implementation
		const prepResult = await node.prep(context)
		let execResult: NodeResult
		try {
			execResult = await this.withRetries(() => node.exec(prepResult, context), nodeDef, scope)
		} catch (e) {
			if (e instanceof PipelineError && e.isFatal) throw e
			this.logger.warn(`Node '${nodeDef.id}' exhausted its attempts, running fallback`, { nodeId: nodeDef.id })
			await this.eventBus.emit({ type: 'node:fallback', payload: { ...scope, nodeId: nodeDef.id } })
			execResult = await node.fallback(toError(e), context)
		}
		return node.post(execResult, context)
	}

	private async withRetries<T>(executor: () => Promise<T>, nodeDef: NodeDefinition, scope: ExecutionScope): Promise<T> {
		const maxRetries = Math.max(1, nodeDef.config?.maxRetries ?? 1)
		const retryDelay = nodeDef.config?.retryDelay ?? 0
		let lastError: unknown

		for (let attempt = 1; attempt <= maxRetries; attempt++) {
			try {
				const result = await executor()
				if (attempt > 1) {
					this.logger.info('Node execution succeeded after retry', { nodeId: nodeDef.id, attempt })
				}
				return result
			} catch (error) {
				lastError = error
				if (error instanceof PipelineError && error.isFatal) break
				if (attempt < maxRetries) {
					this.logger.warn('Node execution failed, retrying', {
						nodeId: nodeDef.id,
						attempt,
						maxRetries,
						error: toError(error).message,
					})
					await this.eventBus.emit({ type: 'node:retry', payload: { ...scope, nodeId: nodeDef.id, attempt } })
					if (retryDelay > 0) await sleep(retryDelay)
				}
			}
		}
		throw lastError
	}
}
