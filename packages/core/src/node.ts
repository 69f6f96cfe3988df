import type { NodeContext, NodeResult } from './types'

/**
 * A structured, class-based node for logic with a safe, granular lifecycle.
 * Instances are configured once, registered in a flow, and executed by the runtime.
 *
 * @template TPrep The value `prep` hands to `exec`, usually the validated input.
 * @template TOutput The node's output, passed on to its successor.
 */
export abstract class BaseNode<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = Record<string, unknown>,
	TPrep = unknown,
	TOutput = unknown,
> {
	/**
	 * Phase 1: Gathers and validates data for execution. This phase is NOT retried on failure.
	 * @param context The node's execution context.
	 * @returns The data needed for the `exec` phase.
	 */
	abstract prep(context: NodeContext<TContext, TDependencies>): Promise<TPrep>

	/**
	 * Phase 2: Performs the core logic. This is the ONLY phase that is retried.
	 * @param prepResult The data returned from the `prep` phase.
	 */
	abstract exec(prepResult: TPrep, context: NodeContext<TContext, TDependencies>): Promise<NodeResult<TOutput>>

	/**
	 * Phase 3: Processes the result. This phase is NOT retried.
	 * @param execResult The successful result from the `exec` or `fallback` phase.
	 */
	async post(
		execResult: NodeResult<TOutput>,
		_context: NodeContext<TContext, TDependencies>,
	): Promise<NodeResult<TOutput>> {
		return execResult
	}

	/**
	 * An optional safety net that runs if all `exec` retries fail.
	 * @param error The final error from the last `exec` attempt.
	 */
	async fallback(error: Error, _context: NodeContext<TContext, TDependencies>): Promise<NodeResult<TOutput>> {
		throw error
	}
}
