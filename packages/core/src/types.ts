import type { PipelineError } from './errors'
import type { BaseNode } from './node'

// =================================================================================
// Blueprint Interfaces (The Declarative Definition)
// =================================================================================

/** The central, serializable representation of a pipeline. */
export interface WorkflowBlueprint {
	id: string
	nodes: NodeDefinition[]
	edges: EdgeDefinition[]
}

/** Defines a single step in the pipeline. */
export interface NodeDefinition {
	id: string
	/** A key that resolves to an implementation in a registry. */
	uses: string
	/** A context key whose value becomes this node's `input` instead of the predecessor's output. */
	inputs?: string
	/** Configuration for retries. */
	config?: NodeConfig
}

/** Defines the connection between two nodes. */
export interface EdgeDefinition {
	source: string
	target: string
}

/** Configuration for a node's resiliency. */
export interface NodeConfig {
	maxRetries?: number
	retryDelay?: number
}

// =================================================================================
// Node Implementation Interfaces
// =================================================================================

/** The required return type for any node implementation. */
export interface NodeResult<TOutput = unknown> {
	output?: TOutput
}

/** The shared services every node receives, merged with the runtime dependencies. */
export interface BaseDependencies {
	logger: ILogger
}

/** The context object passed to every node's execution logic. */
export interface NodeContext<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = Record<string, unknown>,
> {
	nodeId: string
	executionId: string
	/** The async-only interface for reading the run's state. */
	context: IAsyncContext<TContext>
	/** The primary input data for this node, typically from its predecessor. */
	input: unknown
	/** Shared, runtime-level dependencies (e.g., backend clients). */
	dependencies: TDependencies & BaseDependencies
}

/** A simple function-based node implementation. */
export type NodeFunction<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = Record<string, unknown>,
> = (context: NodeContext<TContext, TDependencies>) => Promise<NodeResult>

/** A union of all possible node implementation types. */
export type NodeImplementation<
	TContext extends object = Record<string, unknown>,
	TDependencies extends object = Record<string, unknown>,
> = NodeFunction<TContext, TDependencies> | BaseNode<TContext, TDependencies, unknown, unknown>

// =================================================================================
// Context Interfaces (State Management)
// =================================================================================

/** The synchronous context interface for in-memory state. */
export interface ISyncContext<TContext extends object> {
	readonly type: 'sync'
	get: <K extends keyof TContext & string>(key: K) => TContext[K] | undefined
	set: <K extends keyof TContext & string>(key: K, value: TContext[K]) => void
	has: (key: keyof TContext & string) => boolean
	delete: (key: keyof TContext & string) => boolean
	toJSON: () => Partial<TContext>
}

/** The asynchronous context interface handed to node authors. */
export interface IAsyncContext<TContext extends object> {
	readonly type: 'async'
	get: <K extends keyof TContext & string>(key: K) => Promise<TContext[K] | undefined>
	set: <K extends keyof TContext & string>(key: K, value: TContext[K]) => Promise<void>
	has: (key: keyof TContext & string) => Promise<boolean>
	delete: (key: keyof TContext & string) => Promise<boolean>
	toJSON: () => Promise<Partial<TContext>>
}

// =================================================================================
// Runtime & Extensibility Interfaces
// =================================================================================

/** Configuration options for the FlowRuntime. */
export interface RuntimeOptions<TDependencies extends object = Record<string, unknown>> {
	/** Shared dependencies to be injected into every node. */
	dependencies?: TDependencies
	/** A pluggable logger for consistent output. */
	logger?: ILogger
	/** A pluggable event bus for observability. */
	eventBus?: IEventBus
	/** A pluggable serializer for the final run state. */
	serializer?: ISerializer
}

/** Interface for a pluggable logger. */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** Structured event types for execution tracing. */
export type PipelineEvent =
	| { type: 'workflow:start'; payload: { blueprintId: string; executionId: string } }
	| {
			type: 'workflow:finish'
			payload: { blueprintId: string; executionId: string; status: WorkflowStatus; errors?: WorkflowError[] }
	  }
	| { type: 'node:start'; payload: { nodeId: string; executionId: string; blueprintId: string; input: unknown } }
	| { type: 'node:finish'; payload: { nodeId: string; executionId: string; blueprintId: string; result: NodeResult } }
	| { type: 'node:retry'; payload: { nodeId: string; executionId: string; blueprintId: string; attempt: number } }
	| { type: 'node:fallback'; payload: { nodeId: string; executionId: string; blueprintId: string } }
	| { type: 'node:error'; payload: { nodeId: string; executionId: string; blueprintId: string; error: PipelineError } }

/** Interface for a pluggable event bus. */
export interface IEventBus {
	emit: (event: PipelineEvent) => void | Promise<void>
}

/** Interface for a pluggable serializer. */
export interface ISerializer {
	serialize: (data: Record<string, unknown>) => string
	deserialize: (text: string) => Record<string, unknown>
}

/** A structured error entry returned from a failed run. */
export interface WorkflowError {
	nodeId: string
	message: string
	timestamp: string // ISO 8601 format
	error: PipelineError
}

export type WorkflowStatus = 'completed' | 'failed'

/** The final result of a pipeline run. */
export interface WorkflowResult<TContext extends object = Record<string, unknown>> {
	status: WorkflowStatus
	executionId: string
	/** The final state of the run's context. */
	context: Partial<TContext>
	/** Every executed node's output, keyed by node id. */
	outputs: Record<string, unknown>
	/** The output of the last node that ran successfully. */
	output: unknown
	/** The context and outputs, serialized with the runtime's serializer. */
	serializedContext: string
	errors?: WorkflowError[]
}
