import type { Flow, IEventBus, ILogger, ISerializer, WorkflowResult } from '@sourcewise/core'
import { FlowRuntime, PipelineError } from '@sourcewise/core'
import type { RagFlowOptions } from './flow'
import { createRagFlow } from './flow'
import { isGeneratorOutput, isScoredDocument } from './guards'
import type { Answer, RagContext, RagDependencies, ScoredDocument } from './types'
import { citedSources } from './utils/citations'

export const DEFAULT_URLS = [
	'https://haystack.deepset.ai/blog/extracting-metadata-filter',
	'https://haystack.deepset.ai/blog/query-expansion',
	'https://haystack.deepset.ai/blog/query-decomposition',
	'https://haystack.deepset.ai/cookbook/metadata_enrichment',
]

export const DEFAULT_QUERY = 'Which methods can I use to transform query for better retrieval?'

export interface RagPipelineOptions extends RagFlowOptions {
	dependencies: RagDependencies
	logger?: ILogger
	eventBus?: IEventBus
	serializer?: ISerializer
}

export interface RagExecution {
	answer: Answer
	result: WorkflowResult<RagContext>
}

/**
 * Answers a query from a list of web pages and reports which of them the answer cites.
 *
 * @example
 * const pipeline = new RagPipeline({ dependencies: { fetch, reranker, chat } })
 * const { text, sources } = await pipeline.run(DEFAULT_URLS, DEFAULT_QUERY)
 */
export class RagPipeline {
	private runtime: FlowRuntime<RagContext, RagDependencies>
	private flow: Flow<RagContext, RagDependencies>

	constructor(options: RagPipelineOptions) {
		const { dependencies, logger, eventBus, serializer, ...flowOptions } = options
		this.flow = createRagFlow(flowOptions)
		this.runtime = new FlowRuntime<RagContext, RagDependencies>({ dependencies, logger, eventBus, serializer })
	}

	async run(urls: string[], query: string): Promise<Answer> {
		const { answer } = await this.execute(urls, query)
		return answer
	}

	/** Like `run`, but also returns the engine's result, including the serialized run state. */
	async execute(urls: string[], query: string): Promise<RagExecution> {
		const result = await this.runtime.run(
			this.flow.toBlueprint(),
			{ urls: [...urls], query },
			{ functionRegistry: this.flow.getFunctionRegistry() },
		)

		if (result.status === 'failed') {
			const failure = result.errors?.[0]
			throw new PipelineError(failure?.message ?? 'The pipeline failed.', {
				cause: failure?.error,
				nodeId: failure?.nodeId,
				blueprintId: this.flow.toBlueprint().id,
				executionId: result.executionId,
				isFatal: failure?.error.isFatal,
			})
		}

		const generated = result.outputs.generator
		if (!isGeneratorOutput(generated)) {
			throw new PipelineError('The pipeline finished without generator output.', { executionId: result.executionId })
		}

		const documents = rankedDocuments(result.outputs.reranker)
		const text = generated.replies[0] ?? ''
		return {
			answer: {
				text,
				sources: citedSources(text, documents.map((document) => document.meta.url)),
				replies: generated.replies,
				meta: generated.meta,
				documents,
			},
			result,
		}
	}
}

function rankedDocuments(value: unknown): ScoredDocument[] {
	return Array.isArray(value) ? value.filter(isScoredDocument) : []
}
