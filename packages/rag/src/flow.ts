import { createFlow } from '@sourcewise/core'
import type { CohereRankerOptions } from './nodes/CohereRankerNode'
import { CohereRankerNode } from './nodes/CohereRankerNode'
import type { DocumentSplitterOptions } from './nodes/DocumentSplitterNode'
import { DocumentSplitterNode } from './nodes/DocumentSplitterNode'
import { HtmlToDocumentNode } from './nodes/HtmlToDocumentNode'
import type { LinkContentFetcherOptions } from './nodes/LinkContentFetcherNode'
import { LinkContentFetcherNode } from './nodes/LinkContentFetcherNode'
import type { OpenAIGeneratorOptions } from './nodes/OpenAIGeneratorNode'
import { OpenAIGeneratorNode } from './nodes/OpenAIGeneratorNode'
import { PromptBuilderNode } from './nodes/PromptBuilderNode'
import type { PromptBuilderOptions } from './prompt'
import type { RagContext, RagDependencies } from './types'

export const RAG_FLOW_ID = 'sourced-answer'

export interface RagFlowOptions {
	fetcher?: LinkContentFetcherOptions
	splitter?: DocumentSplitterOptions
	reranker?: CohereRankerOptions
	promptBuilder?: PromptBuilderOptions
	generator?: OpenAIGeneratorOptions
}

/**
 * Declares the six-stage pipeline. The fetcher reads the URL list from the context;
 * every other stage consumes its predecessor's output.
 */
export function createRagFlow(options: RagFlowOptions = {}) {
	return createFlow<RagContext, RagDependencies>(RAG_FLOW_ID)
		.node('fetcher', new LinkContentFetcherNode(options.fetcher), { inputs: 'urls' })
		.node('converter', new HtmlToDocumentNode())
		.node('splitter', new DocumentSplitterNode({ splitBy: 'sentence', splitLength: 10, ...options.splitter }))
		.node('reranker', new CohereRankerNode(options.reranker))
		.node('prompt_builder', new PromptBuilderNode({ requiredVariables: ['query'], ...options.promptBuilder }))
		.node('generator', new OpenAIGeneratorNode(options.generator))
		.edge('fetcher', 'converter')
		.edge('converter', 'splitter')
		.edge('splitter', 'reranker')
		.edge('reranker', 'prompt_builder')
		.edge('prompt_builder', 'generator')
}
