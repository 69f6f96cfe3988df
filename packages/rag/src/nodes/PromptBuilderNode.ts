import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode } from '@sourcewise/core'
import { expectArrayOf, isScoredDocument } from '../guards'
import type { PromptBuilderOptions } from '../prompt'
import { PromptBuilder } from '../prompt'
import type { PromptOutput, RagContext, RagDependencies, ScoredDocument } from '../types'

type Context = NodeContext<RagContext, RagDependencies>

interface PromptInput {
	documents: ScoredDocument[]
	query: string | undefined
}

/** Renders the ranked documents and the run's query into the generator prompt. */
export class PromptBuilderNode extends BaseNode<RagContext, RagDependencies, PromptInput, PromptOutput> {
	private builder: PromptBuilder

	constructor(options: PromptBuilderOptions = {}) {
		super()
		this.builder = new PromptBuilder(options)
	}

	async prep({ input, context }: Context): Promise<PromptInput> {
		return {
			documents: expectArrayOf(input, isScoredDocument, 'PromptBuilderNode', 'scored documents'),
			query: await context.get('query'),
		}
	}

	async exec({ documents, query }: PromptInput, { dependencies }: Context): Promise<NodeResult<PromptOutput>> {
		const prompt = this.builder.render({ documents, query })
		dependencies.logger.debug('Rendered prompt', { documents: documents.length, length: prompt.length })
		return { output: { prompt, documents } }
	}
}
