import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode, PipelineError, toError } from '@sourcewise/core'
import { isPromptOutput } from '../guards'
import type { GeneratorOutput, PromptOutput, RagContext, RagDependencies } from '../types'

type Context = NodeContext<RagContext, RagDependencies>

export interface OpenAIGeneratorOptions {
	model?: string
	maxTokens?: number
	temperature?: number
	systemPrompt?: string
	/** When set, a prompt built from zero documents is answered with this text and the backend is not called. */
	emptyContextReply?: string
}

/**
 * Sends the prompt to a chat-completion backend. Every backend failure is fatal.
 */
export class OpenAIGeneratorNode extends BaseNode<RagContext, RagDependencies, PromptOutput, GeneratorOutput> {
	public readonly model: string
	private maxTokens: number
	private temperature?: number
	private systemPrompt?: string
	private emptyContextReply?: string

	constructor(options: OpenAIGeneratorOptions = {}) {
		super()
		this.model = options.model ?? 'llama-3.3-70b-versatile'
		this.maxTokens = options.maxTokens ?? 512
		this.temperature = options.temperature
		this.systemPrompt = options.systemPrompt
		this.emptyContextReply = options.emptyContextReply
	}

	async prep({ input }: Context): Promise<PromptOutput> {
		if (!isPromptOutput(input)) {
			throw new TypeError('OpenAIGeneratorNode expects a rendered prompt as input.')
		}
		return input
	}

	async exec({ prompt, documents }: PromptOutput, { dependencies }: Context): Promise<NodeResult<GeneratorOutput>> {
		const { chat, logger } = dependencies
		if (documents.length === 0 && this.emptyContextReply !== undefined) {
			logger.info('No context documents, answering without the model')
			return { output: { replies: [this.emptyContextReply], meta: [] } }
		}

		let completion: GeneratorOutput
		try {
			completion = await chat.complete({
				model: this.model,
				prompt,
				systemPrompt: this.systemPrompt,
				maxTokens: this.maxTokens,
				temperature: this.temperature,
			})
		} catch (e) {
			throw new PipelineError(`Generation failed: ${toError(e).message}`, { cause: e, isFatal: true })
		}

		if (completion.replies.length === 0) {
			throw new PipelineError('The generation backend returned no replies.', { isFatal: true })
		}
		logger.debug('Generated replies', { model: this.model, replies: completion.replies.length })
		return { output: completion }
	}
}
