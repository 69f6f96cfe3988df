import OpenAI from 'openai'

export interface ChatRequest {
	model: string
	prompt: string
	systemPrompt?: string
	maxTokens?: number
	temperature?: number
}

export interface ReplyMeta {
	model: string
	index: number
	finish_reason: string | null
	usage?: {
		prompt_tokens: number
		completion_tokens: number
		total_tokens: number
	}
}

export interface ChatCompletion {
	replies: string[]
	meta: ReplyMeta[]
}

/** A chat-completion backend; one reply per returned choice. */
export interface ChatClient {
	complete: (request: ChatRequest) => Promise<ChatCompletion>
}

/**
 * Talks to any OpenAI-compatible chat completions endpoint, such as Groq's.
 * The client never retries: a failed call fails the generation.
 */
export class OpenAIChatClient implements ChatClient {
	private client: OpenAI

	constructor(options: { apiKey: string; baseURL: string }) {
		this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 })
	}

	async complete(request: ChatRequest): Promise<ChatCompletion> {
		const messages: OpenAI.Chat.ChatCompletionMessageParam[] = []
		if (request.systemPrompt) {
			messages.push({ role: 'system', content: request.systemPrompt })
		}
		messages.push({ role: 'user', content: request.prompt })

		const completion = await this.client.chat.completions.create({
			model: request.model,
			messages,
			max_tokens: request.maxTokens,
			temperature: request.temperature,
		})

		const usage = completion.usage
			? {
					prompt_tokens: completion.usage.prompt_tokens,
					completion_tokens: completion.usage.completion_tokens,
					total_tokens: completion.usage.total_tokens,
				}
			: undefined

		return {
			replies: completion.choices.map((choice) => choice.message.content ?? ''),
			meta: completion.choices.map((choice) => ({
				model: completion.model,
				index: choice.index,
				finish_reason: choice.finish_reason,
				usage,
			})),
		}
	}
}
