import type { ChatClient, ReplyMeta } from './clients/openai'
import type { RerankClient } from './clients/cohere'

/** The subset of the Fetch API the fetcher relies on; `globalThis.fetch` satisfies it. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

/** The raw result of fetching one URL. Exactly one is produced per requested URL. */
export type FetchedResource =
	| { status: 'ok'; url: string; mimeType: string; data: Uint8Array }
	| { status: 'failed'; url: string; error: string }

export interface DocumentMeta {
	url: string
	content_type?: string
	title?: string
	/** Set on chunks: the id of the document the chunk was cut from. */
	source_id?: string
	split_id?: number
	/** Character offset of the chunk within its parent's content. */
	split_idx_start?: number
	page_number?: number
}

export interface Document {
	id: string
	content: string
	meta: DocumentMeta
	score?: number
}

export interface ScoredDocument extends Document {
	score: number
}

export interface PromptOutput {
	prompt: string
	/** The documents the prompt was rendered from, in prompt order. */
	documents: ScoredDocument[]
}

export interface GeneratorOutput {
	replies: string[]
	meta: ReplyMeta[]
}

export interface Answer {
	/** The first reply of the generator. */
	text: string
	/** Context URLs cited in the reply, in order of first appearance. */
	sources: string[]
	replies: string[]
	meta: ReplyMeta[]
	/** The ranked documents the answer was generated from. */
	documents: ScoredDocument[]
}

/** The run-time inputs shared by the pipeline's nodes. */
export interface RagContext {
	urls: string[]
	query: string
}

export type RagDependencies = {
	fetch: FetchLike
	reranker: RerankClient
	chat: ChatClient
}
