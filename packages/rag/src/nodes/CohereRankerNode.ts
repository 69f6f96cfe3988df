import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode } from '@sourcewise/core'
import { expectArrayOf, isDocument } from '../guards'
import type { Document, DocumentMeta, RagContext, RagDependencies, ScoredDocument } from '../types'

type Context = NodeContext<RagContext, RagDependencies>

export interface CohereRankerOptions {
	model?: string
	topK?: number
	/** Metadata fields prepended to the content sent for scoring. */
	metaFieldsToEmbed?: (keyof DocumentMeta)[]
	metaDataSeparator?: string
	maxChunksPerDoc?: number
}

interface RankInput {
	documents: Document[]
	query: string
}

/**
 * Orders chunks by their relevance to the run's query, best first, keeping at most `topK`.
 * Equal scores keep their input order.
 */
export class CohereRankerNode extends BaseNode<RagContext, RagDependencies, RankInput, ScoredDocument[]> {
	public readonly model: string
	public readonly topK: number
	private metaFieldsToEmbed: (keyof DocumentMeta)[]
	private metaDataSeparator: string
	private maxChunksPerDoc?: number

	constructor(options: CohereRankerOptions = {}) {
		super()
		this.model = options.model ?? 'rerank-english-v3.0'
		this.topK = options.topK ?? 10
		this.metaFieldsToEmbed = options.metaFieldsToEmbed ?? []
		this.metaDataSeparator = options.metaDataSeparator ?? '\n'
		this.maxChunksPerDoc = options.maxChunksPerDoc
		if (!Number.isInteger(this.topK) || this.topK <= 0) {
			throw new RangeError(`topK must be a positive integer, got ${this.topK}.`)
		}
	}

	async prep({ input, context }: Context): Promise<RankInput> {
		const documents = expectArrayOf(input, isDocument, 'CohereRankerNode', 'documents')
		const query = await context.get('query')
		if (typeof query !== 'string') {
			throw new TypeError("CohereRankerNode needs a 'query' string in the context.")
		}
		return { documents, query }
	}

	async exec({ documents, query }: RankInput, { dependencies }: Context): Promise<NodeResult<ScoredDocument[]>> {
		if (documents.length === 0) {
			dependencies.logger.debug('No documents to rank')
			return { output: [] }
		}

		const results = await dependencies.reranker.rerank({
			model: this.model,
			query,
			documents: documents.map((document) => this.textToScore(document)),
			topN: Math.min(this.topK, documents.length),
			maxChunksPerDoc: this.maxChunksPerDoc,
		})

		const expected = Math.min(this.topK, documents.length)
		if (results.length !== expected) {
			throw new RangeError(`The rerank backend returned ${results.length} results, expected ${expected}.`)
		}
		const seen = new Set<number>()
		for (const { index, relevanceScore } of results) {
			if (!Number.isInteger(index) || index < 0 || index >= documents.length || seen.has(index)) {
				throw new RangeError(`The rerank backend returned an invalid document index: ${index}.`)
			}
			if (!Number.isFinite(relevanceScore)) {
				throw new RangeError(`The rerank backend returned an invalid score for document ${index}: ${relevanceScore}.`)
			}
			seen.add(index)
		}

		const ranked = [...results]
			.sort((a, b) => b.relevanceScore - a.relevanceScore || a.index - b.index)
			.slice(0, this.topK)
			.map(({ index, relevanceScore }) => ({ ...documents[index], score: relevanceScore }))

		dependencies.logger.debug(`Ranked ${documents.length} documents, kept ${ranked.length}`)
		return { output: ranked }
	}

	private textToScore(document: Document): string {
		const metaValues = this.metaFieldsToEmbed
			.map((field) => document.meta[field])
			.filter((value) => value !== undefined && value !== '')
			.map(String)
		return [...metaValues, document.content].join(this.metaDataSeparator)
	}
}
