import { CohereClient } from 'cohere-ai'

export interface RerankRequest {
	model: string
	query: string
	documents: string[]
	topN: number
	maxChunksPerDoc?: number
}

export interface RerankResult {
	/** Position of the document in the request. */
	index: number
	relevanceScore: number
}

/** A backend that scores documents against a query. */
export interface RerankClient {
	rerank: (request: RerankRequest) => Promise<RerankResult[]>
}

/** Scores documents with the Cohere rerank endpoint. */
export class CohereRerankClient implements RerankClient {
	private client: CohereClient

	constructor(apiKey: string) {
		this.client = new CohereClient({ token: apiKey })
	}

	async rerank(request: RerankRequest): Promise<RerankResult[]> {
		const response = await this.client.rerank(
			{
				model: request.model,
				query: request.query,
				documents: request.documents,
				topN: request.topN,
				maxChunksPerDoc: request.maxChunksPerDoc,
			},
			{ maxRetries: 0 },
		)
		return response.results.map(({ index, relevanceScore }) => ({ index, relevanceScore }))
	}
}
