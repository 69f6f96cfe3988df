import { analyzeBlueprint, lintBlueprint, PipelineError } from '@sourcewise/core'
import { InMemoryEventLogger } from '@sourcewise/core/testing'
import { describe, expect, it } from 'vitest'
import type { ChatClient } from '../src/clients/openai'
import { createRagFlow } from '../src/flow'
import { RagPipeline } from '../src/pipeline'
import { createFakeFetch, FakeChatClient, KeywordRerankClient, page } from './fakes'

const URLS = ['https://pages.test/expansion', 'https://pages.test/decomposition', 'https://pages.test/bread']
const QUERY = 'Which methods can I use to transform a query for better retrieval?'

function createSite() {
	return createFakeFetch({
		'https://pages.test/expansion': {
			body: page('Query Expansion', 'Query expansion generates similar queries to improve recall.', 'It helps keyword retrieval.'),
		},
		'https://pages.test/decomposition': {
			body: page('Query Decomposition', 'Query decomposition splits a query into sub-questions.'),
		},
		'https://pages.test/bread': { body: page('Bread', 'Knead the dough for ten minutes.') },
	})
}

const REPLY =
	'You can expand or decompose the query.\n\nUsed document links:\n' +
	'- https://pages.test/expansion\n- https://pages.test/decomposition\n- https://elsewhere.test/unrelated'

describe('createRagFlow', () => {
	it('should declare a valid six-stage chain', () => {
		const flow = createRagFlow()
		const blueprint = flow.toBlueprint()
		expect(lintBlueprint(blueprint, flow.getFunctionRegistry())).toEqual({ isValid: true, issues: [] })
		expect(analyzeBlueprint(blueprint).executionOrder).toEqual([
			'fetcher',
			'converter',
			'splitter',
			'reranker',
			'prompt_builder',
			'generator',
		])
		expect(blueprint.nodes[0].inputs).toBe('urls')
	})
})

describe('RagPipeline', () => {
	it('should answer from the fetched pages and cite only context URLs', async () => {
		const chat = new FakeChatClient(REPLY)
		const reranker = new KeywordRerankClient()
		const pipeline = new RagPipeline({ dependencies: { fetch: createSite().fetch, reranker, chat } })

		const answer = await pipeline.run(URLS, QUERY)

		expect(answer.text).toBe(REPLY)
		expect(answer.sources).toEqual(['https://pages.test/expansion', 'https://pages.test/decomposition'])
		expect(answer.documents).toHaveLength(3)
		expect(reranker.requests[0].query).toBe(QUERY)
		expect(chat.requests).toHaveLength(1)
		expect(chat.requests[0].prompt).toContain('URL: https://pages.test/decomposition')
		expect(chat.requests[0].prompt).toContain(`Question: ${QUERY}`)
	})

	it('should run the stages in order and report them as events', async () => {
		const events = new InMemoryEventLogger()
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat: new FakeChatClient(REPLY) },
			eventBus: events,
		})

		const { result } = await pipeline.execute(URLS, QUERY)

		expect(result.status).toBe('completed')
		expect(events.filter('node:start').map((e) => e.payload.nodeId)).toEqual([
			'fetcher',
			'converter',
			'splitter',
			'reranker',
			'prompt_builder',
			'generator',
		])
		expect(result.context).toEqual({ urls: URLS, query: QUERY })
		expect(JSON.parse(result.serializedContext)).toMatchObject({ context: { query: QUERY } })
	})

	it('should pass an empty context to the generator for an empty URL list', async () => {
		const fake = createSite()
		const reranker = new KeywordRerankClient()
		const chat = new FakeChatClient('There is no information to answer from.')
		const pipeline = new RagPipeline({ dependencies: { fetch: fake.fetch, reranker, chat } })

		const { answer, result } = await pipeline.execute([], 'What is preprocessing?')

		expect(fake.calls).toEqual([])
		expect(result.outputs.converter).toEqual([])
		expect(result.outputs.splitter).toEqual([])
		expect(reranker.requests).toEqual([])
		expect(chat.requests).toHaveLength(1)
		expect(chat.requests[0].prompt).not.toContain('URL:')
		expect(answer).toMatchObject({ text: 'There is no information to answer from.', sources: [], documents: [] })
	})

	it('should give a non-empty context to the model and cite nothing for an unrelated query', async () => {
		const chat = new FakeChatClient('None of the documents mention preprocessing.')
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat },
		})

		const answer = await pipeline.run(URLS, "What's preprocessing?")

		expect(chat.requests).toHaveLength(1)
		expect(chat.requests[0].prompt).toContain('URL: https://pages.test/bread')
		expect(answer.documents).toHaveLength(3)
		expect(answer.text).toBe('None of the documents mention preprocessing.')
		expect(answer.sources).toEqual([])
	})

	it('should answer an empty context without the model when a reply is configured', async () => {
		const chat = new FakeChatClient('unused')
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat },
			generator: { emptyContextReply: 'No sources were available.' },
		})

		const answer = await pipeline.run(['https://unreachable.test/'], QUERY)

		expect(answer.text).toBe('No sources were available.')
		expect(chat.requests).toEqual([])
	})

	it('should carry on when some URLs cannot be fetched', async () => {
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat: new FakeChatClient(REPLY) },
			fetcher: { attempts: 1 },
		})

		const { answer, result } = await pipeline.execute(['https://unreachable.test/', 'https://pages.test/expansion'], QUERY)

		expect(result.outputs.converter).toHaveLength(1)
		expect(answer.sources).toEqual(['https://pages.test/expansion'])
	})

	it('should fail the run when the generator fails', async () => {
		const chat: ChatClient = {
			complete: async () => {
				throw new Error('503 service unavailable')
			},
		}
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat },
		})

		const error = await pipeline.run(URLS, QUERY).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(PipelineError)
		expect(error).toMatchObject({
			message: "Node 'generator' failed: Generation failed: 503 service unavailable",
			nodeId: 'generator',
			blueprintId: 'sourced-answer',
			isFatal: true,
		})
	})

	it('should limit the prompt to the top-ranked chunks', async () => {
		const chat = new FakeChatClient(REPLY)
		const pipeline = new RagPipeline({
			dependencies: { fetch: createSite().fetch, reranker: new KeywordRerankClient(), chat },
			reranker: { topK: 1 },
		})

		const answer = await pipeline.run(URLS, QUERY)

		expect(answer.documents).toHaveLength(1)
		expect(answer.sources).toEqual([answer.documents[0].meta.url])
	})
})
