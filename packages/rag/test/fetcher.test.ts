import { describe, expect, it } from 'vitest'
import { LinkContentFetcherNode } from '../src/nodes/LinkContentFetcherNode'
import { createFakeFetch, createLogger, nodeContext } from './fakes'

const decoder = new TextDecoder()

describe('LinkContentFetcherNode', () => {
	it('should return one resource per URL in request order', async () => {
		const { fetch } = createFakeFetch({
			'https://pages.test/a': { body: '<p>A</p>' },
			'https://pages.test/b': { body: 'plain', contentType: 'text/plain' },
		})
		const node = new LinkContentFetcherNode()
		const ctx = nodeContext(['https://pages.test/b', 'https://pages.test/a'], {}, { fetch })
		const { output } = await node.exec(await node.prep(ctx), ctx)

		expect(output?.map((r) => r.url)).toEqual(['https://pages.test/b', 'https://pages.test/a'])
		expect(output?.map((r) => (r.status === 'ok' ? r.mimeType : r.status))).toEqual(['text/plain', 'text/html'])
		const first = output?.[0]
		expect(first?.status === 'ok' ? decoder.decode(first.data) : undefined).toBe('plain')
	})

	it('should retry with the next user agent', async () => {
		const fake = createFakeFetch({
			'https://pages.test/flaky': [{ status: 503, body: 'busy' }, { body: '<p>ok</p>' }],
		})
		const node = new LinkContentFetcherNode({ userAgents: ['agent-1', 'agent-2'] })
		const ctx = nodeContext(['https://pages.test/flaky'], {}, { fetch: fake.fetch })
		const { output } = await node.exec(await node.prep(ctx), ctx)

		expect(output?.[0].status).toBe('ok')
		expect(fake.calls.map((c) => c.userAgent)).toEqual(['agent-1', 'agent-2'])
	})

	it('should turn a URL that keeps failing into a failed resource and keep the others', async () => {
		const logger = createLogger()
		const fake = createFakeFetch({
			'https://pages.test/good': { body: '<p>fine</p>' },
			'https://pages.test/gone': { status: 404, body: 'missing' },
		})
		const node = new LinkContentFetcherNode({ attempts: 3 })
		const ctx = nodeContext(['https://pages.test/gone', 'https://pages.test/good'], {}, { fetch: fake.fetch, logger })
		const { output } = await node.exec(await node.prep(ctx), ctx)

		expect(output?.[0]).toEqual({ status: 'failed', url: 'https://pages.test/gone', error: 'HTTP 404' })
		expect(output?.[1].status).toBe('ok')
		expect(fake.calls.filter((c) => c.url === 'https://pages.test/gone')).toHaveLength(3)
		expect(logger.warn).toHaveBeenCalledWith("Skipping 'https://pages.test/gone': HTTP 404")
	})

	it('should report network errors', async () => {
		const node = new LinkContentFetcherNode({ attempts: 1 })
		const ctx = nodeContext(['https://unreachable.test/'])
		const { output } = await node.exec(await node.prep(ctx), ctx)
		expect(output).toEqual([{ status: 'failed', url: 'https://unreachable.test/', error: 'fetch failed' }])
	})

	it('should raise for a single failing URL when asked to', async () => {
		const node = new LinkContentFetcherNode({ attempts: 1, raiseOnFailure: true })
		const ctx = nodeContext(['https://unreachable.test/'])
		await expect(node.exec(await node.prep(ctx), ctx)).rejects.toThrow(
			"Failed to fetch 'https://unreachable.test/': fetch failed",
		)
	})

	it('should fetch nothing for an empty URL list', async () => {
		const fake = createFakeFetch({})
		const node = new LinkContentFetcherNode()
		const ctx = nodeContext([], {}, { fetch: fake.fetch })
		expect((await node.exec(await node.prep(ctx), ctx)).output).toEqual([])
		expect(fake.calls).toEqual([])
	})

	it('should reject input that is not a list of URLs', async () => {
		const node = new LinkContentFetcherNode()
		await expect(node.prep(nodeContext('https://pages.test/a'))).rejects.toThrow(TypeError)
	})

	it('should reject a non-positive attempt count', () => {
		expect(() => new LinkContentFetcherNode({ attempts: 0 })).toThrow('attempts must be a positive integer, got 0.')
	})
})
