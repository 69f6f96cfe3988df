import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode, PipelineError, toError } from '@sourcewise/core'
import { isStringArray } from '../guards'
import type { FetchedResource, FetchLike, RagContext, RagDependencies } from '../types'

export const DEFAULT_USER_AGENTS = [
	'Mozilla/5.0 (compatible; sourcewise/0.1; +link-content-fetcher)',
	'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
]

export interface LinkContentFetcherOptions {
	/** Tries per URL, each with the next user agent. */
	attempts?: number
	timeoutMs?: number
	userAgents?: string[]
	/** Throw instead of returning a failed resource. Only applies to single-URL runs. */
	raiseOnFailure?: boolean
}

type Context = NodeContext<RagContext, RagDependencies>

/**
 * Downloads every URL concurrently. The output has one resource per URL, in request
 * order; a URL that keeps failing becomes a `failed` resource instead of failing the run.
 */
export class LinkContentFetcherNode extends BaseNode<RagContext, RagDependencies, string[], FetchedResource[]> {
	private attempts: number
	private timeoutMs: number
	private userAgents: string[]
	private raiseOnFailure: boolean

	constructor(options: LinkContentFetcherOptions = {}) {
		super()
		this.attempts = options.attempts ?? 2
		this.timeoutMs = options.timeoutMs ?? 3000
		this.userAgents = options.userAgents?.length ? options.userAgents : DEFAULT_USER_AGENTS
		this.raiseOnFailure = options.raiseOnFailure ?? false
		if (!Number.isInteger(this.attempts) || this.attempts < 1) {
			throw new RangeError(`attempts must be a positive integer, got ${this.attempts}.`)
		}
	}

	async prep({ input }: Context): Promise<string[]> {
		if (!isStringArray(input)) {
			throw new TypeError('LinkContentFetcherNode expects an array of URLs as input.')
		}
		return input
	}

	async exec(urls: string[], { dependencies }: Context): Promise<NodeResult<FetchedResource[]>> {
		const { fetch, logger } = dependencies
		const resources = await Promise.all(urls.map((url) => this.fetchOne(url, fetch)))

		for (const resource of resources) {
			if (resource.status === 'failed') {
				if (this.raiseOnFailure && urls.length === 1) {
					throw new PipelineError(`Failed to fetch '${resource.url}': ${resource.error}`)
				}
				logger.warn(`Skipping '${resource.url}': ${resource.error}`)
			}
		}
		logger.info(`Fetched ${resources.filter((r) => r.status === 'ok').length} of ${urls.length} URLs`)
		return { output: resources }
	}

	private async fetchOne(url: string, fetch: FetchLike): Promise<FetchedResource> {
		let lastError = 'no attempt was made'
		for (let attempt = 0; attempt < this.attempts; attempt++) {
			try {
				const response = await fetch(url, {
					headers: { 'User-Agent': this.userAgents[attempt % this.userAgents.length] },
					signal: AbortSignal.timeout(this.timeoutMs),
				})
				if (!response.ok) {
					throw new Error(`HTTP ${response.status}`)
				}
				const mimeType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase()
				const data = new Uint8Array(await response.arrayBuffer())
				return { status: 'ok', url, mimeType: mimeType || 'text/html', data }
			} catch (e) {
				lastError = toError(e).message
			}
		}
		return { status: 'failed', url, error: lastError }
	}
}
