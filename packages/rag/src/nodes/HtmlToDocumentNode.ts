import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode } from '@sourcewise/core'
import { expectArrayOf, isFetchedResource } from '../guards'
import type { Document, DocumentMeta, FetchedResource, RagContext, RagDependencies } from '../types'
import { createDocument } from '../utils/document'
import { htmlToText } from '../utils/html'

type Context = NodeContext<RagContext, RagDependencies>

export function isTextualMimeType(mimeType: string): boolean {
	return mimeType.startsWith('text/') || mimeType === 'application/xhtml+xml'
}

/** Turns fetched pages into plain-text documents, one per readable page. */
export class HtmlToDocumentNode extends BaseNode<RagContext, RagDependencies, FetchedResource[], Document[]> {
	private decoder = new TextDecoder('utf-8')

	async prep({ input }: Context): Promise<FetchedResource[]> {
		return expectArrayOf(input, isFetchedResource, 'HtmlToDocumentNode', 'fetched resources')
	}

	async exec(resources: FetchedResource[], { dependencies }: Context): Promise<NodeResult<Document[]>> {
		const { logger } = dependencies
		const documents: Document[] = []

		for (const resource of resources) {
			if (resource.status === 'failed') continue
			if (!isTextualMimeType(resource.mimeType)) {
				logger.warn(`Skipping '${resource.url}': unsupported content type '${resource.mimeType}'`)
				continue
			}

			const { title, text } = htmlToText(this.decoder.decode(resource.data))
			if (text.length === 0) {
				logger.warn(`Skipping '${resource.url}': no text content`)
				continue
			}

			const meta: DocumentMeta = { url: resource.url, content_type: resource.mimeType }
			if (title) meta.title = title
			documents.push(createDocument(text, meta))
		}

		logger.debug(`Converted ${documents.length} documents`)
		return { output: documents }
	}
}
