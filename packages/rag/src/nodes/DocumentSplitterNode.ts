import type { NodeContext, NodeResult } from '@sourcewise/core'
import { BaseNode } from '@sourcewise/core'
import { expectArrayOf, isDocument } from '../guards'
import type { Document, RagContext, RagDependencies } from '../types'
import { createDocument } from '../utils/document'
import type { SplitOptions } from '../utils/splitter'
import { splitText, validateSplitOptions } from '../utils/splitter'

type Context = NodeContext<RagContext, RagDependencies>

export type DocumentSplitterOptions = Partial<SplitOptions>

/**
 * Cuts each document into chunks of `splitLength` units. Chunks carry their
 * parent's metadata plus their position in it.
 */
export class DocumentSplitterNode extends BaseNode<RagContext, RagDependencies, Document[], Document[]> {
	private options: SplitOptions

	constructor(options: DocumentSplitterOptions = {}) {
		super()
		this.options = {
			splitBy: options.splitBy ?? 'sentence',
			splitLength: options.splitLength ?? 200,
			splitOverlap: options.splitOverlap ?? 0,
			splitThreshold: options.splitThreshold ?? 0,
		}
		validateSplitOptions(this.options)
	}

	async prep({ input }: Context): Promise<Document[]> {
		return expectArrayOf(input, isDocument, 'DocumentSplitterNode', 'documents')
	}

	async exec(documents: Document[], { dependencies }: Context): Promise<NodeResult<Document[]>> {
		const chunks = documents.flatMap((document) =>
			splitText(document.content, this.options).map((split, index) =>
				createDocument(split.content, {
					...document.meta,
					source_id: document.id,
					split_id: index,
					split_idx_start: split.start,
					page_number: split.pageNumber,
				}),
			),
		)
		dependencies.logger.debug(`Split ${documents.length} documents into ${chunks.length} chunks`)
		return { output: chunks }
	}
}
