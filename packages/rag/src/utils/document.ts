import { createHash } from 'node:crypto'
import type { Document, DocumentMeta } from '../types'

/** A stable id derived from a document's content and metadata. */
export function documentId(content: string, meta: DocumentMeta): string {
	return createHash('sha256').update(JSON.stringify({ content, meta })).digest('hex')
}

export function createDocument(content: string, meta: DocumentMeta): Document {
	return { id: documentId(content, meta), content, meta }
}
