import * as cheerio from 'cheerio'

const CHROME_SELECTOR = 'script, style, noscript, template, svg, iframe, nav, header, footer, aside, form, button'
const CONTENT_SELECTOR = 'main, article, [role=main]'
const BLOCK_SELECTOR =
	'p, div, section, li, ul, ol, h1, h2, h3, h4, h5, h6, pre, blockquote, table, tr, dl, dt, dd, figcaption'

export interface ExtractedText {
	title?: string
	text: string
}

/**
 * Extracts the readable text of an HTML page. Block elements become paragraphs
 * separated by a blank line; whitespace inside a paragraph is collapsed.
 */
export function htmlToText(html: string): ExtractedText {
	const $ = cheerio.load(html)
	const title = $('title').first().text().trim() || undefined

	$(CHROME_SELECTOR).remove()
	$('br').replaceWith('\n')
	$(BLOCK_SELECTOR).each((_, element) => {
		$(element).prepend('\n\n').append('\n\n')
	})

	const main = $(CONTENT_SELECTOR).first()
	const raw = main.length > 0 ? main.text() : $('body').text()

	const text = raw
		.split(/\n\s*\n/)
		.map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
		.filter((paragraph) => paragraph.length > 0)
		.join('\n\n')

	return { title, text }
}
