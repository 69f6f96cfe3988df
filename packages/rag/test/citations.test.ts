import { describe, expect, it } from 'vitest'
import { citedSources, extractUrls } from '../src/utils/citations'

const known = ['https://pages.test/expansion', 'https://pages.test/decomposition', 'https://pages.test/filters']

describe('extractUrls', () => {
	it('should find URLs in prose, lists and markdown links', () => {
		const text = 'See https://a.test/x. Also:\n- https://b.test/y,\n[link](https://c.test/z)'
		expect(extractUrls(text)).toEqual(['https://a.test/x', 'https://b.test/y', 'https://c.test/z'])
	})

	it('should keep balanced brackets inside a URL', () => {
		expect(extractUrls('(see https://wiki.test/Query_(computing)).')).toEqual(['https://wiki.test/Query_(computing)'])
	})
})

describe('citedSources', () => {
	it('should keep known URLs in order of first appearance without duplicates', () => {
		const reply =
			'Use decomposition (https://pages.test/decomposition) and expansion.\n' +
			'Used document links:\n- https://pages.test/expansion\n- https://pages.test/decomposition.'
		expect(citedSources(reply, known)).toEqual(['https://pages.test/decomposition', 'https://pages.test/expansion'])
	})

	it('should ignore URLs that are not among the sources', () => {
		expect(citedSources('Read https://elsewhere.test/page instead.', known)).toEqual([])
	})

	it('should treat a trailing slash as the same URL', () => {
		expect(citedSources('https://pages.test/filters/', known)).toEqual(['https://pages.test/filters'])
	})

	it('should match known URLs that end in brackets or punctuation', () => {
		const urls = ['https://wiki.test/Query_(computing)', 'https://pages.test/term_']
		const reply = 'See https://wiki.test/Query_(computing) and (https://pages.test/term_).'
		expect(citedSources(reply, urls)).toEqual(urls)
	})

	it('should not match a longer URL that only starts with a known one', () => {
		expect(citedSources('https://pages.test/expansion-guide', known)).toEqual([])
	})

	it('should find nothing in a reply without links', () => {
		expect(citedSources('There is no information about preprocessing.', known)).toEqual([])
	})
})
