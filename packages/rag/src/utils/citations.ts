const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/g
const TRAILING_PUNCTUATION = /[.,;:!?*_'")\]}]+$/
// What may follow a cited URL in the reply: a trailing slash, then punctuation or closing brackets.
const CITATION_SUFFIX = /^\/*[.,;:!?*_'")\]}]*$/

const BRACKETS: Record<string, string> = { ')': '(', ']': '[', '}': '{' }

/** Every http(s) URL written in `text`, in order, without trailing punctuation or unbalanced closing brackets. */
export function extractUrls(text: string): string[] {
	return Array.from(text.matchAll(URL_PATTERN), (match) => trimTrailing(match[0]))
}

/**
 * The URLs cited in a reply that belong to the known sources, deduplicated in
 * order of first appearance. A trailing slash does not make a URL different.
 *
 * Each URL written in the reply is matched against the known URLs by prefix,
 * longest first, so known URLs that end in punctuation or brackets still match.
 */
export function citedSources(reply: string, knownUrls: Iterable<string>): string[] {
	const known = Array.from(new Set(knownUrls), (url) => ({ url, key: normalize(url) })).sort(
		(a, b) => b.key.length - a.key.length,
	)

	const sources: string[] = []
	for (const [candidate] of reply.matchAll(URL_PATTERN)) {
		const match = known.find(({ key }) => candidate.startsWith(key) && CITATION_SUFFIX.test(candidate.slice(key.length)))
		if (match !== undefined && !sources.includes(match.url)) {
			sources.push(match.url)
		}
	}
	return sources
}

function normalize(url: string): string {
	return url.replace(/\/+$/, '')
}

function trimTrailing(url: string): string {
	let trimmed = url
	while (trimmed.length > 0 && isTrailing(trimmed)) {
		trimmed = trimmed.slice(0, -1)
	}
	return trimmed
}

function isTrailing(url: string): boolean {
	const last = url.slice(-1)
	if (last in BRACKETS) {
		return count(url, last) > count(url, BRACKETS[last])
	}
	return TRAILING_PUNCTUATION.test(last)
}

function count(text: string, char: string): number {
	return text.split(char).length - 1
}
