export type SplitBy = 'sentence' | 'word' | 'passage' | 'page' | 'line'

export const SPLIT_BY_OPTIONS: readonly SplitBy[] = ['sentence', 'word', 'passage', 'page', 'line']

const DELIMITERS: Record<Exclude<SplitBy, 'sentence'>, string> = {
	word: ' ',
	passage: '\n\n',
	page: '\f',
	line: '\n',
}

export interface SplitOptions {
	splitBy: SplitBy
	splitLength: number
	splitOverlap?: number
	splitThreshold?: number
}

export interface TextSplit {
	content: string
	/** Character offset of the split within the source text. */
	start: number
	pageNumber: number
}

const sentenceSegmenter = new Intl.Segmenter('en', { granularity: 'sentence' })

/**
 * Cuts text into units. Concatenating the units always gives back the input:
 * delimiters stay on the unit they end, and whitespace-only sentence segments
 * stay with the sentence before them.
 */
export function splitIntoUnits(text: string, splitBy: SplitBy): string[] {
	if (text.length === 0) return []

	if (splitBy === 'sentence') {
		const units: string[] = []
		for (const { segment } of sentenceSegmenter.segment(text)) {
			if (segment.trim().length === 0 && units.length > 0) {
				units[units.length - 1] += segment
			} else {
				units.push(segment)
			}
		}
		return units
	}

	const delimiter = DELIMITERS[splitBy]
	const parts = text.split(delimiter)
	const units = parts.map((part, i) => (i < parts.length - 1 ? part + delimiter : part))
	if (units[units.length - 1] === '') units.pop()
	return units
}

export function validateSplitOptions(options: SplitOptions): void {
	const { splitLength, splitOverlap = 0, splitThreshold = 0 } = options
	if (!Number.isInteger(splitLength) || splitLength <= 0) {
		throw new RangeError(`splitLength must be a positive integer, got ${splitLength}.`)
	}
	if (!Number.isInteger(splitOverlap) || splitOverlap < 0 || splitOverlap >= splitLength) {
		throw new RangeError(`splitOverlap must be an integer in [0, splitLength), got ${splitOverlap}.`)
	}
	if (!Number.isInteger(splitThreshold) || splitThreshold < 0) {
		throw new RangeError(`splitThreshold must be a non-negative integer, got ${splitThreshold}.`)
	}
}

/**
 * Groups units into windows of `splitLength`, each starting `splitLength - splitOverlap`
 * units after the previous one. With no overlap, S units give ceil(S / splitLength) splits.
 */
export function splitText(text: string, options: SplitOptions): TextSplit[] {
	validateSplitOptions(options)
	const { splitBy, splitLength, splitOverlap = 0, splitThreshold = 0 } = options
	const units = splitIntoUnits(text, splitBy)

	const offsets = [0]
	for (const unit of units) {
		offsets.push(offsets[offsets.length - 1] + unit.length)
	}

	const step = splitLength - splitOverlap
	const windows: { first: number; end: number }[] = []
	for (let first = 0; first < units.length; first += step) {
		const end = Math.min(first + splitLength, units.length)
		const previous = windows[windows.length - 1]
		if (previous && end - first < splitThreshold) {
			previous.end = end
		} else {
			windows.push({ first, end })
		}
		if (end === units.length) break
	}

	return windows
		.map(({ first, end }) => {
			const start = offsets[first]
			return {
				content: text.slice(start, offsets[end]),
				start,
				pageNumber: countPageBreaks(text.slice(0, start)) + 1,
			}
		})
		.filter((split) => split.content.trim().length > 0)
}

function countPageBreaks(text: string): number {
	return text.split('\f').length - 1
}
