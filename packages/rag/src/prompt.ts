import nunjucks from 'nunjucks'

export const DEFAULT_TEMPLATE = `Given the information below, answer the query. Only use the provided context to generate the answer and output the used document links
Context:
{% for document in documents %}
    {{ document.content }}
    URL: {{ document.meta.url }}
{% endfor %}

Question: {{ query }}
Answer:`

export interface PromptBuilderOptions {
	template?: string
	/** Variables that must be present (not undefined) when rendering. */
	requiredVariables?: string[]
}

/**
 * Renders a Jinja-style template. Output is not HTML-escaped.
 */
export class PromptBuilder {
	public readonly template: string
	public readonly requiredVariables: readonly string[]
	private env = new nunjucks.Environment(null, { autoescape: false })

	constructor(options: PromptBuilderOptions = {}) {
		this.template = options.template ?? DEFAULT_TEMPLATE
		this.requiredVariables = options.requiredVariables ?? []
	}

	render(variables: Record<string, unknown>): string {
		const missing = this.requiredVariables.filter((name) => variables[name] === undefined)
		if (missing.length > 0) {
			throw new TypeError(`Missing required prompt variables: ${missing.join(', ')}.`)
		}
		return this.env.renderString(this.template, variables)
	}
}
