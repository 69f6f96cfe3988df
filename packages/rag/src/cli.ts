import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import type { ILogger } from '@sourcewise/core'
import { ConsoleLogger, toError } from '@sourcewise/core'
import chalk from 'chalk'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { CohereRerankClient } from './clients/cohere'
import { OpenAIChatClient } from './clients/openai'
import type { RagConfig } from './config'
import { loadConfig } from './config'
import type { RagFlowOptions } from './flow'
import type { RagExecution } from './pipeline'
import { DEFAULT_QUERY, DEFAULT_URLS, RagPipeline } from './pipeline'
import { SuperJsonSerializer } from './serializer'

export interface CliIO {
	out: (text: string) => void
	err: (text: string) => void
}

/** Anything that can answer a query; `RagPipeline` in production. */
export interface QueryExecutor {
	execute: (urls: string[], query: string) => Promise<RagExecution>
}

export type PipelineFactory = (config: RagConfig, logger: ILogger, flowOptions: RagFlowOptions) => QueryExecutor

export interface CliOptions {
	env?: NodeJS.ProcessEnv
	io?: CliIO
	createPipeline?: PipelineFactory
}

interface AskOptions {
	url?: string[]
	topK?: number
	dumpContext?: string
}

const consoleIO: CliIO = {
	out: (text) => console.log(text),
	err: (text) => console.error(text),
}

export const createDefaultPipeline: PipelineFactory = (config, logger, flowOptions) =>
	new RagPipeline({
		...flowOptions,
		logger,
		serializer: new SuperJsonSerializer(),
		dependencies: {
			fetch: globalThis.fetch,
			reranker: new CohereRerankClient(config.cohereApiKey),
			chat: new OpenAIChatClient({ apiKey: config.groqApiKey, baseURL: config.generatorBaseUrl }),
		},
	})

function parsePositiveInt(value: string): number {
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Must be a positive integer.')
	}
	return parsed
}

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value]
}

export function createProgram(options: CliOptions = {}): Command {
	const io = options.io ?? consoleIO
	const env = options.env ?? process.env
	const createPipeline = options.createPipeline ?? createDefaultPipeline

	return new Command()
		.name('sourcewise')
		.description('Answer a question from a handful of web pages and list the pages the answer used')
		.version('0.1.0')
		.argument('[query]', 'The question to answer', DEFAULT_QUERY)
		.option('-u, --url <url>', 'A page to read; repeat for several (defaults to the built-in list)', collect)
		.option('-k, --top-k <n>', 'How many ranked chunks go into the prompt', parsePositiveInt)
		.option('--dump-context <file>', 'Write the serialized run state to a file')
		.exitOverride()
		.configureOutput({ writeOut: (text) => io.out(text.trimEnd()), writeErr: (text) => io.err(text.trimEnd()) })
		.action(async (query: string, opts: AskOptions) => {
			const config = loadConfig(env)
			const logger = new ConsoleLogger({ level: config.logLevel, stderr: true })
			const pipeline = createPipeline(config, logger, opts.topK ? { reranker: { topK: opts.topK } } : {})

			const { answer, result } = await pipeline.execute(opts.url ?? DEFAULT_URLS, query)

			io.out(answer.text)
			io.out('')
			io.out(chalk.bold('Sources:'))
			for (const line of answer.sources.length > 0 ? answer.sources.map((s) => `- ${s}`) : ['(none)']) {
				io.out(line)
			}

			if (opts.dumpContext) {
				await fs.mkdir(path.dirname(opts.dumpContext), { recursive: true })
				await fs.writeFile(opts.dumpContext, result.serializedContext, 'utf-8')
				logger.info(`Run state written to ${opts.dumpContext}`)
			}
		})
}

/**
 * Parses `argv` (without the node and script entries) and runs the command.
 * @returns The process exit code.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
	const io = options.io ?? consoleIO
	try {
		await createProgram(options).parseAsync(argv, { from: 'user' })
		return 0
	} catch (e) {
		if (e instanceof CommanderError) return e.exitCode
		io.err(chalk.red(`Error: ${toError(e).message}`))
		return 1
	}
}
