import type { LogLevel } from '@sourcewise/core'
import { ConfigurationError, isLogLevel, LOG_LEVELS } from '@sourcewise/core'

export const DEFAULT_GENERATOR_BASE_URL = 'https://api.groq.com/openai/v1'

export interface RagConfig {
	cohereApiKey: string
	groqApiKey: string
	generatorBaseUrl: string
	logLevel: LogLevel
}

/**
 * Reads the settings from the environment. Missing credentials are reported
 * together, before anything touches the network.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
	const cohereApiKey = env.COHERE_API_KEY?.trim() ?? ''
	const groqApiKey = env.GROQ_API_KEY?.trim() ?? ''

	const missing = [
		...(cohereApiKey ? [] : ['COHERE_API_KEY']),
		...(groqApiKey ? [] : ['GROQ_API_KEY']),
	]
	if (missing.length > 0) {
		throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}.`)
	}

	const generatorBaseUrl = env.GENERATOR_BASE_URL?.trim() || DEFAULT_GENERATOR_BASE_URL
	if (!URL.canParse(generatorBaseUrl)) {
		throw new ConfigurationError(`GENERATOR_BASE_URL is not a valid URL: '${generatorBaseUrl}'.`)
	}

	const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info'
	if (!isLogLevel(logLevel)) {
		throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'.`)
	}

	return { cohereApiKey, groqApiKey, generatorBaseUrl, logLevel }
}
