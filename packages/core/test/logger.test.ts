import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConsoleLogger, isLogLevel, NullLogger } from '../src/logger'

describe('Loggers', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('should prefix messages with their level', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		new ConsoleLogger().info('hello')
		expect(info).toHaveBeenCalledWith('[INFO] hello')
	})

	it('should pass metadata only when there is some', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		const logger = new ConsoleLogger()
		logger.warn('with', { nodeId: 'a' })
		logger.warn('without', {})
		expect(warn).toHaveBeenNthCalledWith(1, '[WARN] with', { nodeId: 'a' })
		expect(warn).toHaveBeenNthCalledWith(2, '[WARN] without')
	})

	it('should drop messages below the minimum level', () => {
		const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = new ConsoleLogger({ level: 'error' })
		logger.debug('quiet')
		logger.error('loud')
		expect(debug).not.toHaveBeenCalled()
		expect(error).toHaveBeenCalledWith('[ERROR] loud')
	})

	it('should send every level to stderr when asked', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = new ConsoleLogger({ stderr: true })
		logger.info('started', { executionId: 'x' })
		logger.warn('careful')
		expect(info).not.toHaveBeenCalled()
		expect(error).toHaveBeenNthCalledWith(1, '[INFO] started', { executionId: 'x' })
		expect(error).toHaveBeenNthCalledWith(2, '[WARN] careful')
	})

	it('should log nothing with the NullLogger', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {})
		new NullLogger().info('nothing')
		expect(info).not.toHaveBeenCalled()
	})

	it('should recognize level names', () => {
		expect(isLogLevel('warn')).toBe(true)
		expect(isLogLevel('verbose')).toBe(false)
	})
})
