import { consola, type ConsolaInstance } from './consola'
import { isLoggerEnabled, normalizeTag } from './toggles'

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error'

type LogFn = (message: unknown, ...args: unknown[]) => void

export type Logger = Readonly<Record<LogMethod, LogFn>> & {
	readonly tag: string
	/** Underlying consola instance, for reporters and level changes */
	readonly instance: ConsolaInstance
	/** Child logger under "<tag>:<child>" */
	withTag(child: string): Logger
}

const instances = new Map<string, Logger>()

const gate =
	(raw: ConsolaInstance, tag: string, method: LogMethod): LogFn =>
	(message, ...args) => {
		if (isLoggerEnabled(tag)) raw[method](message, ...args)
	}

/**
 * Logger for `tag`; the same tag always returns the same instance
 */
export const createLogger = (tag: string): Logger => {
	const normalized = normalizeTag(tag)
	const existing = instances.get(normalized)
	if (existing) return existing

	const raw = consola.withTag(normalized)
	const logger: Logger = {
		tag: normalized,
		instance: raw,
		trace: gate(raw, normalized, 'trace'),
		debug: gate(raw, normalized, 'debug'),
		info: gate(raw, normalized, 'info'),
		warn: gate(raw, normalized, 'warn'),
		error: gate(raw, normalized, 'error'),
		withTag: child => createLogger(`${normalized}:${child}`),
	}
	instances.set(normalized, logger)
	return logger
}

export const loggers = Object.freeze({
	app: createLogger('app'),
	lexer: createLogger('lexer'),
})

export type LoggerName = keyof typeof loggers
