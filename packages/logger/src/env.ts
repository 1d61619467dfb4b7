import { z } from 'zod'

const parseLevel = (value: unknown): number | undefined => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number.parseInt(value, 10)
		return Number.isNaN(parsed) ? undefined : parsed
	}
	return undefined
}

const envSchema = z.object({
	LOGGER_LEVEL: z
		.preprocess(parseLevel, z.number().int().min(0).max(5))
		.optional(),
	NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
})

const parsedEnv = envSchema.safeParse(process.env)
if (!parsedEnv.success) {
	throw new Error(z.prettifyError(parsedEnv.error))
}

const nodeEnv = parsedEnv.data.NODE_ENV ?? 'development'

export const loggerEnv = {
	nodeEnv,
	isDev: nodeEnv === 'development',
	loggerLevel: parsedEnv.data.LOGGER_LEVEL,
}

export type LoggerEnv = typeof loggerEnv
