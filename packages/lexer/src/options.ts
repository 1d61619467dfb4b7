import { z } from 'zod'
import { DEFAULT_BUILTINS, REGEX_CALL_NAMES } from './consts'
import type { IdentifierNames } from './fuseGrammar'

export const lexerOptionsSchema = z.object({
	/** Classify built-in function names as `Name.Builtin` */
	functionHighlighting: z.boolean().default(true),
	/** Built-in names to treat as plain names */
	disabledModules: z.array(z.string().trim().min(1)).default([]),
})

export type LexerOptionsInput = z.input<typeof lexerOptionsSchema>
export type LexerOptions = z.output<typeof lexerOptionsSchema>

export const parseLexerOptions = (input: unknown = {}): LexerOptions => {
	const parsed = lexerOptionsSchema.safeParse(input)
	if (!parsed.success) {
		throw new Error(
			`Invalid lexer options:\n${z.prettifyError(parsed.error)}`
		)
	}
	return parsed.data
}

/**
 * Effective builtin and pattern-call names after applying the options
 */
export const resolveIdentifierNames = (
	options: LexerOptions
): IdentifierNames => {
	if (!options.functionHighlighting) {
		return { builtins: new Set(), regexCalls: new Set() }
	}

	const disabled = new Set(options.disabledModules)
	const enabled = (name: string) => !disabled.has(name)

	return {
		builtins: new Set([...DEFAULT_BUILTINS].filter(enabled)),
		regexCalls: new Set(REGEX_CALL_NAMES.filter(enabled)),
	}
}
