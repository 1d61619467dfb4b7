/**
 * @fuse/lexer
 *
 * Stateful regex lexer for Fuse source, for highlighting and tooling.
 */

// Main class export
export { Lexer, type HighlightSegment } from './lexer'

// Type exports
export type {
	Token,
	TokenCategory,
	Rule,
	RuleAction,
	RuleEntry,
	Mixin,
	StateTransition,
	GrammarDefinition,
	CompiledGrammar,
	CompiledRule,
	ComputedAction,
	LexContext,
	TokenizeOptions,
} from './types'

export { TOKEN_CATEGORIES, DEFAULT_BUILTINS, REGEX_CALL_NAMES } from './consts'

// Engine exports (for custom grammars)
export { tokenizeWith } from './engine'
export { compileGrammar, defineRules } from './rules'
export { StateStack } from './stateStack'
export { StringRegister, type StringContext } from './stringRegister'

// Fuse grammar and configuration
export {
	createFuseGrammar,
	createFuseGrammarDefinition,
	type FuseState,
	type IdentifierNames,
} from './fuseGrammar'
export {
	lexerOptionsSchema,
	parseLexerOptions,
	resolveIdentifierNames,
	type LexerOptions,
	type LexerOptionsInput,
} from './options'

// Host integration
export { detectFuse } from './detect'
export { fuseMetadata, matchesFuseFilename, type LexerMetadata } from './metadata'

export { isCategoryWithin, isLineBreak, mergeTokens } from './utils'
