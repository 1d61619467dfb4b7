/**
 * Lexer Constants
 */

import builtinNames from './data/builtins.json'

export const TOKEN_CATEGORIES = [
	'Text',
	'Error',
	'Comment',
	'Comment.Single',
	'Comment.Multiline',
	'Comment.Preproc',
	'Keyword',
	'Keyword.Declaration',
	'Keyword.Constant',
	'Operator',
	'Operator.Word',
	'Punctuation',
	'Number.Integer',
	'Number.Float',
	'Number.Hex',
	'Number.Binary',
	'String',
	'String.Escape',
	'String.Interpolation',
	'String.Regex',
	'Name',
	'Name.Builtin',
	'Name.Class',
	'Name.Function',
] as const

// Consecutive zero-length steps allowed before the driver forces progress
export const MAX_EMPTY_STEPS = 32

// Built-in names, before option filtering
export const DEFAULT_BUILTINS: ReadonlySet<string> = new Set(builtinNames)

// Calls whose string arguments are lexed as patterns
export const REGEX_CALL_NAMES: readonly string[] = ['gsub']
