/**
 * Fuse Grammar
 *
 * State table for Fuse source. `root` only looks for a shebang; `base` holds
 * the language and stays on the stack for the rest of the file.
 */

import { compileGrammar, defineRules } from './rules'
import type { CompiledGrammar, ComputedAction, GrammarDefinition } from './types'

export type FuseState =
	| 'root'
	| 'base'
	| 'whitespace'
	| 'function_name'
	| 'generic_string'
	| 'generic_escape'
	| 'generic_interpolation'
	| 'gsub'
	| 'gsub_args'
	| 'call_args'
	| 'regex'
	| 'regex_end'
	| 'regex_group'

/**
 * Names the identifier rule treats specially
 */
export type IdentifierNames = {
	builtins: ReadonlySet<string>
	/** Calls whose quoted arguments are lexed as patterns */
	regexCalls: ReadonlySet<string>
}

const { rule, groups, recurse, computed, push, pop, goto, mixin } =
	defineRules<FuseState>()

const IDENT = '[A-Za-z_][A-Za-z0-9_]*'

const ESCAPE =
	/\\(?:\d{1,3}|[nrt\\"'\s]|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/

const keywords = (...words: string[]): RegExp =>
	new RegExp(`(?:${words.join('|')})\\b`)

const classifyIdentifier =
	(names: IdentifierNames): ComputedAction<FuseState> =>
	(match, lex) => {
		const name = match[0]

		if (names.regexCalls.has(name)) {
			lex.token('Name.Builtin')
			lex.push('gsub')
			return
		}

		if (names.builtins.has(name)) {
			lex.token('Name.Builtin')
			return
		}

		// member access: two names around a dot
		const dot = name.indexOf('.')
		if (dot === -1) {
			lex.token('Name')
			return
		}
		lex.token('Name', name.slice(0, dot))
		lex.token('Punctuation', '.')
		lex.token('Name', name.slice(dot + 1))
	}

const openString: ComputedAction<FuseState> = (match, lex) => {
	lex.token('String')
	lex.strings.register({
		prefix: (match[1] ?? '').toLowerCase(),
		delimiter: match[2] ?? '',
	})
	lex.push('generic_string')
}

// Only the quote that opened the innermost string closes it.
const closeString: ComputedAction<FuseState> = (match, lex) => {
	lex.token('String')
	if (lex.strings.isDelimiter(match[0])) {
		lex.strings.remove()
		lex.pop()
	}
}

const openRegex: ComputedAction<FuseState> = (match, lex) => {
	lex.token('String.Regex')
	lex.strings.register({ prefix: '', delimiter: match[0] })
	lex.push('regex')
}

const closeRegex: ComputedAction<FuseState> = (match, lex) => {
	lex.token('String.Regex')
	if (lex.strings.isDelimiter(match[0])) {
		lex.strings.remove()
		lex.goto('regex_end')
	}
}

// Zero-width: leave a character class when the pattern's own quote shows up.
const endGroupAtQuote: ComputedAction<FuseState> = (match, lex) => {
	if (lex.strings.isDelimiter(match[1] ?? '')) lex.pop()
}

export const createFuseGrammarDefinition = (
	names: IdentifierNames
): GrammarDefinition<FuseState> => ({
	initial: 'root',
	recursion: 'base',
	states: {
		root: [
			rule(/#!.*/, 'Comment.Preproc'),
			rule(/(?:)/, null, push('base')),
		],

		base: [
			rule(/--\[(=*)\[[\s\S]*?\]\1\]/, 'Comment.Multiline'),
			rule(/--.*/, 'Comment.Single'),

			rule(
				/(?:\d[\d_]*\.(?!\.)[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d+)?|\d[\d_]*[eE][+-]?\d+/,
				'Number.Float'
			),
			rule(/0[bB][01_]+/, 'Number.Binary'),
			rule(/0[xX][0-9a-fA-F_]+/, 'Number.Hex'),
			rule(/\d[\d_]*/, 'Number.Integer'),

			mixin('whitespace'),

			rule(/\.\.\.|\.\.|==|!=|<=|>=|<<|>>|[?&|!~=+\-*\/%^<>#]/, 'Operator'),
			rule(/[[\]{}().,:;]/, 'Punctuation'),
			rule(keywords('and', 'or', 'not'), 'Operator.Word'),

			rule(
				keywords(
					'break', 'do', 'else', 'elseif', 'end', 'for', 'if', 'in',
					'repeat', 'return', 'then', 'until', 'while'
				),
				'Keyword'
			),
			rule(
				keywords(
					'as', 'enum', 'struct', 'type', 'trait', 'impl', 'union',
					'import', 'from', 'export', 'match', 'when', 'is', 'try',
					'catch', 'finally', 'pub'
				),
				'Keyword'
			),
			rule(keywords('const', 'let', 'static'), 'Keyword.Declaration'),
			rule(keywords('true', 'false', 'nil'), 'Keyword.Constant'),
			rule(keywords('function', 'fn'), 'Keyword', push('function_name')),

			rule(/([uU]?)(['"])/, computed(openString)),
			// raw strings: no escapes, optional # fence on both ends
			rule(/(u?r)(#*)(["'])[\s\S]*?\3\2/, 'String'),

			rule(
				new RegExp(`${IDENT}(?:\\.${IDENT})?`),
				computed(classifyIdentifier(names))
			),
		],

		// line breaks stay separate from other whitespace
		whitespace: [
			rule(/\r\n|[\r\n]/, 'Text'),
			rule(/[^\S\r\n]+/, 'Text'),
		],

		function_name: [
			mixin('whitespace'),
			rule(
				new RegExp(`(?:(${IDENT})(\\.))?(${IDENT})`),
				groups('Name.Class', 'Punctuation', 'Name.Function'),
				pop()
			),
			// inline function "fn(...)", or anything else: let base take it
			rule(/(?:)/, null, pop()),
		],

		generic_escape: [rule(ESCAPE, 'String.Escape')],

		generic_string: [
			mixin('generic_escape'),
			rule(/['"]/, computed(closeString)),
			rule(/\$\{/, 'String.Interpolation', push('generic_interpolation')),
			rule(/[^'"\\$]+/, 'String'),
			rule(/\$/, 'String'),
		],

		generic_interpolation: [
			rule(/[^${}]+/, recurse()),
			rule(/\$\{/, 'String.Interpolation', push('generic_interpolation')),
			rule(/\}/, 'String.Interpolation', pop()),
		],

		gsub: [
			mixin('whitespace'),
			rule(/\(/, 'Punctuation', goto('gsub_args')),
			rule(/(?:)/, null, pop()),
		],

		gsub_args: [
			rule(/\)/, 'Punctuation', pop()),
			// a nested call's arguments are ordinary code
			rule(/\(/, 'Punctuation', push('call_args')),
			rule(/,/, 'Punctuation'),
			mixin('whitespace'),
			rule(/['"]/, computed(openRegex)),
			rule(/[^()'",\s]+/, recurse()),
		],

		call_args: [
			rule(/\)/, 'Punctuation', pop()),
			rule(/\(/, 'Punctuation', push('call_args')),
			mixin('base'),
		],

		regex: [
			rule(/['"]/, computed(closeRegex)),
			rule(/\[\^?/, 'String.Escape', push('regex_group')),
			rule(/\\[\s\S]/, 'String.Escape'),
			rule(/\(\?[:=<!]/, 'String.Escape'),
			rule(/\{[\d,]+\}/, 'String.Escape'),
			rule(/[()?^$|*+.]/, 'String.Escape'),
			rule(/[^'"[\\(){}?^$|*+.]+/, 'String.Regex'),
			rule(/[\s\S]/, 'String.Regex'),
		],

		regex_end: [
			rule(/\$+/, 'String.Regex', pop()),
			rule(/(?:)/, null, pop()),
		],

		regex_group: [
			rule(/(?=(['"]))/, computed(endGroupAtQuote)),
			rule(/\]/, 'String.Escape', pop()),
			rule(/(\\)([\s\S])/, groups('String.Escape', 'String.Regex')),
			rule(/[^\]\\'"]+/, 'String.Regex'),
			rule(/['"]/, 'String.Regex'),
		],
	},
})

export const createFuseGrammar = (
	names: IdentifierNames
): CompiledGrammar<FuseState> =>
	compileGrammar(createFuseGrammarDefinition(names))
