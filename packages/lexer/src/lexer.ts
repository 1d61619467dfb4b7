/**
 * Fuse Lexer
 *
 * Public entry around the engine: validates options, builds the grammar for
 * the effective builtin names, and hands out token streams.
 */

import { loggers } from '@fuse/logger'
import { detectFuse } from './detect'
import { tokenizeWith } from './engine'
import { createFuseGrammar, type FuseState } from './fuseGrammar'
import { fuseMetadata } from './metadata'
import {
	parseLexerOptions,
	resolveIdentifierNames,
	type LexerOptions,
	type LexerOptionsInput,
} from './options'
import type { CompiledGrammar, Token, TokenCategory } from './types'

const log = loggers.lexer

/**
 * Highlight segment for rendering
 */
export type HighlightSegment = {
	start: number
	end: number
	className: string
	category: TokenCategory
}

export class Lexer {
	static readonly metadata = fuseMetadata

	readonly options: LexerOptions
	private readonly grammar: CompiledGrammar<FuseState>

	private constructor(options: LexerOptions) {
		const names = resolveIdentifierNames(options)
		log.debug(
			`Fuse lexer: ${names.builtins.size} builtins, regex calls [${[...names.regexCalls].join(', ')}]`
		)
		this.options = options
		this.grammar = createFuseGrammar(names)
	}

	/**
	 * Create a lexer. Throws if the options do not validate.
	 */
	static create(options: LexerOptionsInput = {}): Lexer {
		return new Lexer(parseLexerOptions(options))
	}

	/**
	 * Whether a text sample looks like Fuse source
	 */
	static detect(text: string): boolean {
		return detectFuse(text)
	}

	/**
	 * Lazily tokenize a whole document. Stopping early is fine; the run holds
	 * nothing beyond its own stacks.
	 */
	tokenize(input: string): Generator<Token, void, undefined> {
		return tokenizeWith(this.grammar, input)
	}

	tokenizeAll(input: string): Token[] {
		return Array.from(this.tokenize(input))
	}

	/**
	 * Convert tokens to HighlightSegment format, dropping categories
	 * `getClass` has no class for
	 */
	tokensToSegments(
		tokens: Iterable<Token>,
		getClass: (category: TokenCategory) => string | undefined
	): HighlightSegment[] {
		const segments: HighlightSegment[] = []
		for (const token of tokens) {
			const className = getClass(token.category)
			if (className) {
				segments.push({
					start: token.start,
					end: token.end,
					className,
					category: token.category,
				})
			}
		}
		return segments
	}
}
