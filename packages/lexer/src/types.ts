/**
 * Lexer Types
 */

import type { TOKEN_CATEGORIES } from './consts'
import type { StringRegister } from './stringRegister'

/**
 * Token classification, dotted from general to specific ("Number.Hex")
 */
export type TokenCategory = (typeof TOKEN_CATEGORIES)[number]

/**
 * Lexer token output. `text` is always `input.slice(start, end)`.
 */
export type Token = {
	category: TokenCategory
	text: string
	start: number
	end: number
}

/**
 * What a rule does with its match
 */
export type RuleAction<S extends string> =
	| { kind: 'token'; category: TokenCategory }
	/** One category per capture group, in order; the groups must cover the match. */
	| { kind: 'groups'; categories: readonly TokenCategory[] }
	/** Re-tokenize the match with the grammar's recursion state. */
	| { kind: 'recurse' }
	| { kind: 'computed'; run: ComputedAction<S> }

export type StateTransition<S extends string> =
	| { kind: 'push'; state: S }
	| { kind: 'pop' }
	| { kind: 'goto'; state: S }

export type Rule<S extends string> = {
	kind: 'rule'
	pattern: RegExp
	action: RuleAction<S> | null
	next?: StateTransition<S>
}

/**
 * Splices another state's rules in place
 */
export type Mixin<S extends string> = {
	kind: 'mixin'
	state: S
}

export type RuleEntry<S extends string> = Rule<S> | Mixin<S>

export type GrammarDefinition<S extends string> = {
	states: { readonly [K in S]: readonly RuleEntry<S>[] }
	/** State at the bottom of the stack for a fresh run */
	initial: S
	/** State a `recurse` action starts its nested run in */
	recursion: S
}

export type CompiledRule<S extends string> = {
	/** Sticky copy of the authored pattern */
	pattern: RegExp
	action: RuleAction<S> | null
	next?: StateTransition<S>
}

export type CompiledGrammar<S extends string> = {
	states: ReadonlyMap<S, readonly CompiledRule<S>[]>
	initial: S
	recursion: S
}

/**
 * Handle given to computed actions for the duration of one match.
 *
 * Emitted texts claim the match left to right; `token` without a text claims
 * the whole match.
 */
export interface LexContext<S extends string> {
	readonly strings: StringRegister
	token(category: TokenCategory, text?: string): void
	recurse(text: string): void
	push(state: S): void
	pop(): boolean
	goto(state: S): void
}

export type ComputedAction<S extends string> = (
	match: RegExpExecArray,
	context: LexContext<S>
) => void

export type TokenizeOptions<S extends string> = {
	/** State to seed the stack with; defaults to the grammar's initial state */
	state?: S
	/** Added to every token offset, for nested runs over a slice */
	offset?: number
}
