/**
 * Core Driver
 *
 * Runs a compiled grammar over an input string and yields tokens lazily.
 * The state stack and string register are the only mutable state and live
 * for one run.
 */

import { loggers } from '@fuse/logger'
import { MAX_EMPTY_STEPS } from './consts'
import { StateStack } from './stateStack'
import { StringRegister } from './stringRegister'
import type {
	CompiledGrammar,
	CompiledRule,
	LexContext,
	Token,
	TokenCategory,
	TokenizeOptions,
} from './types'

const log = loggers.lexer.withTag('engine')

type Emission =
	| { kind: 'token'; category: TokenCategory; length: number }
	| { kind: 'recurse'; length: number }

/**
 * Tokenize `input` with `grammar`.
 *
 * Every character ends up in exactly one token: input no rule accepts becomes
 * one `Error` token per code point, and unterminated constructs simply run
 * to the end of the input.
 */
export function* tokenizeWith<S extends string>(
	grammar: CompiledGrammar<S>,
	input: string,
	options: TokenizeOptions<S> = {}
): Generator<Token, void, undefined> {
	const stack = new StateStack<S>(options.state ?? grammar.initial)
	const strings = new StringRegister()
	const offset = options.offset ?? 0
	const emissions: Emission[] = []
	let matchText = ''

	const context: LexContext<S> = {
		strings,
		token(category, text = matchText) {
			emissions.push({ kind: 'token', category, length: text.length })
		},
		recurse(text) {
			emissions.push({ kind: 'recurse', length: text.length })
		},
		push: state => stack.push(state),
		pop: () => stack.pop(),
		goto: state => stack.goto(state),
	}

	const apply = (rule: CompiledRule<S>, match: RegExpExecArray) => {
		matchText = match[0]
		const { action, next } = rule

		if (action) {
			switch (action.kind) {
				case 'token':
					context.token(action.category)
					break
				case 'groups':
					action.categories.forEach((category, index) => {
						const group = match[index + 1]
						if (group) context.token(category, group)
					})
					break
				case 'recurse':
					context.recurse(matchText)
					break
				case 'computed':
					action.run(match, context)
					break
			}
		}

		if (next) {
			switch (next.kind) {
				case 'push':
					stack.push(next.state)
					break
				case 'pop':
					stack.pop()
					break
				case 'goto':
					stack.goto(next.state)
					break
			}
		}
	}

	// Turn the step's emissions into tokens over input[start, end).
	function* flush(start: number, end: number): Generator<Token, void, undefined> {
		let cursor = start
		for (const emission of emissions.splice(0)) {
			const stop = Math.min(end, cursor + emission.length)
			if (stop <= cursor) continue

			if (emission.kind === 'recurse') {
				yield* tokenizeWith(grammar, input.slice(cursor, stop), {
					state: grammar.recursion,
					offset: offset + cursor,
				})
			} else {
				yield createToken(emission.category, input, cursor, stop, offset)
			}
			cursor = stop
		}

		if (cursor < end) {
			log.warn(
				`Rule in state "${stack.current}" left ${end - cursor} matched character(s) unclaimed at ${offset + cursor}`
			)
			yield createToken('Error', input, cursor, end, offset)
		}
	}

	let position = 0
	let emptySteps = 0

	while (position < input.length) {
		const rules = grammar.states.get(stack.current) ?? []
		let matchedLength = -1

		for (const rule of rules) {
			rule.pattern.lastIndex = position
			const match = rule.pattern.exec(input)
			if (!match) continue

			const version = stack.version
			apply(rule, match)

			// A zero-length match only counts if it moved the stack.
			if (match[0].length === 0 && stack.version === version) {
				emissions.length = 0
				continue
			}

			matchedLength = match[0].length
			break
		}

		if (matchedLength > 0) {
			emptySteps = 0
			yield* flush(position, position + matchedLength)
			position += matchedLength
			continue
		}

		if (matchedLength === 0) {
			emissions.length = 0
			emptySteps++
			if (emptySteps <= MAX_EMPTY_STEPS) continue
			log.warn(
				`${emptySteps} zero-length steps in a row at ${offset + position} (state "${stack.current}"); skipping one character`
			)
		} else {
			log.trace(
				`Unrecognized input at ${offset + position} in state "${stack.current}"`
			)
		}

		emptySteps = 0
		const width = codePointWidth(input, position)
		yield createToken('Error', input, position, position + width, offset)
		position += width
	}
}

const createToken = (
	category: TokenCategory,
	input: string,
	start: number,
	end: number,
	offset: number
): Token => ({
	category,
	text: input.slice(start, end),
	start: offset + start,
	end: offset + end,
})

const codePointWidth = (input: string, index: number): number => {
	const codePoint = input.codePointAt(index)
	return codePoint !== undefined && codePoint > 0xffff ? 2 : 1
}
