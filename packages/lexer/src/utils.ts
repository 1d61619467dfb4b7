/**
 * Lexer Utility Functions
 */

import type { Token, TokenCategory } from './types'

/**
 * Check if a category is `parent` or one of its subcategories
 */
export const isCategoryWithin = (
	category: TokenCategory,
	parent: string
): boolean => category === parent || category.startsWith(`${parent}.`)

export const isLineBreak = (text: string): boolean =>
	text === '\n' || text === '\r\n' || text === '\r'

/**
 * Join adjacent tokens of the same category. Error tokens and line breaks
 * stay separate.
 */
export function* mergeTokens(
	tokens: Iterable<Token>
): Generator<Token, void, undefined> {
	let pending: Token | undefined

	for (const token of tokens) {
		const canMerge =
			pending !== undefined &&
			pending.category === token.category &&
			pending.end === token.start &&
			token.category !== 'Error' &&
			!isLineBreak(pending.text) &&
			!isLineBreak(token.text)

		if (pending && canMerge) {
			pending = {
				...pending,
				text: pending.text + token.text,
				end: token.end,
			}
			continue
		}

		if (pending) yield pending
		pending = token
	}

	if (pending) yield pending
}
