import { describe, test, expect } from 'vitest'
import { isCategoryWithin, isLineBreak, mergeTokens } from './utils'
import type { Token, TokenCategory } from './types'

const tokensOf = (...parts: [TokenCategory, string][]): Token[] => {
	let offset = 0
	return parts.map(([category, text]) => {
		const token = { category, text, start: offset, end: offset + text.length }
		offset = token.end
		return token
	})
}

describe('isCategoryWithin', () => {
	test('matches the category and its children', () => {
		expect(isCategoryWithin('Comment', 'Comment')).toBe(true)
		expect(isCategoryWithin('Comment.Single', 'Comment')).toBe(true)
		expect(isCategoryWithin('Name.Builtin', 'Name')).toBe(true)
	})

	test('does not match siblings or prefixes of words', () => {
		expect(isCategoryWithin('Comment.Single', 'Comment.Multiline')).toBe(false)
		expect(isCategoryWithin('Keyword', 'Key')).toBe(false)
		expect(isCategoryWithin('Name', 'Name.Builtin')).toBe(false)
	})
})

describe('isLineBreak', () => {
	test.each([
		['\n', true],
		['\r\n', true],
		['\r', true],
		[' ', false],
		['\n\n', false],
	])('%j -> %s', (text, expected) => {
		expect(isLineBreak(text)).toBe(expected)
	})
})

describe('mergeTokens', () => {
	test('joins runs of the same category', () => {
		const merged = Array.from(
			mergeTokens(
				tokensOf(['String', '"'], ['String', 'ab'], ['String', '"'], ['Text', ' '])
			)
		)
		expect(merged).toEqual([
			{ category: 'String', text: '"ab"', start: 0, end: 4 },
			{ category: 'Text', text: ' ', start: 4, end: 5 },
		])
	})

	test('keeps Error tokens and line breaks apart', () => {
		const merged = Array.from(
			mergeTokens(
				tokensOf(
					['Error', '`'],
					['Error', '`'],
					['Text', ' '],
					['Text', '\n'],
					['Text', ' '],
					['Text', ' ']
				)
			)
		).map(token => token.text)
		expect(merged).toEqual(['`', '`', ' ', '\n', '  '])
	})

	test('does not join tokens with a gap between them', () => {
		const merged = Array.from(
			mergeTokens([
				{ category: 'Name', text: 'a', start: 0, end: 1 },
				{ category: 'Name', text: 'b', start: 2, end: 3 },
			])
		)
		expect(merged).toHaveLength(2)
	})

	test('yields nothing for nothing', () => {
		expect(Array.from(mergeTokens([]))).toEqual([])
	})
})
