import { describe, test, expect, afterEach } from 'vitest'
import {
	isLoggerEnabled,
	normalizeTag,
	resetLoggerToggles,
	setLoggerEnabled,
} from './toggles'

describe('logger toggles', () => {
	afterEach(() => {
		resetLoggerToggles()
	})

	test('every tag starts enabled', () => {
		expect(isLoggerEnabled('lexer')).toBe(true)
		expect(isLoggerEnabled('lexer:engine')).toBe(true)
	})

	test('children follow the parent setting', () => {
		setLoggerEnabled('lexer', false)

		expect(isLoggerEnabled('lexer:engine')).toBe(false)
		expect(isLoggerEnabled('lexer:engine:deep')).toBe(false)
		expect(isLoggerEnabled('app')).toBe(true)
	})

	test('a child setting wins over its parent', () => {
		setLoggerEnabled('lexer', false)
		setLoggerEnabled('lexer:engine', true)

		expect(isLoggerEnabled('lexer:engine')).toBe(true)
		expect(isLoggerEnabled('lexer:other')).toBe(false)
	})

	test('tags are compared after trimming', () => {
		setLoggerEnabled(' lexer : engine ', false)

		expect(isLoggerEnabled('lexer:engine')).toBe(false)
		expect(isLoggerEnabled('lexer')).toBe(true)
	})

	test('reset drops every setting', () => {
		setLoggerEnabled('app', false)
		resetLoggerToggles()

		expect(isLoggerEnabled('app')).toBe(true)
	})

	test('rejects empty segments', () => {
		expect(normalizeTag(' lexer ')).toBe('lexer')
		expect(() => normalizeTag('  ')).toThrow('Invalid logger tag "  ".')
		expect(() => setLoggerEnabled('lexer::engine', false)).toThrow(
			'Invalid logger tag "lexer::engine".'
		)
	})
})
