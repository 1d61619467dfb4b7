import { describe, test, expect } from 'vitest'
import { StateStack } from './stateStack'

describe('StateStack', () => {
	test('starts with a single frame', () => {
		const stack = new StateStack('root')
		expect(stack.current).toBe('root')
		expect(stack.depth).toBe(1)
		expect(stack.version).toBe(0)
	})

	test('push, goto and pop move the top', () => {
		const stack = new StateStack<'root' | 'base' | 'string'>('root')
		stack.push('base')
		stack.push('string')
		expect(stack.toArray()).toEqual(['root', 'base', 'string'])

		stack.goto('base')
		expect(stack.toArray()).toEqual(['root', 'base', 'base'])

		expect(stack.pop()).toBe(true)
		expect(stack.current).toBe('base')
		expect(stack.version).toBe(4)
	})

	test('refuses to pop the last frame', () => {
		const stack = new StateStack('root')
		expect(stack.pop()).toBe(false)
		expect(stack.current).toBe('root')
		expect(stack.version).toBe(0)
	})

	test('toArray returns a copy', () => {
		const stack = new StateStack('root')
		const frames = stack.toArray()
		stack.push('root')
		expect(frames).toEqual(['root'])
	})
})
