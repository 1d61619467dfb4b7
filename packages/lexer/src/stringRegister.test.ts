import { describe, test, expect } from 'vitest'
import { StringRegister } from './stringRegister'

describe('StringRegister', () => {
	test('only the innermost delimiter matches', () => {
		const register = new StringRegister()
		register.register({ prefix: '', delimiter: '"' })
		register.register({ prefix: 'u', delimiter: "'" })

		expect(register.depth).toBe(2)
		expect(register.isDelimiter("'")).toBe(true)
		expect(register.isDelimiter('"')).toBe(false)
		expect(register.top).toEqual({ prefix: 'u', delimiter: "'" })
	})

	test('remove pops the innermost context', () => {
		const register = new StringRegister()
		register.register({ prefix: '', delimiter: '"' })
		register.register({ prefix: '', delimiter: "'" })

		expect(register.remove()).toEqual({ prefix: '', delimiter: "'" })
		expect(register.isDelimiter('"')).toBe(true)
	})

	test('an empty register matches nothing and removes nothing', () => {
		const register = new StringRegister()
		expect(register.isDelimiter('"')).toBe(false)
		expect(register.remove()).toBeUndefined()
		expect(register.depth).toBe(0)
	})
})
