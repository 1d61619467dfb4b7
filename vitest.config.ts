import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			{
				extends: true,
				test: {
					name: 'lexer',
					include: ['packages/lexer/src/**/*.test.ts'],
					environment: 'node',
				},
			},
			{
				extends: true,
				test: {
					name: 'logger',
					include: ['packages/logger/src/**/*.test.ts'],
					environment: 'node',
				},
			},
		],
	},
})
