import {
	createConsola,
	type ConsolaInstance,
	type ConsolaOptions,
} from 'consola'
import { loggerEnv } from '../env'

// Bundler resolution picks consola's browser typings, which leave out the
// node reporter's `fancy` flag.
const consola = createConsola({
	fancy: true,
} as Partial<ConsolaOptions> & { fancy: boolean })

consola.level = loggerEnv.loggerLevel ?? (loggerEnv.isDev ? 4 : 3)

export { consola }
export type { ConsolaInstance }
