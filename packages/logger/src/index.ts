export { createLogger, loggers } from './utils/loggers'
export type { Logger, LoggerName } from './utils/loggers'

export {
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './utils/toggles'
