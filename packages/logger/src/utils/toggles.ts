const SEPARATOR = ':'

// Explicit settings only; a tag without one follows its closest parent.
const settings = new Map<string, boolean>()

/**
 * Trim each segment of a "lexer:engine" style tag. Throws on empty segments.
 */
const normalizeTag = (tag: string): string => {
	const segments = tag.split(SEPARATOR).map(segment => segment.trim())
	if (segments.some(segment => segment.length === 0)) {
		throw new Error(`Invalid logger tag "${tag}".`)
	}
	return segments.join(SEPARATOR)
}

const isLoggerEnabled = (tag: string): boolean => {
	const segments = normalizeTag(tag).split(SEPARATOR)
	for (let length = segments.length; length > 0; length--) {
		const setting = settings.get(segments.slice(0, length).join(SEPARATOR))
		if (setting !== undefined) return setting
	}
	return true
}

/**
 * Turn a tag and every child without its own setting on or off
 */
const setLoggerEnabled = (tag: string, enabled: boolean): void => {
	settings.set(normalizeTag(tag), enabled)
}

const resetLoggerToggles = (): void => {
	settings.clear()
}

export { isLoggerEnabled, normalizeTag, resetLoggerToggles, setLoggerEnabled }
