const SHEBANG = /^\s*#!(.*)/

/**
 * Whether `text` opens with a shebang that runs `fuse`
 * ("#!/usr/bin/env fuse", "#!/opt/bin/fuse --strict").
 */
export const detectFuse = (text: string): boolean => {
	const shebang = SHEBANG.exec(text)
	if (!shebang) return false
	return /\bfuse(?:\s|$)/.test(shebang[1] ?? '')
}
