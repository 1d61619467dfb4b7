/**
 * Registry fields a host uses to offer this lexer
 */
export const fuseMetadata = {
	title: 'Fuse',
	description: 'Fuse (https://fuse-lang.github.io)',
	tag: 'fuse',
	filenames: ['*.fuse', '*.fu'],
	mimetypes: ['text/x-fuse', 'application/x-fuse'],
} as const

export type LexerMetadata = typeof fuseMetadata

export const matchesFuseFilename = (path: string): boolean => {
	const baseName = path.split(/[\\/]/).pop() ?? ''
	return fuseMetadata.filenames.some(pattern =>
		baseName.endsWith(pattern.slice(1))
	)
}
