export type StringContext = {
	/** Lowercased prefix flags written before the quote, e.g. "u" */
	prefix: string
	delimiter: string
}

/**
 * Records which quote opened each string still open, so only the
 * innermost string's own quote can close it.
 */
export class StringRegister {
	private readonly entries: StringContext[] = []

	get depth(): number {
		return this.entries.length
	}

	get top(): StringContext | undefined {
		return this.entries[this.entries.length - 1]
	}

	register(context: StringContext): void {
		this.entries.push({ ...context })
	}

	remove(): StringContext | undefined {
		return this.entries.pop()
	}

	isDelimiter(delimiter: string): boolean {
		return this.top?.delimiter === delimiter
	}
}
