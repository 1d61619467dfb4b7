/**
 * Stack of active lexer states. Never empty: popping the last frame is refused.
 */
export class StateStack<S extends string> {
	private readonly frames: S[]
	private mutations = 0

	constructor(initial: S) {
		this.frames = [initial]
	}

	get current(): S {
		return this.frames[this.frames.length - 1]
	}

	get depth(): number {
		return this.frames.length
	}

	/**
	 * Bumped on every change, so the driver can tell whether a
	 * zero-length match moved the lexer anywhere.
	 */
	get version(): number {
		return this.mutations
	}

	push(state: S): void {
		this.frames.push(state)
		this.mutations++
	}

	pop(): boolean {
		if (this.frames.length <= 1) return false
		this.frames.pop()
		this.mutations++
		return true
	}

	goto(state: S): void {
		this.frames[this.frames.length - 1] = state
		this.mutations++
	}

	toArray(): readonly S[] {
		return [...this.frames]
	}
}
