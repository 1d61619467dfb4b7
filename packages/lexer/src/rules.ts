/**
 * Grammar Definition Helpers
 *
 * Builders for rule tables and the one-time compile step that flattens
 * mixins and makes every pattern sticky.
 */

import type {
	CompiledGrammar,
	CompiledRule,
	ComputedAction,
	GrammarDefinition,
	Mixin,
	Rule,
	RuleAction,
	StateTransition,
	TokenCategory,
} from './types'

/**
 * Rule builders bound to one grammar's state names
 */
export const defineRules = <S extends string>() => ({
	rule: (
		pattern: RegExp,
		action: RuleAction<S> | TokenCategory | null,
		next?: StateTransition<S>
	): Rule<S> => ({
		kind: 'rule',
		pattern,
		action: typeof action === 'string' ? { kind: 'token', category: action } : action,
		next,
	}),
	groups: (...categories: TokenCategory[]): RuleAction<S> => ({
		kind: 'groups',
		categories,
	}),
	recurse: (): RuleAction<S> => ({ kind: 'recurse' }),
	computed: (run: ComputedAction<S>): RuleAction<S> => ({ kind: 'computed', run }),
	push: (state: S): StateTransition<S> => ({ kind: 'push', state }),
	pop: (): StateTransition<S> => ({ kind: 'pop' }),
	goto: (state: S): StateTransition<S> => ({ kind: 'goto', state }),
	mixin: (state: S): Mixin<S> => ({ kind: 'mixin', state }),
})

const toSticky = (pattern: RegExp): RegExp =>
	new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'y')

/**
 * Flatten mixins and compile patterns. Throws on mixin cycles and on
 * transitions to states the grammar does not declare.
 */
export const compileGrammar = <S extends string>(
	definition: GrammarDefinition<S>
): CompiledGrammar<S> => {
	const states = new Map<S, readonly CompiledRule<S>[]>()

	const hasState = (name: string): name is S =>
		Object.prototype.hasOwnProperty.call(definition.states, name)

	const resolve = (name: S, trail: readonly S[]): CompiledRule<S>[] => {
		if (trail.includes(name)) {
			throw new Error(
				`Grammar mixin cycle: ${[...trail, name].join(' -> ')}`
			)
		}
		if (!hasState(name)) {
			throw new Error(`Grammar references unknown state "${name}".`)
		}

		const compiled: CompiledRule<S>[] = []
		for (const entry of definition.states[name]) {
			if (entry.kind === 'mixin') {
				compiled.push(...resolve(entry.state, [...trail, name]))
				continue
			}
			if (entry.next && entry.next.kind !== 'pop' && !hasState(entry.next.state)) {
				throw new Error(
					`State "${name}" transitions to unknown state "${entry.next.state}".`
				)
			}
			compiled.push({
				pattern: toSticky(entry.pattern),
				action: entry.action,
				next: entry.next,
			})
		}
		return compiled
	}

	for (const name of Object.keys(definition.states)) {
		if (hasState(name)) states.set(name, resolve(name, []))
	}

	for (const name of [definition.initial, definition.recursion]) {
		if (!states.has(name)) {
			throw new Error(`Grammar references unknown state "${name}".`)
		}
	}

	return {
		states,
		initial: definition.initial,
		recursion: definition.recursion,
	}
}
