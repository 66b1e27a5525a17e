import type { Token } from '../core/tokens';
import { normalizedKeyword } from './util';

/*
	Breakstack: every nested parser receives the predicates of all its ancestors plus
	its own. A token that would end any enclosing group also ends the innermost one,
	which is how a keyword's value list stops exactly where the next sibling keyword
	of the enclosing command starts.
*/
export type Breaker =
	| { kind: 'keyword'; words: ReadonlySet<string> }
	| { kind: 'paren' };

export type Breakstack = readonly Breaker[];

export const PAREN_BREAKER: Breaker = { kind: 'paren' };

export function keywordBreaker(words: Iterable<string>): Breaker {
	const set = new Set<string>();
	for (const w of words) set.add(w.toUpperCase());
	return { kind: 'keyword', words: set };
}

export function breakerMatches(b: Breaker, t: Token): boolean {
	if (b.kind === 'paren') return t.kind === 'rparen';
	const word = normalizedKeyword(t);
	return word !== null && b.words.has(word);
}

export function shouldBreak(t: Token | undefined, stack: Breakstack): boolean {
	if (!t) return false;
	for (let i = stack.length - 1; i >= 0; i--) {
		const b = stack[i];
		if (b && breakerMatches(b, t)) return true;
	}
	return false;
}
