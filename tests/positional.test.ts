import { describe, it, expect } from 'vitest';
import { PAREN_BREAKER, keywordBreaker } from '../src/parse/breakers';
import { parsePositionalGroup } from '../src/parse/args';
import { reconstruct, semanticTokensOf } from '../src/cst/utils';
import { ctxFor, kindsOf, nodesOf, spellings, streamOf } from './testUtils';

describe('positional group', () => {
	it('stops once an exact count is reached', () => {
		const stream = streamOf('a b c');
		const group = parsePositionalGroup(ctxFor(), stream, 2, [], []);
		expect(reconstruct(group)).toBe('a b');
		expect(kindsOf(group)).toEqual(['ARGUMENT', 'ARGUMENT']);
		expect(stream.peek()?.kind).toBe('whitespace');
		expect(stream.remaining).toBe(2);
	});

	it('takes a single value for zero-or-one', () => {
		const stream = streamOf('a b');
		const group = parsePositionalGroup(ctxFor(), stream, '?', [], []);
		expect(spellings(semanticTokensOf(group))).toEqual(['a']);
	});

	it('stops at a keyword of an enclosing parser', () => {
		const stream = streamOf('a b FOO c');
		const group = parsePositionalGroup(ctxFor(), stream, '+', [], [keywordBreaker(['FOO'])]);
		expect(reconstruct(group)).toBe('a b ');
		expect(stream.peek()?.spelling).toBe('FOO');
	});

	it('consumes a keyword spelling as a value when the count is exact', () => {
		const stream = streamOf('runtime)');
		const group = parsePositionalGroup(ctxFor(), stream, 1, [], [PAREN_BREAKER, keywordBreaker(['RUNTIME'])]);
		expect(spellings(semanticTokensOf(group))).toEqual(['runtime']);
		expect(stream.peek()?.kind).toBe('rparen');
	});

	it('does not consume a keyword spelling for open-ended counts', () => {
		const stream = streamOf('runtime)');
		const group = parsePositionalGroup(ctxFor(), stream, '*', [], [PAREN_BREAKER, keywordBreaker(['RUNTIME'])]);
		expect(group.children).toEqual([]);
		expect(stream.peek()?.spelling).toBe('runtime');
	});

	it('stops at a closing paren even when short of an exact count', () => {
		const stream = streamOf('a)');
		const group = parsePositionalGroup(ctxFor(), stream, 2, [], [PAREN_BREAKER]);
		expect(kindsOf(group)).toEqual(['ARGUMENT']);
		expect(stream.peek()?.kind).toBe('rparen');
	});

	it('marks flags', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('x force y'), '*', ['FORCE'], []);
		expect(kindsOf(group)).toEqual(['ARGUMENT', 'FLAG', 'ARGUMENT']);
	});

	it('attaches a trailing comment to its argument', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('a # note\n b'), '*', [], []);
		const [first, second] = nodesOf(group);
		expect(first?.kind).toBe('ARGUMENT');
		expect(first && reconstruct(first)).toBe('a # note');
		expect(first && kindsOf(first)).toEqual(['COMMENT']);
		expect(second && reconstruct(second)).toBe('b');
		expect(reconstruct(group)).toBe('a # note\n b');
	});

	it('reads a sortable tag placed before the first value', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('# listfmt: sortable\na b'), '+', [], []);
		expect(group.sortable).toBe(true);
		expect(kindsOf(group)).toEqual(['COMMENT', 'ARGUMENT', 'ARGUMENT']);
	});

	it('lets an unsort tag override a sortable grammar', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('  #[[listfmt: unsort]] a'), '+', [], [], true);
		expect(group.sortable).toBe(false);
	});

	it('keeps the grammar default without a tag', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('b a'), '+', [], [], true);
		expect(group.sortable).toBe(true);
		expect(group.spec).toEqual({ npargs: '+', flags: [] });
	});

	it('opens a parenthetical group inside a positional run', () => {
		const group = parsePositionalGroup(ctxFor(), streamOf('a (b OR c) d'), '*', [], []);
		expect(kindsOf(group)).toEqual(['ARGUMENT', 'PARENGROUP', 'ARGUMENT']);
		expect(reconstruct(group)).toBe('a (b OR c) d');
	});
});
