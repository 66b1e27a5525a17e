import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { loadCommandRegistry } from '../src/commands/registry';
import { isToken } from '../src/cst/nodes';
import { reconstruct, tokensOf } from '../src/cst/utils';
import { ParseError } from '../src/errors';
import { parse } from '../src/parse/statement';
import { FIXTURES_DIR, firstStatement, kindsOf, nodesOf, nth, parseText, readFixture } from './testUtils';

function parseErrorOf(run: () => unknown): ParseError {
	try {
		run();
	} catch (e) {
		if (e instanceof ParseError) return e;
		throw e;
	}
	throw new Error('expected a ParseError');
}

describe('statement parsing', () => {
	it('reports a missing closing paren at end of input', () => {
		const err = parseErrorOf(() => parseText('cmd(a (b c)'));
		expect(err.observed).toBe('EOF');
		expect(err.expected).toBe('rparen');
		expect(err.location).toEqual({ line: 1, col: 11, offset: 11 });
		expect(err.message).toBe('Unexpected end of input closing arguments of "cmd" at 1:11 (expected rparen, got EOF)');
	});

	it('requires a paren after the command name', () => {
		const err = parseErrorOf(() => parseText('cmd x'));
		expect(err.observed).toBe('word');
		expect(err.expected).toBe('lparen');
		expect(err.location.col).toBe(4);
	});

	it('rejects tokens that cannot start a statement', () => {
		const err = parseErrorOf(() => parseText('"str"'));
		expect(err.message).toBe('Unexpected quoted token at top level at 1:0 (expected command name, got quoted)');
	});

	it('allows whitespace and newlines between name and paren', () => {
		const stmt = firstStatement(parseText('foo \n (a)'));
		expect(kindsOf(stmt)).toEqual(['FUNNAME', 'LPAREN', 'ARGGROUP', 'RPAREN']);
	});

	it('attaches a same-line comment to the statement', () => {
		const body = parseText('foo(a) # done\nbar()');
		const stmt = firstStatement(body);
		expect(reconstruct(stmt)).toBe('foo(a) # done');
		expect(kindsOf(stmt).at(-1)).toBe('COMMENT');
	});
});

describe('listfile parsing', () => {
	it('folds consecutive line comments into one node', () => {
		const body = parseText('# one\n# two\nfoo()');
		const first = nth(nodesOf(body), 0);
		expect(first.kind).toBe('COMMENT');
		expect(reconstruct(first)).toBe('# one\n# two');
	});

	it('keeps a disabled region verbatim', () => {
		const text = 'foo(a)\n# listfmt: off\nbar( x  y )\n# listfmt: on\nbaz()\n';
		const body = parseText(text);
		expect(kindsOf(body)).toEqual(['STATEMENT', 'ONOFFSWITCH', 'DISABLED', 'ONOFFSWITCH', 'STATEMENT']);
		expect(reconstruct(nth(nodesOf(body), 2))).toBe('\nbar( x  y )\n');
		expect(reconstruct(body)).toBe(text);
	});

	it('runs an unterminated disabled region to end of input without parsing it', () => {
		const body = parseText('x()\n#listfmt:off\nfoo(');
		expect(kindsOf(body)).toEqual(['STATEMENT', 'ONOFFSWITCH', 'DISABLED']);
	});

	it('accepts a stray format-on marker', () => {
		expect(kindsOf(parseText('# listfmt: on\n'))).toEqual(['ONOFFSWITCH']);
	});

	it('keeps a byte-order mark as a raw token', () => {
		const body = parseText('\uFEFFfoo()');
		const first = nth(body.children, 0);
		expect(isToken(first) && first.kind).toBe('bom');
	});

	it('round-trips CRLF input', () => {
		const text = 'foo(a\r\n  b)\r\n\r\n# c\r\n';
		expect(reconstruct(parseText(text))).toBe(text);
	});

	it('returns an empty body for empty input', () => {
		expect(parseText('').children).toEqual([]);
	});
});

describe('round trip over fixtures', () => {
	const dir = path.join(FIXTURES_DIR, 'listfiles');
	const files = fs.readdirSync(dir).filter(f => f.endsWith('.cmake')).sort();

	it('has fixtures', () => {
		expect(files.length).toBeGreaterThan(0);
	});

	for (const file of files) {
		it(`reproduces ${file}`, async () => {
			const registry = await loadCommandRegistry();
			const text = await readFixture(path.join('listfiles', file));
			const body = parse(text, { registry });
			expect(reconstruct(body)).toBe(text);
			expect(tokensOf(body).length).toBeGreaterThan(0);
		});
	}
});

describe('default command table', () => {
	it('parses with the bundled table when no registry is given', () => {
		const { argtree } = firstStatement(parse('if(A AND B)'));
		expect(argtree.variant).toBe('conditional');
	});

	it('applies bundled keywords', () => {
		const { argtree } = firstStatement(parse('add_library(demo STATIC a.c ALIAS x)'));
		if (argtree.variant !== 'standard') throw new Error('expected a standard argument tree');
		expect(argtree.kwargGroups.map(g => g.keyword.token.spelling)).toEqual(['ALIAS']);
	});
});
