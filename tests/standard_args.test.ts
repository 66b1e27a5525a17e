import { describe, it, expect } from 'vitest';
import { dumpTree, semanticTokensOf } from '../src/cst/utils';
import { InternalParseError, ParseError } from '../src/errors';
import { loadCommandRegistry } from '../src/commands/registry';
import { parse } from '../src/parse/statement';
import { firstStatement, kindsOf, nth, parseText, spellings } from './testUtils';

function standardTree(text: string, table: Parameters<typeof parseText>[1]) {
	const { argtree } = firstStatement(parseText(text, table));
	if (argtree.variant !== 'standard') throw new Error('expected a standard argument tree');
	return argtree;
}

describe('standard argument tree', () => {
	it('splits positional arguments from a keyword group', () => {
		const tree = standardTree('cmd(a b FOO c d)', { cmd: { kwargs: { FOO: '*' } } });
		expect(tree.pargGroups).toHaveLength(1);
		expect(tree.kwargGroups).toHaveLength(1);
		expect(spellings(semanticTokensOf(nth(tree.pargGroups, 0)))).toEqual(['a', 'b']);
		const body = nth(tree.kwargGroups, 0).body;
		expect(body && spellings(semanticTokensOf(body))).toEqual(['c', 'd']);
	});

	it('dumps the keyword precedence tree', () => {
		const body = parseText('cmd(a b FOO c d)', { cmd: { kwargs: { FOO: '*' } } });
		expect(dumpTree(body)).toBe([
			'BODY',
			'  STATEMENT cmd',
			'    FUNNAME "cmd"',
			'    LPAREN "("',
			'    ARGGROUP',
			'      PARGGROUP npargs=*',
			'        ARGUMENT "a"',
			'        ARGUMENT "b"',
			'      KWARGGROUP FOO',
			'        KEYWORD "FOO"',
			'        PARGGROUP npargs=*',
			'          ARGUMENT "c"',
			'          ARGUMENT "d"',
			'    RPAREN ")"',
		].join('\n'));
	});

	it('ends keyword values at a flag but keeps flags inside positional runs', () => {
		const body = parseText('cmd(x FORCE FOO y FORCE)', { cmd: { flags: ['FORCE'], kwargs: { FOO: '*' } } });
		expect(dumpTree(firstStatement(body).argtree)).toBe([
			'ARGGROUP',
			'  PARGGROUP npargs=*',
			'    ARGUMENT "x"',
			'    FLAG "FORCE"',
			'  KWARGGROUP FOO',
			'    KEYWORD "FOO"',
			'    PARGGROUP npargs=*',
			'      ARGUMENT "y"',
			'  PARGGROUP npargs=*',
			'    FLAG "FORCE"',
		].join('\n'));
	});

	it('leaves a keyword without a body when another keyword follows', () => {
		const tree = standardTree('cmd(A B x)', { cmd: { kwargs: { A: '*', B: '*' } } });
		expect(tree.kwargGroups.map(g => g.keyword.token.spelling)).toEqual(['A', 'B']);
		expect(nth(tree.kwargGroups, 0).body).toBeNull();
		const second = nth(tree.kwargGroups, 1).body;
		expect(second && spellings(semanticTokensOf(second))).toEqual(['x']);
	});

	it('matches command names and keywords case-insensitively', () => {
		const stmt = firstStatement(parseText('CMD(a foo b)', { cmd: { kwargs: { FOO: '*' } } }));
		expect(stmt.name).toBe('cmd');
		if (stmt.argtree.variant !== 'standard') throw new Error('expected a standard argument tree');
		expect(stmt.argtree.kwargGroups.map(g => g.keyword.token.spelling)).toEqual(['foo']);
	});

	it('nests standard grammars under keywords', () => {
		const tree = standardTree('cmd(SUB X 1 y)', { cmd: { kwargs: { SUB: { kwargs: { X: 1 } } } } });
		const sub = nth(tree.kwargGroups, 0).body;
		expect(sub?.kind).toBe('ARGGROUP');
		expect(sub && kindsOf(sub)).toEqual(['KWARGGROUP', 'PARGGROUP']);
		expect(sub && spellings(semanticTokensOf(sub))).toEqual(['X', '1', 'y']);
		expect(tree.pargGroups).toEqual([]);
	});

	it('treats unknown commands as positional-only', () => {
		const tree = standardTree('whatever(A B C)', {});
		expect(tree.kwargGroups).toEqual([]);
		expect(tree.pargGroups).toHaveLength(1);
	});

	it('keeps whitespace and comments at the group level', () => {
		const tree = standardTree('cmd(\n  # lead\n  a)', {});
		expect(kindsOf(tree)).toEqual(['COMMENT', 'PARGGROUP']);
		expect(tree.children[0]).toMatchObject({ kind: 'newline' });
	});

	it('aborts when a dispatched parser makes no progress', () => {
		const run = () => parseText('cmd(a)', { cmd: { pargs: 0 } });
		expect(run).toThrow(InternalParseError);
		expect(run).toThrow(ParseError);
		expect(run).toThrow('Parsed an empty subtree at 1:4');
	});
});

describe('install() keyword spelled as a value', () => {
	it('takes "runtime" as the COMPONENT value', async () => {
		const registry = await loadCommandRegistry();
		const { argtree } = firstStatement(parse('install(TARGETS x RUNTIME COMPONENT runtime)', { registry }));
		if (argtree.variant !== 'standard') throw new Error('expected a standard argument tree');
		expect(argtree.kwargGroups.map(g => g.keyword.token.spelling)).toEqual(['TARGETS', 'RUNTIME', 'COMPONENT']);
		expect(nth(argtree.kwargGroups, 1).body).toBeNull();
		const component = nth(argtree.kwargGroups, 2).body;
		expect(component && spellings(semanticTokensOf(component))).toEqual(['runtime']);
	});
});
