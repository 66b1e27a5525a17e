import { describe, it, expect } from 'vitest';
import { tokenize } from '../src/core/tokenizer';
import { dumpTokens } from './testUtils';

describe('tokenizer', () => {
	it('splits a command invocation', () => {
		expect(dumpTokens(tokenize('add_library(foo STATIC a.c)'))).toEqual([
			'word:add_library',
			'lparen:(',
			'word:foo',
			'whitespace: ',
			'word:STATIC',
			'whitespace: ',
			'unquoted:a.c',
			'rparen:)',
		]);
	});

	it('classifies numbers, variable references, strings and bracket arguments', () => {
		expect(dumpTokens(tokenize('set(x 1.5 -2 ${y} "a b" [[z]])'))).toEqual([
			'word:set',
			'lparen:(',
			'word:x',
			'whitespace: ',
			'number:1.5',
			'whitespace: ',
			'number:-2',
			'whitespace: ',
			'deref:${y}',
			'whitespace: ',
			'quoted:"a b"',
			'whitespace: ',
			'bracket-argument:[[z]]',
			'rparen:)',
		]);
	});

	it('scans line comments, bracket comments and CRLF line breaks', () => {
		expect(dumpTokens(tokenize('# hello\r\nfoo() #[[x]]'))).toEqual([
			'comment:# hello',
			'newline:\r\n',
			'word:foo',
			'lparen:(',
			'rparen:)',
			'whitespace: ',
			'bracket-comment:#[[x]]',
		]);
	});

	it('recognizes format switches case-insensitively', () => {
		const kinds = tokenize('# listfmt: off\n#LISTFMT:ON\n# listfmt: sortable').map(t => t.kind);
		expect(kinds).toEqual(['format-off', 'newline', 'format-on', 'newline', 'comment']);
	});

	it('records 1-based lines and 0-based columns', () => {
		const locs = tokenize('a(\n  b)').map(t => [t.spelling, t.location.line, t.location.col, t.location.offset]);
		expect(locs).toEqual([
			['a', 1, 0, 0],
			['(', 1, 1, 1],
			['\n', 1, 2, 2],
			['  ', 2, 0, 3],
			['b', 2, 2, 5],
			[')', 2, 3, 6],
		]);
	});

	it('tracks lines across multi-line tokens', () => {
		const tokens = tokenize('m("x\ny" z)');
		const z = tokens.find(t => t.spelling === 'z');
		expect(z?.location).toEqual({ line: 2, col: 3, offset: 8 });
	});

	it('keeps a backslash-escaped space inside an unquoted argument', () => {
		expect(dumpTokens(tokenize('a\\ b'))).toEqual(['unquoted:a\\ b']);
	});

	it('runs unterminated strings and brackets to end of input', () => {
		expect(dumpTokens(tokenize('message("abc'))).toEqual(['word:message', 'lparen:(', 'quoted:"abc']);
		expect(dumpTokens(tokenize('x([=[abc]]'))).toEqual(['word:x', 'lparen:(', 'bracket-argument:[=[abc]]']);
	});

	it('emits a byte-order mark token only at the start', () => {
		const tokens = tokenize('\uFEFFfoo()');
		expect(tokens[0]?.kind).toBe('bom');
		expect(tokens[1]?.spelling).toBe('foo');
	});

	it('treats a lone carriage return as whitespace', () => {
		expect(dumpTokens(tokenize('a\rb'))).toEqual(['word:a', 'whitespace:\r', 'word:b']);
	});

	it('covers the input exactly', () => {
		const text = 'if(NOT "${x}" STREQUAL [==[y]==]) # c\n\t  message( STATUS  a\\;b )\r\n#[[ block\ncomment ]]\n';
		expect(tokenize(text).map(t => t.spelling).join('')).toBe(text);
	});
});
