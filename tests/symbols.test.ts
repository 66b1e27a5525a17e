import { describe, it, expect } from 'vitest';
import { SymbolKind } from 'vscode-languageserver/node';
import { documentSymbols } from '../src/symbols';
import { nth, parseText } from './testUtils';

const SOURCE = [
	'function(add_thing name src)',
	'  add_library(${name} ${src})',
	'endfunction()',
	'',
	'add_executable(app main.c)',
	'',
].join('\n');

describe('document symbols', () => {
	it('outlines functions with the targets they define', () => {
		const symbols = documentSymbols(parseText(SOURCE));
		expect(symbols.map(s => s.name)).toEqual(['add_thing(name, src)', 'app']);

		const fn = nth(symbols, 0);
		expect(fn.kind).toBe(SymbolKind.Function);
		expect(fn.detail).toBe('function');
		expect(fn.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 2, character: 13 } });
		expect(fn.selectionRange).toEqual({ start: { line: 0, character: 9 }, end: { line: 0, character: 18 } });

		const lib = nth(fn.children ?? [], 0);
		expect(lib.name).toBe('${name}');
		expect(lib.kind).toBe(SymbolKind.Module);
		expect(lib.detail).toBe('add_library');
		expect(lib.range).toEqual({ start: { line: 1, character: 2 }, end: { line: 1, character: 29 } });
		expect(lib.selectionRange).toEqual({ start: { line: 1, character: 14 }, end: { line: 1, character: 21 } });

		const app = nth(symbols, 1);
		expect(app.kind).toBe(SymbolKind.Module);
		expect(app.range).toEqual({ start: { line: 4, character: 0 }, end: { line: 4, character: 26 } });
		expect(app.selectionRange).toEqual({ start: { line: 4, character: 15 }, end: { line: 4, character: 18 } });
		expect(app.children).toBeUndefined();
	});

	it('matches block ends case-insensitively and skips unnamed definitions', () => {
		const symbols = documentSymbols(parseText('MACRO(m)\nENDMACRO()\nadd_custom_target()\nadd_custom_target(docs)\n'));
		expect(symbols.map(s => [s.name, s.detail])).toEqual([['m()', 'macro'], ['docs', 'add_custom_target']]);
		expect(nth(symbols, 0).range.end).toEqual({ line: 1, character: 10 });
		expect(nth(symbols, 0).children).toEqual([]);
	});
});
