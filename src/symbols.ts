import { DocumentSymbol, type Position, type Range, SymbolKind } from 'vscode-languageserver/node';
import { type Location, type Token, locationAfter } from './core/tokens';
import type { BodyNode, StatementNode } from './cst/nodes';
import { isToken } from './cst/nodes';
import { semanticTokensOf, tokensOf } from './cst/utils';

const TARGET_COMMANDS = new Set(['add_executable', 'add_library', 'add_custom_target']);
const BLOCK_END: Record<string, string> = { function: 'endfunction', macro: 'endmacro' };

function toPosition(loc: Location): Position {
	return { line: loc.line - 1, character: loc.col };
}

function tokenRange(t: Token): Range {
	return { start: toPosition(t.location), end: toPosition(locationAfter(t)) };
}

function statementRange(stmt: StatementNode): Range | null {
	const toks = tokensOf(stmt);
	const first = toks[0];
	const last = toks[toks.length - 1];
	if (!first || !last) return null;
	return { start: toPosition(first.location), end: toPosition(locationAfter(last)) };
}

function symbolFor(stmt: StatementNode): DocumentSymbol | null {
	const args = semanticTokensOf(stmt.argtree);
	const nameTok = args[0];
	const range = statementRange(stmt);
	if (!nameTok || !range) return null;
	if (stmt.name === 'function' || stmt.name === 'macro') {
		const params = args.slice(1).map(t => t.spelling);
		return DocumentSymbol.create(`${nameTok.spelling}(${params.join(', ')})`, stmt.name, SymbolKind.Function, range, tokenRange(nameTok), []);
	}
	if (TARGET_COMMANDS.has(stmt.name)) {
		return DocumentSymbol.create(nameTok.spelling, stmt.name, SymbolKind.Module, range, tokenRange(nameTok));
	}
	return null;
}

/**
 * Outline of a listfile: function and macro definitions, with the targets they
 * define nested under them, and targets defined at top level.
 */
export function documentSymbols(body: BodyNode): DocumentSymbol[] {
	const top: DocumentSymbol[] = [];
	// innermost open function/macro last
	const open: { sym: DocumentSymbol; end: string }[] = [];

	for (const child of body.children) {
		if (isToken(child) || child.kind !== 'STATEMENT') continue;
		const current = open[open.length - 1];
		if (current && child.name === current.end) {
			const range = statementRange(child);
			if (range) current.sym.range = { start: current.sym.range.start, end: range.end };
			open.pop();
			continue;
		}
		const sym = symbolFor(child);
		if (!sym) continue;
		if (current) (current.sym.children ||= []).push(sym);
		else top.push(sym);
		const end = BLOCK_END[child.name];
		if (end) open.push({ sym, end });
	}
	return top;
}
