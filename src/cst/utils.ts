import type { Location, Token } from '../core/tokens';
import { isCommentToken, isWhitespaceToken } from '../parse/util';
import { type Child, type TreeNode, isToken } from './nodes';

// All tokens reachable from `node`, in document order.
export function tokensOf(node: Child): Token[] {
	const out: Token[] = [];
	const visit = (c: Child) => {
		if (isToken(c)) { out.push(c); return; }
		for (const child of c.children) visit(child);
	};
	visit(node);
	return out;
}

// Concatenated spellings; equals the source text the subtree covers.
export function reconstruct(node: Child): string {
	return tokensOf(node).map(t => t.spelling).join('');
}

export function semanticTokensOf(node: Child): Token[] {
	return tokensOf(node).filter(t => !isWhitespaceToken(t) && !isCommentToken(t));
}

export function locationOf(node: Child): Location | null {
	return tokensOf(node)[0]?.location ?? null;
}

// Pre-order walk over tree nodes (tokens are not visited).
export function* walk(node: TreeNode): Generator<TreeNode> {
	yield node;
	for (const c of node.children) {
		if (!isToken(c)) yield* walk(c);
	}
}

function describe(node: TreeNode): string {
	switch (node.kind) {
		case 'STATEMENT': return `STATEMENT ${node.name}`;
		case 'ARGGROUP': return node.variant === 'conditional' ? 'ARGGROUP conditional' : 'ARGGROUP';
		case 'PARGGROUP': return `PARGGROUP npargs=${String(node.spec.npargs)}${node.sortable ? ' sortable' : ''}`;
		case 'KWARGGROUP': return `KWARGGROUP ${node.keyword.token.spelling}`;
		default: return node.kind;
	}
}

/**
 * Indented textual dump of a tree: one node per line, leaves followed by their
 * JSON-quoted spellings. Whitespace tokens are omitted unless `withWhitespace`.
 */
export function dumpTree(node: TreeNode, opts?: { withWhitespace?: boolean }): string {
	const lines: string[] = [];
	const visit = (n: TreeNode, depth: number) => {
		const pad = '  '.repeat(depth);
		const direct = n.children.filter(isToken).filter(t => opts?.withWhitespace || !isWhitespaceToken(t));
		const spellings = direct.map(t => JSON.stringify(t.spelling)).join(' ');
		lines.push(spellings ? `${pad}${describe(n)} ${spellings}` : `${pad}${describe(n)}`);
		for (const c of n.children) {
			if (!isToken(c)) visit(c, depth + 1);
		}
	};
	visit(node, 0);
	return lines.join('\n');
}
