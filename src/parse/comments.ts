import type { Token, TokenStream } from '../core/tokens';
import { type Child, type LeafNode, mkLeaf } from '../cst/nodes';

const isLineComment = (t: Token | undefined) => t?.kind === 'comment';

// Offset k such that peek(k) is the comment continuing the current one on the next
// line, or -1. `col` restricts the match to comments starting in that column.
function continuationAt(stream: TokenStream, col?: number): number {
	if (stream.peek()?.kind !== 'newline') return -1;
	const k = stream.peek(1)?.kind === 'whitespace' ? 2 : 1;
	const c = stream.peek(k);
	if (!c || !isLineComment(c)) return -1;
	if (col !== undefined && c.location.col !== col) return -1;
	return k;
}

/**
 * Consume a comment token. Consecutive line comments on the following lines are
 * folded into the same node so the block travels as one unit.
 */
export function consumeComment(stream: TokenStream): LeafNode {
	const first = stream.pop();
	const node = mkLeaf('COMMENT', first);
	if (!isLineComment(first)) return node;
	for (let k = continuationAt(stream); k > 0; k = continuationAt(stream)) {
		for (let i = 0; i <= k; i++) node.children.push(stream.pop());
	}
	return node;
}

/**
 * Attach a comment that trails `parent` on the same line. Follow-on line comments
 * aligned with it join the node. Does nothing if no such comment is next.
 */
export function consumeTrailingComment(stream: TokenStream, parent: { children: Child[] }): void {
	let k = 0;
	while (stream.peek(k)?.kind === 'whitespace') k++;
	const c = stream.peek(k);
	if (!c || (c.kind !== 'comment' && c.kind !== 'bracket-comment')) return;
	for (let i = 0; i < k; i++) parent.children.push(stream.pop());
	const node = mkLeaf('COMMENT', stream.pop());
	if (c.kind === 'comment') {
		const col = c.location.col;
		for (let j = continuationAt(stream, col); j > 0; j = continuationAt(stream, col)) {
			for (let i = 0; i <= j; i++) node.children.push(stream.pop());
		}
	}
	parent.children.push(node);
}
