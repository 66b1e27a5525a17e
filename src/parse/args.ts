/*
	Argument-list parsers. Each takes the token stream positioned at the first token it
	may consume and the breakstack of its ancestors, consumes from the front, and
	returns the subtree it built. Whitespace and comments are appended wherever they
	are met so that the tree reproduces the source exactly.
*/
import process from 'node:process';
import type { Token, TokenStream } from '../core/tokens';
import { formatLocation } from '../core/tokens';
import {
	CONDITIONAL,
	type CommandGrammar,
	type ConditionalGrammar,
	type Grammar,
	type Npargs,
	type StandardGrammar,
	npargsIsExact,
	pargsAreFull,
} from '../commands/grammar';
import type { CommandRegistry } from '../commands/registry';
import {
	type ArgGroupNode,
	type ArgSubtree,
	type ConditionalArgTree,
	type KeywordGroupNode,
	type KeywordNode,
	type ParenGroupNode,
	type PositionalGroupNode,
	type StandardArgTree,
	mkLeaf,
} from '../cst/nodes';
import { locationOf, semanticTokensOf } from '../cst/utils';
import { InternalParseError, ParseError } from '../errors';
import { LISTFMT_DIAGCODES, type LintSink } from '../diagnostics';
import { AssertNever } from '../utils';
import { type Breakstack, PAREN_BREAKER, keywordBreaker, shouldBreak } from './breakers';
import { consumeComment, consumeTrailingComment } from './comments';
import { getTag, isCommentToken, isWhitespaceToken, normalizedKeyword } from './util';

export interface ParseContext {
	registry: CommandRegistry;
	// prints dispatch decisions; enabled by LISTFMT_DEBUG_PARSE
	trace: boolean;
}

export function createParseContext(registry: CommandRegistry): ParseContext {
	return { registry, trace: !!process.env.LISTFMT_DEBUG_PARSE };
}

function trace(ctx: ParseContext, what: string, t: Token) {
	if (ctx.trace) console.log(`[parse] ${what} ${JSON.stringify(t.spelling)} at ${formatLocation(t.location)}`);
}

// A dispatched sub-parser that consumed nothing would make its caller loop forever.
function ensureProgress(stream: TokenStream, before: number, at: Token) {
	if (stream.remaining < before) return;
	throw new InternalParseError('Parsed an empty subtree', at.location, at.kind, 'at least one consumed token');
}

export function expectRightParen(stream: TokenStream, what: string): Token {
	const t = stream.peek();
	if (!t) throw new ParseError(`Unexpected end of input closing ${what}`, stream.endLocation(), 'EOF', 'rparen');
	if (t.kind !== 'rparen') throw new ParseError(`Unexpected ${t.kind} token closing ${what}`, t.location, t.kind, 'rparen');
	return stream.pop();
}

// Interprets a grammar descriptor: the single entry point for keyword sub-grammars.
export function parseGrammar(ctx: ParseContext, stream: TokenStream, grammar: Grammar, breakstack: Breakstack): ArgSubtree {
	switch (grammar.kind) {
		case 'standard': return parseStandardArgs(ctx, stream, grammar, breakstack);
		case 'positional': return parsePositionalGroup(ctx, stream, grammar.npargs, grammar.flags, breakstack, grammar.sortable);
		case 'conditional': return parseConditionalGroup(ctx, stream, breakstack);
		default: return AssertNever(grammar);
	}
}

export function parseCommandArgs(ctx: ParseContext, stream: TokenStream, grammar: CommandGrammar, breakstack: Breakstack): ArgGroupNode {
	return grammar.kind === 'conditional'
		? parseConditionalGroup(ctx, stream, breakstack)
		: parseStandardArgs(ctx, stream, grammar, breakstack);
}

/**
 * Standard argument tree:
 *
 *     command_name(parg1 parg2 ...
 *                  KEYWORD1 kwarg1 kwarg2 ...
 *                  KEYWORD2 kwarg3 ...
 *                  FLAG1 FLAG2)
 *
 * Keyword values stop at any keyword or flag of this command; positional runs stop
 * only at keywords, flags inside them become FLAG leaves.
 */
export function parseStandardArgs(ctx: ParseContext, stream: TokenStream, grammar: StandardGrammar, breakstack: Breakstack): StandardArgTree {
	const tree: StandardArgTree = { kind: 'ARGGROUP', variant: 'standard', grammar, children: [], pargGroups: [], kwargGroups: [] };
	const keywords = [...grammar.kwargs.keys()];
	const kwargBreakstack: Breakstack = [...breakstack, keywordBreaker([...keywords, ...grammar.flags])];
	const positionalBreakstack: Breakstack = [...breakstack, keywordBreaker(keywords)];

	for (let t = stream.peek(); t; t = stream.peek()) {
		if (shouldBreak(t, breakstack)) break;
		if (isWhitespaceToken(t)) { tree.children.push(stream.pop()); continue; }
		if (isCommentToken(t)) { tree.children.push(mkLeaf('COMMENT', stream.pop())); continue; }

		const before = stream.remaining;
		const word = normalizedKeyword(t);
		const sub = word === null ? undefined : grammar.kwargs.get(word);
		if (word !== null && sub) {
			trace(ctx, 'kwarg', t);
			const group = parseKeywordGroup(ctx, stream, word, sub, kwargBreakstack);
			ensureProgress(stream, before, t);
			tree.kwargGroups.push(group);
			tree.children.push(group);
		} else {
			trace(ctx, 'pargs', t);
			const group = parsePositionalGroup(ctx, stream, grammar.npargs, grammar.flags, positionalBreakstack);
			ensureProgress(stream, before, t);
			tree.pargGroups.push(group);
			tree.children.push(group);
		}
	}
	return tree;
}

/**
 * Report each keyword of `required` that has no keyword group in `tree`, at the
 * first semantic token of the tree. Missing keywords are reported in sorted order.
 */
export function checkRequiredKwargs(tree: StandardArgTree, lint: LintSink, required: Iterable<string>): void {
	const missing = new Set<string>();
	for (const word of required) missing.add(word.toUpperCase());
	for (const group of tree.kwargGroups) {
		const word = normalizedKeyword(group.keyword.token);
		if (word !== null) missing.delete(word);
	}
	if (!missing.size) return;
	const location = semanticTokensOf(tree)[0]?.location ?? locationOf(tree);
	for (const word of [...missing].sort()) {
		lint.record(LISTFMT_DIAGCODES.MISSING_KWARG, word, location);
	}
}

/**
 * Consume a run of positional arguments. With an exact `npargs` a keyword of an
 * enclosing parser does not end the run (it is taken as a value, e.g. the second
 * `runtime` in `install(TARGETS x RUNTIME COMPONENT runtime)`); a closing paren does.
 */
export function parsePositionalGroup(
	ctx: ParseContext,
	stream: TokenStream,
	npargs: Npargs,
	flags: readonly string[],
	breakstack: Breakstack,
	sortable = false,
): PositionalGroupNode {
	const tree: PositionalGroupNode = { kind: 'PARGGROUP', spec: { npargs, flags }, sortable, children: [] };
	const flagSet = new Set(flags);
	let nconsumed = 0;

	while (isWhitespaceToken(stream.peek())) tree.children.push(stream.pop());

	const tag = getTag(stream.peek());
	if (tag === 'sortable' || tag === 'sort') tree.sortable = true;
	else if (tag === 'unsortable' || tag === 'unsort') tree.sortable = false;

	for (let t = stream.peek(); t; t = stream.peek()) {
		if (pargsAreFull(npargs, nconsumed)) break;
		if (shouldBreak(t, breakstack)) {
			if (!npargsIsExact(npargs)) break;
			if (t.kind === 'rparen') break;
		}

		// Not sanctioned by every command, but accepted by the language
		if (t.kind === 'lparen') {
			tree.children.push(parseParenGroup(ctx, stream));
			continue;
		}
		if (isWhitespaceToken(t)) { tree.children.push(stream.pop()); continue; }
		if (isCommentToken(t)) { tree.children.push(consumeComment(stream)); continue; }

		const word = normalizedKeyword(t);
		const child = mkLeaf(word !== null && flagSet.has(word) ? 'FLAG' : 'ARGUMENT', stream.pop());
		consumeTrailingComment(stream, child);
		tree.children.push(child);
		nconsumed++;
	}
	return tree;
}

// KEYWORD value... ; the caller has already matched the keyword spelling.
export function parseKeywordGroup(
	ctx: ParseContext,
	stream: TokenStream,
	word: string,
	subgrammar: Grammar,
	breakstack: Breakstack,
): KeywordGroupNode {
	const t = stream.peek();
	if (!t || normalizedKeyword(t) !== word) {
		throw new InternalParseError('Keyword group dispatched on the wrong token', t ? t.location : stream.endLocation(), t ? t.spelling : 'EOF', word);
	}
	const keyword: KeywordNode = { kind: 'KEYWORD', token: t, children: [stream.pop()] };
	const tree: KeywordGroupNode = { kind: 'KWARGGROUP', keyword, body: null, children: [keyword] };

	while (isWhitespaceToken(stream.peek())) tree.children.push(stream.pop());

	const before = stream.remaining;
	const body = parseGrammar(ctx, stream, subgrammar, breakstack);
	if (stream.remaining < before) {
		tree.body = body;
		tree.children.push(body);
	}
	return tree;
}

// `( conditional-expression )`, bounded by its own closing paren only.
export function parseParenGroup(ctx: ParseContext, stream: TokenStream): ParenGroupNode {
	const open = stream.peek();
	if (!open || open.kind !== 'lparen') {
		throw new InternalParseError('Parenthetical group dispatched on the wrong token', open ? open.location : stream.endLocation(), open ? open.kind : 'EOF', 'lparen');
	}
	const tree: ParenGroupNode = { kind: 'PARENGROUP', children: [mkLeaf('LPAREN', stream.pop())] };
	tree.children.push(parseConditionalGroup(ctx, stream, [PAREN_BREAKER]));
	tree.children.push(mkLeaf('RPAREN', expectRightParen(stream, 'parenthetical group')));
	consumeTrailingComment(stream, tree);
	return tree;
}

// Unary and binary predicates of if()/while(); parsed as flags, not as structure.
export const CONDITIONAL_FLAGS: readonly string[] = [
	'COMMAND', 'DEFINED', 'EQUAL', 'EXISTS', 'GREATER', 'GREATER_EQUAL', 'IN_LIST',
	'IS_ABSOLUTE', 'IS_DIRECTORY', 'IS_NEWER_THAN', 'IS_SYMLINK', 'LESS', 'LESS_EQUAL',
	'MATCHES', 'NOT', 'PATH_EQUAL', 'POLICY', 'STREQUAL', 'STRGREATER', 'STRGREATER_EQUAL',
	'STRLESS', 'STRLESS_EQUAL', 'TARGET', 'TEST', 'VERSION_EQUAL', 'VERSION_GREATER',
	'VERSION_GREATER_EQUAL', 'VERSION_LESS', 'VERSION_LESS_EQUAL',
];

const BOOLEAN_KEYWORDS: ReadonlyMap<string, ConditionalGrammar> = new Map([['AND', CONDITIONAL], ['OR', CONDITIONAL]]);
const BOOLEAN_BREAKER = keywordBreaker(BOOLEAN_KEYWORDS.keys());

/**
 * Boolean expression:
 *
 *     while(COND1 AND (COND2 OR COND3)
 *           OR (COND3 AND (COND4 AND COND5)) OR COND6)
 *
 * AND/OR are keywords whose value is another conditional group, so the structure is
 * flat: `A STREQUAL B` is one positional group of three leaves.
 */
export function parseConditionalGroup(ctx: ParseContext, stream: TokenStream, breakstack: Breakstack): ConditionalArgTree {
	const tree: ConditionalArgTree = { kind: 'ARGGROUP', variant: 'conditional', children: [] };
	const childBreakstack: Breakstack = [...breakstack, BOOLEAN_BREAKER];

	for (let t = stream.peek(); t; t = stream.peek()) {
		if (shouldBreak(t, breakstack)) break;
		if (isWhitespaceToken(t)) { tree.children.push(stream.pop()); continue; }
		if (isCommentToken(t)) { tree.children.push(mkLeaf('COMMENT', stream.pop())); continue; }
		if (t.kind === 'lparen') { tree.children.push(parseParenGroup(ctx, stream)); continue; }

		const before = stream.remaining;
		const word = normalizedKeyword(t);
		const sub = word === null ? undefined : BOOLEAN_KEYWORDS.get(word);
		if (word !== null && sub) {
			trace(ctx, 'bool', t);
			tree.children.push(parseKeywordGroup(ctx, stream, word, sub, childBreakstack));
		} else {
			tree.children.push(parsePositionalGroup(ctx, stream, '+', CONDITIONAL_FLAGS, childBreakstack));
		}
		ensureProgress(stream, before, t);
	}
	return tree;
}
