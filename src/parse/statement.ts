import type { Token } from '../core/tokens';
import { TokenStream } from '../core/tokens';
import { tokenize } from '../core/tokenizer';
import { type CommandRegistry, bundledCommandRegistry } from '../commands/registry';
import { type BodyNode, type Child, type LeafNode, type StatementNode, mkLeaf } from '../cst/nodes';
import { ParseError } from '../errors';
import type { LintSink } from '../diagnostics';
import { lintListfile } from '../lint';
import { PAREN_BREAKER } from './breakers';
import { type ParseContext, createParseContext, expectRightParen, parseCommandArgs } from './args';
import { consumeComment, consumeTrailingComment } from './comments';

// command_name ( arguments ) [trailing comment]
export function parseStatement(ctx: ParseContext, stream: TokenStream): StatementNode {
	const nameTok = stream.peek();
	if (!nameTok || nameTok.kind !== 'word') {
		throw new ParseError('Expected a command name', nameTok ? nameTok.location : stream.endLocation(), nameTok ? nameTok.kind : 'EOF', 'word');
	}
	const name = nameTok.spelling.toLowerCase();
	const children: Child[] = [mkLeaf('FUNNAME', stream.pop())];

	while (stream.peek()?.kind === 'whitespace' || stream.peek()?.kind === 'newline') children.push(stream.pop());

	const open = stream.peek();
	if (!open || open.kind !== 'lparen') {
		throw new ParseError(`Expected "(" after command name "${nameTok.spelling}"`, open ? open.location : stream.endLocation(), open ? open.kind : 'EOF', 'lparen');
	}
	children.push(mkLeaf('LPAREN', stream.pop()));

	const argtree = parseCommandArgs(ctx, stream, ctx.registry.lookup(name), [PAREN_BREAKER]);
	children.push(argtree);
	children.push(mkLeaf('RPAREN', expectRightParen(stream, `arguments of "${nameTok.spelling}"`)));

	const stmt: StatementNode = { kind: 'STATEMENT', name, argtree, children };
	consumeTrailingComment(stream, stmt);
	return stmt;
}

// Everything from a `# listfmt: off` up to the matching `on` is kept verbatim and never parsed.
function consumeDisabled(stream: TokenStream, into: Child[]) {
	into.push(mkLeaf('ONOFFSWITCH', stream.pop()));
	const disabled: LeafNode = mkLeaf('DISABLED');
	while (!stream.atEnd() && stream.peek()?.kind !== 'format-on') disabled.children.push(stream.pop());
	if (disabled.children.length) into.push(disabled);
	if (!stream.atEnd()) into.push(mkLeaf('ONOFFSWITCH', stream.pop()));
}

export function parseListfile(ctx: ParseContext, stream: TokenStream): BodyNode {
	const body: BodyNode = { kind: 'BODY', children: [] };
	for (let t = stream.peek(); t; t = stream.peek()) {
		switch (t.kind) {
			case 'bom':
			case 'whitespace':
			case 'newline':
				body.children.push(stream.pop());
				break;
			case 'format-off':
				consumeDisabled(stream, body.children);
				break;
			case 'format-on':
				body.children.push(mkLeaf('ONOFFSWITCH', stream.pop()));
				break;
			case 'comment':
			case 'bracket-comment':
				body.children.push(consumeComment(stream));
				break;
			case 'word':
				body.children.push(parseStatement(ctx, stream));
				break;
			default:
				throw new ParseError(`Unexpected ${t.kind} token at top level`, t.location, t.kind, 'command name');
		}
	}
	return body;
}

export interface ParseOptions {
	// defaults to the bundled command table
	registry?: CommandRegistry;
	// when given, the lint pass runs over the finished tree
	lint?: LintSink;
}

export function parseTokens(tokens: readonly Token[], opts?: ParseOptions): BodyNode {
	const ctx = createParseContext(opts?.registry ?? bundledCommandRegistry());
	const body = parseListfile(ctx, new TokenStream(tokens));
	if (opts?.lint) lintListfile(body, opts.lint);
	return body;
}

export function parse(text: string, opts?: ParseOptions): BodyNode {
	return parseTokens(tokenize(text), opts);
}
