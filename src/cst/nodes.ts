import type { Token } from '../core/tokens';
import type { PositionalSpec, StandardGrammar } from '../commands/grammar';

export type NodeKind =
	| 'BODY'
	| 'STATEMENT'
	| 'FUNNAME'
	| 'ARGGROUP'
	| 'KWARGGROUP'
	| 'PARGGROUP'
	| 'PARENGROUP'
	| 'KEYWORD'
	| 'ARGUMENT'
	| 'FLAG'
	| 'COMMENT'
	| 'LPAREN'
	| 'RPAREN'
	| 'ONOFFSWITCH'
	| 'DISABLED';

// Whitespace and comment tokens stay wherever they were encountered.
export type Child = TreeNode | Token;

interface NodeBase<K extends NodeKind> {
	readonly kind: K;
	readonly children: Child[];
}

export type LeafKind = 'FUNNAME' | 'ARGUMENT' | 'FLAG' | 'COMMENT' | 'LPAREN' | 'RPAREN' | 'ONOFFSWITCH' | 'DISABLED';
export type LeafNode = NodeBase<LeafKind>;

export interface KeywordNode extends NodeBase<'KEYWORD'> {
	readonly token: Token;
}

export interface PositionalGroupNode extends NodeBase<'PARGGROUP'> {
	readonly spec: PositionalSpec;
	// set from a `# listfmt: sortable` / `unsortable` tag; the only field written after construction
	sortable: boolean;
}

export interface StandardArgTree extends NodeBase<'ARGGROUP'> {
	readonly variant: 'standard';
	readonly grammar: StandardGrammar;
	// views into `children`
	readonly pargGroups: PositionalGroupNode[];
	readonly kwargGroups: KeywordGroupNode[];
}

export interface ConditionalArgTree extends NodeBase<'ARGGROUP'> {
	readonly variant: 'conditional';
}

export type ArgGroupNode = StandardArgTree | ConditionalArgTree;
export type ArgSubtree = ArgGroupNode | PositionalGroupNode;

export interface KeywordGroupNode extends NodeBase<'KWARGGROUP'> {
	readonly keyword: KeywordNode;
	// null when the keyword is followed directly by a sibling keyword or the closing paren
	body: ArgSubtree | null;
}

export type ParenGroupNode = NodeBase<'PARENGROUP'>;

export interface StatementNode extends NodeBase<'STATEMENT'> {
	// lower-cased command name
	readonly name: string;
	readonly argtree: ArgGroupNode;
}

export type BodyNode = NodeBase<'BODY'>;

export type TreeNode =
	| BodyNode
	| StatementNode
	| LeafNode
	| KeywordNode
	| ArgGroupNode
	| KeywordGroupNode
	| PositionalGroupNode
	| ParenGroupNode;

export function isToken(c: Child): c is Token {
	return 'spelling' in c;
}

export function mkLeaf(kind: LeafKind, ...tokens: Token[]): LeafNode {
	return { kind, children: [...tokens] };
}
