// Core token model shared by the tokenizer and the parser

export type TokenKind =
	| 'word'
	| 'number'
	| 'deref'
	| 'unquoted'
	| 'quoted'
	| 'bracket-argument'
	| 'lparen'
	| 'rparen'
	| 'whitespace'
	| 'newline'
	| 'comment'
	| 'bracket-comment'
	| 'format-off' // `# listfmt: off`
	| 'format-on'
	| 'bom';

// line is 1-based, col is 0-based, offset is a UTF-16 index into the source text
export type Location = { line: number; col: number; offset: number };

export interface Token {
	readonly kind: TokenKind;
	readonly spelling: string;
	readonly location: Location;
}

export function formatLocation(loc: Location): string {
	return `${loc.line}:${loc.col}`;
}

// Location of the first character after `t`.
export function locationAfter(t: Token): Location {
	const { spelling, location } = t;
	const lastNl = spelling.lastIndexOf('\n');
	if (lastNl < 0) {
		return { line: location.line, col: location.col + spelling.length, offset: location.offset + spelling.length };
	}
	let lines = 0;
	for (const ch of spelling) if (ch === '\n') lines++;
	return {
		line: location.line + lines,
		col: spelling.length - lastNl - 1,
		offset: location.offset + spelling.length,
	};
}

/**
 * Explicit cursor over an immutable token array. Tokens are consumed strictly
 * front to back; once `pop()` returns a token no later reader sees it again.
 */
export class TokenStream {
	private readonly tokens: readonly Token[];
	private idx = 0;

	constructor(tokens: readonly Token[]) {
		this.tokens = tokens;
	}

	get position(): number { return this.idx; }
	get remaining(): number { return this.tokens.length - this.idx; }

	atEnd(): boolean { return this.idx >= this.tokens.length; }

	peek(k = 0): Token | undefined {
		return this.tokens[this.idx + k];
	}

	pop(): Token {
		const t = this.tokens[this.idx];
		if (!t) throw new Error('TokenStream: pop() past end of stream');
		this.idx++;
		return t;
	}

	// Where the next token would start; used to report end-of-stream errors.
	endLocation(): Location {
		const next = this.tokens[this.idx];
		if (next) return next.location;
		const last = this.tokens[this.tokens.length - 1];
		return last ? locationAfter(last) : { line: 1, col: 0, offset: 0 };
	}
}
