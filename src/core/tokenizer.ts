import type { Location, Token, TokenKind } from './tokens';

const WORD_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NUMBER_RE = /^-?\d*\.?\d+$/;
const DEREF_RE = /^\$\{[^{}]*\}$/;
const BRACKET_OPEN_RE = /\[(=*)\[/y;
const INLINE_WS_RE = /[ \t\f\v]+/y;
const FORMAT_SWITCH_RE = /^#\s*listfmt\s*:\s*(off|on)\s*$/i;

function isUnquotedStop(ch: string): boolean {
	return ch === '' || ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v' || ch === '\r' || ch === '\n'
		|| ch === '(' || ch === ')' || ch === '"' || ch === '#';
}

// Splits listfile text into tokens. Every character of the input belongs to exactly
// one token, so joining the spellings gives back the original text.
export class Tokenizer {
	private i = 0;
	private line = 1;
	private lineStart = 0;
	private readonly n: number;
	private readonly text: string;

	constructor(text: string) {
		this.text = text;
		this.n = text.length;
	}

	next(): Token | null {
		if (this.i >= this.n) return null;
		const [kind, end] = this.scanOne();
		const start = this.i;
		const location: Location = { line: this.line, col: start - this.lineStart, offset: start };
		const spelling = this.text.slice(start, end);
		for (let k = start; k < end; k++) {
			if (this.text.charCodeAt(k) === 10) { this.line++; this.lineStart = k + 1; }
		}
		this.i = end;
		return { kind, spelling, location };
	}

	private scanOne(): [TokenKind, number] {
		const text = this.text;
		const i = this.i;
		const c = text.charAt(i);

		if (i === 0 && c === '\uFEFF') return ['bom', 1];
		if (c === '\n') return ['newline', i + 1];
		if (c === '\r' && text.charAt(i + 1) === '\n') return ['newline', i + 2];
		if (c === '\r') return ['whitespace', i + 1];

		INLINE_WS_RE.lastIndex = i;
		const ws = INLINE_WS_RE.exec(text);
		if (ws) return ['whitespace', i + ws[0].length];

		if (c === '(') return ['lparen', i + 1];
		if (c === ')') return ['rparen', i + 1];

		if (c === '#') {
			const bracketEnd = this.scanBracket(i + 1);
			if (bracketEnd !== null) return ['bracket-comment', bracketEnd];
			let j = i;
			while (j < this.n && text[j] !== '\n' && !(text[j] === '\r' && text[j + 1] === '\n')) j++;
			const m = FORMAT_SWITCH_RE.exec(text.slice(i, j));
			if (m) return [m[1]?.toLowerCase() === 'off' ? 'format-off' : 'format-on', j];
			return ['comment', j];
		}

		if (c === '"') {
			let j = i + 1;
			while (j < this.n) {
				const ch = text[j];
				if (ch === '\\') { j += 2; continue; }
				j++;
				if (ch === '"') break;
			}
			return ['quoted', Math.min(j, this.n)];
		}

		if (c === '[') {
			const bracketEnd = this.scanBracket(i);
			if (bracketEnd !== null) return ['bracket-argument', bracketEnd];
		}

		// unquoted run; a backslash escapes whatever follows it
		let j = i;
		while (j < this.n) {
			const ch = text.charAt(j);
			if (ch === '\\') { j += 2; continue; }
			if (isUnquotedStop(ch)) break;
			j++;
		}
		j = Math.min(j, this.n);
		const run = text.slice(i, j);
		if (WORD_RE.test(run)) return ['word', j];
		if (NUMBER_RE.test(run)) return ['number', j];
		if (DEREF_RE.test(run)) return ['deref', j];
		return ['unquoted', j];
	}

	// `[==[ ... ]==]` starting at `at`; returns the end offset, or null when `at` does not open a bracket.
	private scanBracket(at: number): number | null {
		BRACKET_OPEN_RE.lastIndex = at;
		const m = BRACKET_OPEN_RE.exec(this.text);
		if (!m) return null;
		const close = `]${m[1] ?? ''}]`;
		const bodyStart = at + m[0].length;
		const closeAt = this.text.indexOf(close, bodyStart);
		return closeAt < 0 ? this.n : closeAt + close.length;
	}
}

export function tokenize(text: string): Token[] {
	const tz = new Tokenizer(text);
	const out: Token[] = [];
	for (let t = tz.next(); t; t = tz.next()) out.push(t);
	return out;
}
