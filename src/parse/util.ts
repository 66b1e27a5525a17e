import type { Token } from '../core/tokens';

export function isWhitespaceToken(t: Token | undefined): boolean {
	return !!t && (t.kind === 'whitespace' || t.kind === 'newline');
}

export function isCommentToken(t: Token | undefined): boolean {
	return !!t && (t.kind === 'comment' || t.kind === 'bracket-comment' || t.kind === 'format-off' || t.kind === 'format-on');
}

/**
 * Upper-cased spelling of a bare (unquoted) word, or null for any other token.
 * Keyword and flag lookups go through this so matching is case-insensitive.
 */
export function normalizedKeyword(t: Token | undefined): string | null {
	if (!t || (t.kind !== 'word' && t.kind !== 'unquoted')) return null;
	return t.spelling.toUpperCase();
}

const LINE_TAG_RE = /^#\s*listfmt\s*:\s*([A-Za-z-]+)\s*$/i;
const BRACKET_TAG_RE = /^#\[(=*)\[\s*listfmt\s*:\s*([A-Za-z-]+)\s*\]\1\]$/i;

// Directive carried by a `# listfmt: <tag>` comment, lower-cased.
export function getTag(t: Token | undefined): string | null {
	if (!t) return null;
	if (t.kind === 'comment') return LINE_TAG_RE.exec(t.spelling)?.[1]?.toLowerCase() ?? null;
	if (t.kind === 'bracket-comment') return BRACKET_TAG_RE.exec(t.spelling)?.[2]?.toLowerCase() ?? null;
	return null;
}
