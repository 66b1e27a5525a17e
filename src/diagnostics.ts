import { DiagnosticSeverity, type Diagnostic, type Range } from 'vscode-languageserver/node';
import type { Location } from './core/tokens';

export const LISTFMT_DIAGCODES = {
	SYNTAX: 'LF000',
	MISSING_KWARG: 'LF100',
	AMBIGUOUS_BOOL: 'LF200',
	INVALID_OVERRIDE: 'LF201',
} as const;
export type DiagCode = typeof LISTFMT_DIAGCODES[keyof typeof LISTFMT_DIAGCODES];

const DIAG_VALUE_SET = new Set<string>(Object.values(LISTFMT_DIAGCODES));

function isDiagCode(v: string): v is DiagCode {
	return DIAG_VALUE_SET.has(v);
}

// Friendly kebab-case names (missing-kwarg -> LF100). Syntax errors are only addressable by code.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(LISTFMT_DIAGCODES)) {
		if (code === LISTFMT_DIAGCODES.SYNTAX) continue;
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

/**
 * Disabled codes from a setting: an array of codes or names, or one string of them
 * separated by commas or whitespace. Entries that name no diagnostic are dropped.
 */
export function parseDisabledDiagList(input: unknown): Set<DiagCode> {
	const entries: unknown[] = typeof input === 'string' ? input.split(/[,\s]+/) : Array.isArray(input) ? input : [];
	const codes = new Set<DiagCode>();
	for (const entry of entries) {
		const code = typeof entry === 'string' ? normalizeDiagCode(entry) : null;
		if (code) codes.add(code);
	}
	return codes;
}

export function filterDiagnostics<T extends Pick<LintRecord, 'code'>>(records: readonly T[], disabled: ReadonlySet<DiagCode>): T[] {
	return records.filter(r => !disabled.has(r.code));
}

const SEVERITY: Record<DiagCode, DiagnosticSeverity> = {
	LF000: DiagnosticSeverity.Error,
	LF100: DiagnosticSeverity.Warning,
	LF200: DiagnosticSeverity.Warning,
	LF201: DiagnosticSeverity.Warning,
};

function messageFor(code: DiagCode, payload: string): string {
	switch (code) {
		case LISTFMT_DIAGCODES.SYNTAX: return payload;
		case LISTFMT_DIAGCODES.MISSING_KWARG: return `Missing required keyword argument "${payload}"`;
		case LISTFMT_DIAGCODES.AMBIGUOUS_BOOL: return `Ambiguous truthiness of string "${payload}" evaluates to false`;
		case LISTFMT_DIAGCODES.INVALID_OVERRIDE: return `Ignoring invalid per-command override "${payload}"`;
	}
}

/** Append-only diagnostic channel. The parser and config layer only ever write to it. */
export interface LintSink {
	record(code: DiagCode, payload: string, location: Location | null): void;
}

export interface LintRecord {
	code: DiagCode;
	payload: string;
	location: Location | null;
	message: string;
	severity: DiagnosticSeverity;
}

export function locationToRange(loc: Location | null): Range {
	const start = loc ? { line: loc.line - 1, character: loc.col } : { line: 0, character: 0 };
	return { start, end: start };
}

export class LintContext implements LintSink {
	readonly records: LintRecord[] = [];

	record(code: DiagCode, payload: string, location: Location | null): void {
		this.records.push({ code, payload, location, message: messageFor(code, payload), severity: SEVERITY[code] });
	}

	toDiagnostics(source = 'listfmt'): Diagnostic[] {
		return toDiagnostics(this.records, source);
	}
}

export function toDiagnostics(records: readonly LintRecord[], source = 'listfmt'): Diagnostic[] {
	return records.map(r => ({
		range: locationToRange(r.location),
		severity: r.severity,
		message: r.message,
		source,
		code: r.code,
	}));
}
