import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import schema from './configSchema.json';
import type { RawCommandTable } from '../commands/grammar';
import { validateCommandSpec } from '../commands/registry';
import { LISTFMT_DIAGCODES, type LintSink } from '../diagnostics';
import { RegistryError } from '../errors';
import { AssertNever, isPlainObject } from '../utils';

export const LINE_ENDINGS = ['unix', 'windows', 'auto'] as const;
export type LineEnding = typeof LINE_ENDINGS[number];
export type DetectedLineEnding = Exclude<LineEnding, 'auto'>;

export const COMMAND_CASES = ['canonical', 'lower', 'upper', 'unchanged'] as const;
export type CommandCase = typeof COMMAND_CASES[number];

export const KEYWORD_CASES = ['unchanged', 'lower', 'upper'] as const;
export type KeywordCase = typeof KEYWORD_CASES[number];

// Keys a `per_command` entry may override.
export const PER_COMMAND_KEYS = [
	'lineWidth',
	'tabSize',
	'maxSubargsPerLine',
	'separateCtrlNameWithSpace',
	'separateFnNameWithSpace',
	'dangleParens',
	'autosort',
	'commandCase',
	'keywordCase',
] as const;
export type PerCommandKey = typeof PER_COMMAND_KEYS[number];

export interface ConfigOptions {
	lineWidth: number;
	tabSize: number;
	maxSubargsPerLine: number;
	separateCtrlNameWithSpace: boolean;
	separateFnNameWithSpace: boolean;
	dangleParens: boolean;
	bulletChar: string;
	enumChar: string;
	lineEnding: LineEnding;
	commandCase: CommandCase;
	keywordCase: KeywordCase;
	alwaysWrap: readonly string[];
	// wrapping algorithms tried, in order, on successive reflow attempts
	algorithmOrder: readonly number[];
	autosort: boolean;
	enableMarkup: boolean;
	firstCommentIsLiteral: boolean;
	literalCommentPattern: string | null;
	fencePattern: string;
	rulerPattern: string;
	emitByteorderMark: boolean;
	hashrulerMinLength: number;
	canonicalizeHashrulers: boolean;
	inputEncoding: string;
	outputEncoding: string;
	additionalCommands: RawCommandTable;
	perCommand: ReadonlyMap<string, PerCommandOverrides>;
	disabledDiagnostics: readonly string[];
}

export type PerCommandOverrides = { [K in PerCommandKey]?: ConfigOptions[K] };

// File form: snake_case keys, as written in .listfmt.yaml
export type RawConfiguration = {
	line_width: number;
	tab_size: number;
	max_subargs_per_line: number;
	separate_ctrl_name_with_space: boolean;
	separate_fn_name_with_space: boolean;
	dangle_parens: boolean;
	bullet_char: string;
	enum_char: string;
	line_ending: LineEnding;
	command_case: CommandCase;
	keyword_case: KeywordCase;
	always_wrap: string[];
	algorithm_order: number[];
	autosort: boolean;
	enable_markup: boolean;
	first_comment_is_literal: boolean;
	literal_comment_pattern: string | null;
	fence_pattern: string;
	ruler_pattern: string;
	emit_byteorder_mark: boolean;
	hashruler_min_length: number;
	canonicalize_hashrulers: boolean;
	input_encoding: string;
	output_encoding: string;
	additional_commands: RawCommandTable;
	per_command: Record<string, Record<string, string | number | boolean>>;
	disabled_diagnostics: string[];
};

export const DEFAULTS: Readonly<ConfigOptions> = {
	lineWidth: 80,
	tabSize: 2,
	maxSubargsPerLine: 3,
	separateCtrlNameWithSpace: false,
	separateFnNameWithSpace: false,
	dangleParens: false,
	bulletChar: '*',
	enumChar: '.',
	lineEnding: 'unix',
	commandCase: 'canonical',
	keywordCase: 'unchanged',
	alwaysWrap: [],
	algorithmOrder: [0, 1, 2, 3, 4],
	autosort: true,
	enableMarkup: true,
	firstCommentIsLiteral: false,
	literalCommentPattern: null,
	// preformatted fences and ruler lines inside comments
	fencePattern: '^\\s*([`~]{3}[`~]*)(.*)$',
	rulerPattern: '^\\s*[^\\w\\s]{3}.*[^\\w\\s]{3}$',
	emitByteorderMark: false,
	hashrulerMinLength: 10,
	canonicalizeHashrulers: true,
	inputEncoding: 'utf-8',
	outputEncoding: 'utf-8',
	additionalCommands: {},
	perCommand: new Map(),
	disabledDiagnostics: [],
};

const TRUE_WORDS = new Set(['y', 'yes', 't', 'true', '1', 'yup', 'yeah', 'yada']);
const FALSE_WORDS = new Set(['n', 'no', 'f', 'false', '0', 'nope', 'nah', 'nada']);

/**
 * Interpret a boolean-ish string. Anything outside the known vocabulary is false,
 * reported to `diag` as AMBIGUOUS_BOOL.
 */
export function parseBool(value: string, diag: LintSink): boolean {
	const lower = value.toLowerCase();
	if (TRUE_WORDS.has(lower)) return true;
	if (FALSE_WORDS.has(lower)) return false;
	diag.record(LISTFMT_DIAGCODES.AMBIGUOUS_BOOL, value, null);
	return false;
}

let validator: ValidateFunction | null = null;

export function validateConfigObject(obj: unknown, source: string): Record<string, unknown> {
	if (!validator) {
		const ajv = new Ajv2020({ allErrors: true, strict: false });
		validator = ajv.compile(schema);
	}
	if (!validator(obj) || !isPlainObject(obj)) {
		const msg = (validator.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`).join('\n');
		throw new RegistryError(`configuration failed schema validation:\n${msg}`, source);
	}
	return obj;
}

function readInt(v: unknown): number | undefined {
	return typeof v === 'number' && Number.isInteger(v) ? v : undefined;
}

function readString(v: unknown): string | undefined {
	return typeof v === 'string' ? v : undefined;
}

function readBool(v: unknown, diag: LintSink): boolean | undefined {
	if (typeof v === 'boolean') return v;
	if (typeof v === 'string') return parseBool(v, diag);
	return undefined;
}

function readChoice<T extends string>(v: unknown, choices: readonly T[]): T | undefined {
	return choices.find(c => c === v);
}

function readIntList(v: unknown): number[] | undefined {
	if (!Array.isArray(v)) return undefined;
	return v.filter((n): n is number => typeof n === 'number' && Number.isInteger(n));
}

function readStringList(v: unknown): string[] | undefined {
	if (typeof v === 'string') return v.split(/[,\s]+/).filter(Boolean);
	if (Array.isArray(v)) return v.filter((s): s is string => typeof s === 'string');
	return undefined;
}

function snakeCase(key: string): string {
	return key.replace(/[A-Z]/g, c => '_' + c.toLowerCase());
}

function put<K extends PerCommandKey>(out: PerCommandOverrides, key: K, value: ConfigOptions[K] | undefined): boolean {
	if (value === undefined) return false;
	out[key] = value;
	return true;
}

function readOverride(out: PerCommandOverrides, key: PerCommandKey, value: unknown, diag: LintSink): boolean {
	switch (key) {
		case 'lineWidth':
		case 'tabSize':
		case 'maxSubargsPerLine':
			return put(out, key, readInt(value));
		case 'separateCtrlNameWithSpace':
		case 'separateFnNameWithSpace':
		case 'dangleParens':
		case 'autosort':
			return put(out, key, readBool(value, diag));
		case 'commandCase': return put(out, key, readChoice(value, COMMAND_CASES));
		case 'keywordCase': return put(out, key, readChoice(value, KEYWORD_CASES));
		default: return AssertNever(key);
	}
}

/**
 * Entries are keyed by lower-cased command name; entries naming the same command
 * merge, later keys winning. A non-object entry is skipped, and so is a key that
 * cannot be overridden or carries a value of the wrong type.
 */
function parsePerCommand(raw: unknown, diag: LintSink): Map<string, PerCommandOverrides> {
	const table = new Map<string, PerCommandOverrides>();
	if (!isPlainObject(raw)) return table;
	for (const [command, entry] of Object.entries(raw)) {
		if (!isPlainObject(entry)) {
			diag.record(LISTFMT_DIAGCODES.INVALID_OVERRIDE, command, null);
			continue;
		}
		const name = command.toLowerCase();
		const overrides = table.get(name) ?? {};
		for (const [fileKey, value] of Object.entries(entry)) {
			const key = PER_COMMAND_KEYS.find(k => snakeCase(k) === fileKey);
			if (!key || !readOverride(overrides, key, value, diag)) {
				diag.record(LISTFMT_DIAGCODES.INVALID_OVERRIDE, `${command}.${fileKey}`, null);
			}
		}
		table.set(name, overrides);
	}
	return table;
}

export class Configuration implements ConfigOptions {
	readonly lineWidth: number;
	readonly tabSize: number;
	readonly maxSubargsPerLine: number;
	readonly separateCtrlNameWithSpace: boolean;
	readonly separateFnNameWithSpace: boolean;
	readonly dangleParens: boolean;
	readonly bulletChar: string;
	readonly enumChar: string;
	readonly lineEnding: LineEnding;
	readonly commandCase: CommandCase;
	readonly keywordCase: KeywordCase;
	readonly alwaysWrap: readonly string[];
	readonly algorithmOrder: readonly number[];
	readonly autosort: boolean;
	readonly enableMarkup: boolean;
	readonly firstCommentIsLiteral: boolean;
	readonly literalCommentPattern: string | null;
	readonly fencePattern: string;
	readonly rulerPattern: string;
	readonly emitByteorderMark: boolean;
	readonly hashrulerMinLength: number;
	readonly canonicalizeHashrulers: boolean;
	readonly inputEncoding: string;
	readonly outputEncoding: string;
	readonly additionalCommands: RawCommandTable;
	readonly perCommand: ReadonlyMap<string, PerCommandOverrides>;
	readonly disabledDiagnostics: readonly string[];
	// Set by withLineEnding() once the input's own line ending is known
	private readonly detectedEndl: string | null;

	constructor(options: Partial<ConfigOptions> = {}, detectedEndl: string | null = null) {
		const o: ConfigOptions = { ...DEFAULTS, ...options };
		this.lineWidth = o.lineWidth;
		this.tabSize = o.tabSize;
		this.maxSubargsPerLine = o.maxSubargsPerLine;
		this.separateCtrlNameWithSpace = o.separateCtrlNameWithSpace;
		this.separateFnNameWithSpace = o.separateFnNameWithSpace;
		this.dangleParens = o.dangleParens;
		this.bulletChar = o.bulletChar.charAt(0) || DEFAULTS.bulletChar;
		this.enumChar = o.enumChar.charAt(0) || DEFAULTS.enumChar;
		this.lineEnding = o.lineEnding;
		this.commandCase = o.commandCase;
		this.keywordCase = o.keywordCase;
		this.alwaysWrap = [...o.alwaysWrap];
		this.algorithmOrder = [...o.algorithmOrder];
		this.autosort = o.autosort;
		this.enableMarkup = o.enableMarkup;
		this.firstCommentIsLiteral = o.firstCommentIsLiteral;
		this.literalCommentPattern = o.literalCommentPattern;
		this.fencePattern = o.fencePattern;
		this.rulerPattern = o.rulerPattern;
		this.emitByteorderMark = o.emitByteorderMark;
		this.hashrulerMinLength = o.hashrulerMinLength;
		this.canonicalizeHashrulers = o.canonicalizeHashrulers;
		this.inputEncoding = o.inputEncoding;
		this.outputEncoding = o.outputEncoding;
		this.additionalCommands = structuredClone(o.additionalCommands);
		this.perCommand = new Map([...o.perCommand].map(([cmd, overrides]): [string, PerCommandOverrides] => [cmd, { ...overrides }]));
		this.disabledDiagnostics = [...o.disabledDiagnostics];
		this.detectedEndl = detectedEndl;
	}

	/**
	 * Build from the snake_case file form. Missing or mistyped fields take their
	 * defaults; boolean fields also accept the strings understood by parseBool.
	 */
	static fromRaw(raw: Record<string, unknown>, diag: LintSink): Configuration {
		const d = DEFAULTS;
		return new Configuration({
			lineWidth: readInt(raw.line_width) ?? d.lineWidth,
			tabSize: readInt(raw.tab_size) ?? d.tabSize,
			maxSubargsPerLine: readInt(raw.max_subargs_per_line) ?? d.maxSubargsPerLine,
			separateCtrlNameWithSpace: readBool(raw.separate_ctrl_name_with_space, diag) ?? d.separateCtrlNameWithSpace,
			separateFnNameWithSpace: readBool(raw.separate_fn_name_with_space, diag) ?? d.separateFnNameWithSpace,
			dangleParens: readBool(raw.dangle_parens, diag) ?? d.dangleParens,
			bulletChar: readString(raw.bullet_char) ?? d.bulletChar,
			enumChar: readString(raw.enum_char) ?? d.enumChar,
			lineEnding: readChoice(raw.line_ending, LINE_ENDINGS) ?? d.lineEnding,
			commandCase: readChoice(raw.command_case, COMMAND_CASES) ?? d.commandCase,
			keywordCase: readChoice(raw.keyword_case, KEYWORD_CASES) ?? d.keywordCase,
			alwaysWrap: readStringList(raw.always_wrap) ?? d.alwaysWrap,
			algorithmOrder: readIntList(raw.algorithm_order) ?? d.algorithmOrder,
			autosort: readBool(raw.autosort, diag) ?? d.autosort,
			enableMarkup: readBool(raw.enable_markup, diag) ?? d.enableMarkup,
			firstCommentIsLiteral: readBool(raw.first_comment_is_literal, diag) ?? d.firstCommentIsLiteral,
			literalCommentPattern: readString(raw.literal_comment_pattern) ?? d.literalCommentPattern,
			fencePattern: readString(raw.fence_pattern) ?? d.fencePattern,
			rulerPattern: readString(raw.ruler_pattern) ?? d.rulerPattern,
			emitByteorderMark: readBool(raw.emit_byteorder_mark, diag) ?? d.emitByteorderMark,
			hashrulerMinLength: readInt(raw.hashruler_min_length) ?? d.hashrulerMinLength,
			canonicalizeHashrulers: readBool(raw.canonicalize_hashrulers, diag) ?? d.canonicalizeHashrulers,
			inputEncoding: readString(raw.input_encoding) ?? d.inputEncoding,
			outputEncoding: readString(raw.output_encoding) ?? d.outputEncoding,
			additionalCommands: raw.additional_commands === undefined
				? d.additionalCommands
				: validateCommandSpec({ commands: raw.additional_commands }, 'additional_commands').commands,
			perCommand: parsePerCommand(raw.per_command, diag),
			disabledDiagnostics: readStringList(raw.disabled_diagnostics) ?? d.disabledDiagnostics,
		});
	}

	get endl(): string {
		if (this.detectedEndl !== null) return this.detectedEndl;
		return this.lineEnding === 'windows' ? '\r\n' : '\n';
	}

	// Copy whose endl follows the line ending detected in the input (for line_ending: auto)
	withLineEnding(detected: DetectedLineEnding): Configuration {
		return new Configuration(this, detected === 'windows' ? '\r\n' : '\n');
	}

	clone(): Configuration {
		return new Configuration(this, this.detectedEndl);
	}

	// Per-command override of `key` for `commandName`, else the global value.
	resolveForCommand<K extends PerCommandKey>(commandName: string, key: K): ConfigOptions[K] {
		const self: ConfigOptions = this;
		return this.perCommand.get(commandName.toLowerCase())?.[key] ?? self[key];
	}

	toDict(): RawConfiguration {
		const perCommand: RawConfiguration['per_command'] = {};
		for (const [cmd, overrides] of this.perCommand) {
			const entry: Record<string, string | number | boolean> = {};
			for (const key of PER_COMMAND_KEYS) {
				const value = overrides[key];
				if (value !== undefined) entry[snakeCase(key)] = value;
			}
			perCommand[cmd] = entry;
		}
		return {
			line_width: this.lineWidth,
			tab_size: this.tabSize,
			max_subargs_per_line: this.maxSubargsPerLine,
			separate_ctrl_name_with_space: this.separateCtrlNameWithSpace,
			separate_fn_name_with_space: this.separateFnNameWithSpace,
			dangle_parens: this.dangleParens,
			bullet_char: this.bulletChar,
			enum_char: this.enumChar,
			line_ending: this.lineEnding,
			command_case: this.commandCase,
			keyword_case: this.keywordCase,
			always_wrap: [...this.alwaysWrap],
			algorithm_order: [...this.algorithmOrder],
			autosort: this.autosort,
			enable_markup: this.enableMarkup,
			first_comment_is_literal: this.firstCommentIsLiteral,
			literal_comment_pattern: this.literalCommentPattern,
			fence_pattern: this.fencePattern,
			ruler_pattern: this.rulerPattern,
			emit_byteorder_mark: this.emitByteorderMark,
			hashruler_min_length: this.hashrulerMinLength,
			canonicalize_hashrulers: this.canonicalizeHashrulers,
			input_encoding: this.inputEncoding,
			output_encoding: this.outputEncoding,
			additional_commands: structuredClone(this.additionalCommands),
			per_command: perCommand,
			disabled_diagnostics: [...this.disabledDiagnostics],
		};
	}
}
