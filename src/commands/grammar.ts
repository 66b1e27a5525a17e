/*
	Data-driven command grammar. A command's argument list is described by one of
	three descriptor kinds; keyword sub-grammars nest the same descriptors. The
	parser interprets these records directly (see parse/args.ts `parseGrammar`).
*/

// Exact count, or zero-or-one / zero-or-more / one-or-more
export type Npargs = number | '?' | '*' | '+';

export interface PositionalSpec {
	npargs: Npargs;
	// Upper-cased bare words that count as zero-width flags instead of values
	flags: readonly string[];
}

export interface StandardGrammar {
	kind: 'standard';
	npargs: Npargs;
	flags: readonly string[];
	kwargs: ReadonlyMap<string, Grammar>;
	// Keywords that must appear; checked by the lint pass, never by the parser
	required: readonly string[];
}

export interface PositionalGrammar extends PositionalSpec {
	kind: 'positional';
	sortable: boolean;
}

// Boolean expression grammar of if()/elseif()/while(); has no parameters.
export interface ConditionalGrammar {
	kind: 'conditional';
}

export type Grammar = StandardGrammar | PositionalGrammar | ConditionalGrammar;
export type CommandGrammar = StandardGrammar | ConditionalGrammar;

export const CONDITIONAL: ConditionalGrammar = { kind: 'conditional' };

export const GENERIC_COMMAND: StandardGrammar = {
	kind: 'standard',
	npargs: '*',
	flags: [],
	kwargs: new Map(),
	required: [],
};

// Raw (file) form, as written in data/commands.yaml and in `additional_commands`.
export type RawNpargs = number | '?' | '*' | '+';

export interface RawGrammarObject {
	kind?: 'standard' | 'positional' | 'conditional';
	pargs?: RawNpargs;
	flags?: string[];
	kwargs?: Record<string, RawGrammar>;
	required?: readonly string[];
	sortable?: boolean;
}

export type RawGrammar = RawNpargs | RawGrammarObject;
export type RawCommandTable = Record<string, RawGrammarObject>;

export interface CommandSpecFile {
	version?: number;
	commands: RawCommandTable;
}

const upper = (words: readonly string[] | undefined) => (words ?? []).map(w => w.toUpperCase());

export function compileGrammar(raw: RawGrammar): Grammar {
	if (typeof raw !== 'object') {
		return { kind: 'positional', npargs: raw, flags: [], sortable: false };
	}
	if (raw.kind === 'conditional') return CONDITIONAL;
	if (raw.kind === 'positional') {
		return { kind: 'positional', npargs: raw.pargs ?? '*', flags: upper(raw.flags), sortable: !!raw.sortable };
	}
	const kwargs = new Map<string, Grammar>();
	for (const [word, sub] of Object.entries(raw.kwargs ?? {})) {
		kwargs.set(word.toUpperCase(), compileGrammar(sub));
	}
	return {
		kind: 'standard',
		npargs: raw.pargs ?? '*',
		flags: upper(raw.flags),
		kwargs,
		required: upper(raw.required),
	};
}

// Top-level commands always get an argument tree: a positional-only spec becomes a
// standard grammar without keywords.
export function compileCommand(raw: RawGrammarObject): CommandGrammar {
	const g = compileGrammar(raw);
	if (g.kind !== 'positional') return g;
	return { kind: 'standard', npargs: g.npargs, flags: g.flags, kwargs: new Map(), required: [] };
}

export function npargsIsExact(npargs: Npargs): npargs is number {
	return typeof npargs === 'number';
}

export function pargsAreFull(npargs: Npargs, nconsumed: number): boolean {
	if (typeof npargs === 'number') return nconsumed >= npargs;
	if (npargs === '?') return nconsumed >= 1;
	return false;
}
