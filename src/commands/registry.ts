import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import schema from './commandSpecSchema.json';
import { RegistryError } from '../errors';
import {
	type CommandGrammar,
	type CommandSpecFile,
	type RawCommandTable,
	GENERIC_COMMAND,
	compileCommand,
} from './grammar';

// Resolves the same from src/commands and from the compiled dist/commands.
export const BUNDLED_COMMANDS_YAML = path.resolve(__dirname, '..', '..', 'data', 'commands.yaml');

let validator: ValidateFunction<CommandSpecFile> | null = null;

function getValidator(): ValidateFunction<CommandSpecFile> {
	if (!validator) {
		const ajv = new Ajv2020({ allErrors: true, strict: false });
		validator = ajv.compile<CommandSpecFile>(schema);
	}
	return validator;
}

// Validate a parsed command table; `source` names the file (or setting) in errors.
export function validateCommandSpec(obj: unknown, source: string): CommandSpecFile {
	const validate = getValidator();
	if (!validate(obj)) {
		const msg = (validate.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`).join('\n');
		throw new RegistryError(`command specification failed schema validation:\n${msg}`, source);
	}
	return obj;
}

/**
 * Case-insensitive lookup of command grammars. Immutable: overrides produce a new
 * registry layered over this one.
 */
export class CommandRegistry {
	private readonly commands: ReadonlyMap<string, CommandGrammar>;

	constructor(commands: ReadonlyMap<string, CommandGrammar>) {
		this.commands = commands;
	}

	static empty(): CommandRegistry {
		return new CommandRegistry(new Map());
	}

	static fromRaw(table: RawCommandTable): CommandRegistry {
		return CommandRegistry.empty().withOverrides(table);
	}

	// Unknown commands take any number of positional arguments.
	lookup(name: string): CommandGrammar {
		return this.commands.get(name.toLowerCase()) ?? GENERIC_COMMAND;
	}

	has(name: string): boolean {
		return this.commands.has(name.toLowerCase());
	}

	get names(): string[] {
		return [...this.commands.keys()].sort();
	}

	withOverrides(table: RawCommandTable): CommandRegistry {
		const merged = new Map(this.commands);
		for (const [name, raw] of Object.entries(table)) merged.set(name.toLowerCase(), compileCommand(raw));
		return new CommandRegistry(merged);
	}
}

// Parsed and validated form of a table file's text.
function parseCommandSpec(raw: string, specPath: string): CommandSpecFile {
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		throw new RegistryError(`cannot parse command specification (${String(err)})`, specPath);
	}
	if (!obj) {
		throw new RegistryError('command specification appears to be empty or could not be parsed', specPath);
	}
	return validateCommandSpec(obj, specPath);
}

export async function loadCommandSpecFile(specPath: string): Promise<CommandSpecFile> {
	let raw: string;
	try {
		raw = await fs.promises.readFile(specPath, 'utf8');
	} catch (err) {
		throw new RegistryError(`cannot read command specification (${String(err)})`, specPath);
	}
	return parseCommandSpec(raw, specPath);
}

let bundled: CommandRegistry | null = null;

/**
 * The built-in table from data/commands.yaml, read synchronously so that parsing
 * without an explicit registry can use it. Cached once loaded.
 */
export function bundledCommandRegistry(): CommandRegistry {
	if (bundled) return bundled;
	let raw: string;
	try {
		raw = fs.readFileSync(BUNDLED_COMMANDS_YAML, 'utf8');
	} catch (err) {
		throw new RegistryError(`cannot read command specification (${String(err)})`, BUNDLED_COMMANDS_YAML);
	}
	bundled = CommandRegistry.fromRaw(parseCommandSpec(raw, BUNDLED_COMMANDS_YAML).commands);
	return bundled;
}

// Loads a command table; without a path, the bundled table.
export async function loadCommandRegistry(specPath?: string): Promise<CommandRegistry> {
	if (!specPath) return bundledCommandRegistry();
	return CommandRegistry.fromRaw((await loadCommandSpecFile(specPath)).commands);
}
