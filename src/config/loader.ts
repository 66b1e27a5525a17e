import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import { RegistryError } from '../errors';
import type { LintSink } from '../diagnostics';
import { type CommandRegistry, loadCommandRegistry } from '../commands/registry';
import { Configuration, validateConfigObject } from './configuration';

// Looked up in this order in each directory
export const CONFIG_FILENAMES = ['.listfmt.yaml', '.listfmt.yml', '.listfmt.json'] as const;

// Workspace globs matching a config file in any directory, for file watchers.
export const CONFIG_FILE_GLOBS: readonly string[] = CONFIG_FILENAMES.map(name => `**/${name}`);

async function isFile(p: string): Promise<boolean> {
	try {
		return (await fs.stat(p)).isFile();
	} catch {
		return false;
	}
}

// Nearest config file at or above `startDir`, or null.
export async function findConfigFile(startDir: string): Promise<string | null> {
	let dir = path.resolve(startDir);
	for (;;) {
		for (const name of CONFIG_FILENAMES) {
			const candidate = path.join(dir, name);
			if (await isFile(candidate)) return candidate;
		}
		const parent = path.dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

export function configurationFromObject(obj: unknown, diag: LintSink, source = '<inline>'): Configuration {
	return Configuration.fromRaw(validateConfigObject(obj, source), diag);
}

// JSON files are read by the same YAML loader.
export async function loadConfigFile(configPath: string, diag: LintSink): Promise<Configuration> {
	let raw: string;
	try {
		raw = await fs.readFile(configPath, 'utf8');
	} catch (err) {
		throw new RegistryError(`cannot read configuration (${String(err)})`, configPath);
	}
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		throw new RegistryError(`cannot parse configuration (${String(err)})`, configPath);
	}
	// An empty file is an empty configuration
	return configurationFromObject(obj ?? {}, diag, configPath);
}

// Bundled command table with the configuration's `additional_commands` on top.
export async function registryFor(config: Configuration): Promise<CommandRegistry> {
	const builtin = await loadCommandRegistry();
	return builtin.withOverrides(config.additionalCommands);
}
