#!/usr/bin/env node
import {
	createConnection,
	TextDocuments,
	ProposedFeatures,
	DidChangeConfigurationNotification,
	DidChangeWatchedFilesNotification,
	TextDocumentSyncKind,
	type Connection,
	type DocumentSymbolParams,
	type InitializeParams,
	type InitializeResult,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import fs from 'node:fs';
import path from 'node:path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { type CommandRegistry, loadCommandRegistry } from './commands/registry';
import { CONFIG_FILE_GLOBS, findConfigFile, loadConfigFile, registryFor } from './config/loader';
import type { BodyNode } from './cst/nodes';
import {
	type DiagCode,
	LISTFMT_DIAGCODES,
	LintContext,
	filterDiagnostics,
	parseDisabledDiagList,
	toDiagnostics,
} from './diagnostics';
import { ParseError } from './errors';
import { parse } from './parse/statement';
import { documentSymbols } from './symbols';
import { isPlainObject } from './utils';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const settings = {
	// explicit config file; when empty the nearest .listfmt.yaml above each document is used
	configPath: '',
	logFile: '',
	debug: false,
};

let disabledDiagCodes = new Set<DiagCode>();

// Replaces the disabled set; true when it changed.
function setDisabledDiagnostics(raw: unknown): boolean {
	const next = parseDisabledDiagList(raw);
	const changed = next.size !== disabledDiagCodes.size || [...next].some(code => !disabledDiagCodes.has(code));
	disabledDiagCodes = next;
	return changed;
}

function log(message: string) {
	connection.console.log(`[listfmt] ${message}`);
	if (!settings.logFile) return;
	try {
		fs.appendFileSync(settings.logFile, `${new Date().toISOString()} ${message}\n`);
	} catch (err) {
		if (settings.debug) console.warn('[listfmt] failed to append to log file', err);
	}
}

function applySettings(raw: unknown): boolean {
	if (!isPlainObject(raw)) return false;
	let changed = false;
	if (typeof raw.configPath === 'string' && raw.configPath !== settings.configPath) {
		settings.configPath = raw.configPath;
		changed = true;
	}
	if (typeof raw.logFile === 'string') settings.logFile = raw.logFile;
	if (typeof raw.debug === 'boolean') settings.debug = raw.debug;
	const diagnostics = raw.diagnostics;
	if (isPlainObject(diagnostics) && diagnostics.disable !== undefined) {
		changed = setDisabledDiagnostics(diagnostics.disable) || changed;
	}
	return changed;
}

// -------------------------------------------------
// Configuration per config file, tree per document
// -------------------------------------------------
type Environment = {
	registry: CommandRegistry;
	disabled: ReadonlySet<DiagCode>;
};
const environmentCache = new Map<string, Promise<Environment>>(); // key: config file path, '' for none

async function loadEnvironment(configPath: string): Promise<Environment> {
	if (!configPath) {
		return { registry: await loadCommandRegistry(), disabled: new Set() };
	}
	const diag = new LintContext();
	try {
		const config = await loadConfigFile(configPath, diag);
		for (const r of diag.records) log(`${configPath}: ${r.message}`);
		return { registry: await registryFor(config), disabled: parseDisabledDiagList(config.disabledDiagnostics) };
	} catch (e) {
		connection.console.error(`[listfmt] ${String(e)}; using defaults`);
		return { registry: await loadCommandRegistry(), disabled: new Set() };
	}
}

async function configPathFor(doc: TextDocument): Promise<string> {
	if (settings.configPath) return settings.configPath;
	const uri = URI.parse(doc.uri);
	if (uri.scheme !== 'file') return '';
	return (await findConfigFile(path.dirname(uri.fsPath))) ?? '';
}

async function environmentFor(doc: TextDocument): Promise<Environment> {
	const key = await configPathFor(doc);
	let env = environmentCache.get(key);
	if (!env) {
		if (settings.debug) console.warn(`[listfmt] loading configuration ${key || '(defaults)'}`);
		env = loadEnvironment(key);
		environmentCache.set(key, env);
	}
	return env;
}

type TreeCache = { version: number; body: BodyNode | null; lint: LintContext };
const treeCache = new Map<string, TreeCache>(); // key: doc.uri

async function getTree(doc: TextDocument): Promise<TreeCache> {
	const hit = treeCache.get(doc.uri);
	if (hit && hit.version === doc.version) return hit;
	const env = await environmentFor(doc);
	const lint = new LintContext();
	let body: BodyNode | null = null;
	try {
		body = parse(doc.getText(), { registry: env.registry, lint });
	} catch (e) {
		if (!(e instanceof ParseError)) throw e;
		if (settings.debug) console.warn('[listfmt] parse failed', e);
		lint.record(LISTFMT_DIAGCODES.SYNTAX, e.message, e.location);
	}
	const entry: TreeCache = { version: doc.version, body, lint };
	treeCache.set(doc.uri, entry);
	return entry;
}

async function validateTextDocument(doc: TextDocument) {
	const entry = await getTree(doc);
	const env = await environmentFor(doc);
	const kept = filterDiagnostics(filterDiagnostics(entry.lint.records, disabledDiagCodes), env.disabled);
	try {
		await connection.sendDiagnostics({ uri: doc.uri, diagnostics: toDiagnostics(kept) });
	} catch (e) {
		log(`sendDiagnostics error: ${String(e)}`);
	}
}

async function revalidateAllOpenDocs() {
	treeCache.clear();
	for (const d of documents.all()) await validateTextDocument(d);
}

function reportFailure(what: string) {
	return (e: unknown) => connection.console.error(`[listfmt] ${what} failed: ${String(e)}`);
}

// whether the client lets us register file watchers at run time
let canWatchFiles = false;

connection.onInitialize((params: InitializeParams): InitializeResult => {
	applySettings(params.initializationOptions);
	canWatchFiles = !!params.capabilities.workspace?.didChangeWatchedFiles?.dynamicRegistration;
	if (settings.logFile) log('initialized');
	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			documentSymbolProvider: true,
		},
	};
});

connection.onInitialized(() => {
	connection.client.register(DidChangeConfigurationNotification.type, undefined).catch(reportFailure('configuration registration'));
	if (!canWatchFiles) return;
	const watchers = CONFIG_FILE_GLOBS.map(globPattern => ({ globPattern }));
	connection.client.register(DidChangeWatchedFilesNotification.type, { watchers }).catch(reportFailure('config file watch registration'));
});

connection.onDidChangeConfiguration(async change => {
	const section: unknown = isPlainObject(change.settings) ? change.settings.listfmt : undefined;
	if (!applySettings(section)) return;
	environmentCache.clear();
	await revalidateAllOpenDocs().catch(reportFailure('revalidation'));
});

documents.onDidChangeContent(async change => {
	await validateTextDocument(change.document).catch(reportFailure('validation'));
});

documents.onDidClose(e => {
	treeCache.delete(e.document.uri);
});

connection.onDocumentSymbol(async (params: DocumentSymbolParams, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri);
	if (!doc) return [];
	const { body } = await getTree(doc);
	return body ? documentSymbols(body) : [];
});

// A watched .listfmt.* file changed on disk: drop cached configurations
connection.onDidChangeWatchedFiles(async () => {
	environmentCache.clear();
	await revalidateAllOpenDocs().catch(reportFailure('revalidation'));
});

connection.onShutdown(() => {
	log('onShutdown: clearing caches');
	treeCache.clear();
	environmentCache.clear();
});

connection.onExit(() => {
	log('onExit: terminating process');
	process.exit(0);
});

documents.listen(connection);
connection.listen();
