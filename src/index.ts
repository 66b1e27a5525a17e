// Library entry point: tokenizer, parser, command registry, configuration and lint.
export { type Location, type Token, type TokenKind, TokenStream, formatLocation, locationAfter } from './core/tokens';
export { Tokenizer, tokenize } from './core/tokenizer';
export * from './commands/grammar';
export {
	BUNDLED_COMMANDS_YAML,
	CommandRegistry,
	bundledCommandRegistry,
	loadCommandRegistry,
	loadCommandSpecFile,
	validateCommandSpec,
} from './commands/registry';
export * from './cst/nodes';
export { dumpTree, locationOf, reconstruct, semanticTokensOf, tokensOf, walk } from './cst/utils';
export { type Breaker, type Breakstack, PAREN_BREAKER, keywordBreaker, shouldBreak } from './parse/breakers';
export {
	CONDITIONAL_FLAGS,
	type ParseContext,
	checkRequiredKwargs,
	createParseContext,
	parseConditionalGroup,
	parseGrammar,
	parseKeywordGroup,
	parseParenGroup,
	parsePositionalGroup,
	parseStandardArgs,
} from './parse/args';
export { type ParseOptions, parse, parseListfile, parseStatement, parseTokens } from './parse/statement';
export { lintListfile } from './lint';
export {
	LISTFMT_DIAGCODES,
	type DiagCode,
	type LintRecord,
	type LintSink,
	LintContext,
	filterDiagnostics,
	normalizeDiagCode,
	parseDisabledDiagList,
	toDiagnostics,
} from './diagnostics';
export { InternalParseError, ParseError, RegistryError } from './errors';
export * from './config/configuration';
export { CONFIG_FILENAMES, CONFIG_FILE_GLOBS, configurationFromObject, findConfigFile, loadConfigFile, registryFor } from './config/loader';
export { documentSymbols } from './symbols';
