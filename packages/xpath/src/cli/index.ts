export { run, parseArgs, parseNamespaces, VERSION, type ParsedArgs } from './run.js';
export { loadSettings, type Settings, type SettingsOptions } from './settings.js';
export { evalCommand, formatNode, type EvalOptions, type EvalResult, type EvalValue, type NodeSummary } from './commands/eval.js';
export { parseCommand, type ParseOptions, type ParseResult } from './commands/parse.js';
export { compileCommand, type CompileOptions, type CompileResult } from './commands/compile.js';
