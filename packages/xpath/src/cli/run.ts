import { evalCommand } from './commands/eval.js';
import { parseCommand } from './commands/parse.js';
import { compileCommand } from './commands/compile.js';

export const VERSION = '0.1.0';

export const HELP = `
treequery - XPath 1.0 queries over XML documents

Usage:
  treequery <command> [options]

Commands:
  eval <expression> <file.xml>      Evaluate an expression against a document
  parse <expression>                Print the parsed expression as JSON
  compile <expression>              Print the JavaScript generated for an expression
  version                           Show version information
  help                              Show this help message

Options:
  --ns <prefix=uri>   Bind a namespace prefix (repeatable)
  --config <path>     Config file (default: treequery.config.yaml in the working directory)
  --json              Output as JSON (eval)
  --verbose           Debug logging
  --help, -h          Show help

Exit Codes:
  0  Success
  1  Failure (syntax, evaluation or file errors)
  2  Usage error (invalid arguments)

Examples:
  treequery eval '//book[@lang="en"]/title' library.xml
  treequery eval 'count(//a:item)' feed.xml --ns a=http://www.w3.org/2005/Atom
  treequery parse '/child::a[position() = 2]'
`;

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
  namespaces: string[];
}

/**
 * Split argv into a command, positionals and flags. A bare `-` or anything
 * after `--` is positional, so expressions such as `-1` can be passed.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const namespaces: string[] = [];
  const positionals: string[] = [];
  let command = '';
  let rest = false;

  const valueFlags = new Set(['config', 'ns']);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (!rest && arg === '--') {
      rest = true;
    } else if (!rest && arg.startsWith('--')) {
      const flag = arg.slice(2);
      const value = args[i + 1];
      if (valueFlags.has(flag) && value !== undefined) {
        i++;
        if (flag === 'ns') namespaces.push(value);
        else options[flag] = value;
      } else {
        flags[flag] = true;
      }
    } else if (!rest && arg.startsWith('-') && arg.length > 1 && !/^-[\d.]/.test(arg)) {
      for (const f of arg.slice(1)) {
        switch (f) {
          case 'h': flags['help'] = true; break;
          case 'v': flags['verbose'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options, namespaces };
}

/**
 * Turn `prefix=uri` pairs into a namespace map, or null when one is malformed.
 */
export function parseNamespaces(pairs: string[]): Record<string, string> | null {
  const namespaces: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0 || eq === pair.length - 1) return null;
    namespaces[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return namespaces;
}

function usage(message: string): number {
  console.error(message);
  console.error('Run "treequery help" for usage information.');
  return 2;
}

/**
 * Run the CLI and return its exit code.
 */
export function run(args: string[]): number {
  const { command, positionals, flags, options, namespaces: pairs } = parseArgs(args);

  if (flags['help'] || command === 'help') {
    console.log(HELP);
    return 0;
  }

  if (flags['version'] || command === 'version') {
    console.log(`treequery v${VERSION}`);
    return 0;
  }

  const namespaces = parseNamespaces(pairs);
  if (namespaces === null) {
    return usage(`Invalid --ns value, expected prefix=uri: ${pairs.join(' ')}`);
  }

  switch (command) {
    case 'eval': {
      const [expression, file] = positionals;
      if (expression === undefined || file === undefined) {
        return usage('Usage: treequery eval <expression> <file.xml>');
      }
      const result = evalCommand({
        expression,
        file,
        namespaces,
        config: options['config'],
        json: flags['json'],
        verbose: flags['verbose'],
      });
      return result.success ? 0 : 1;
    }

    case 'parse': {
      const [expression] = positionals;
      if (expression === undefined) {
        return usage('Usage: treequery parse <expression>');
      }
      return parseCommand({ expression }).success ? 0 : 1;
    }

    case 'compile': {
      const [expression] = positionals;
      if (expression === undefined) {
        return usage('Usage: treequery compile <expression>');
      }
      const result = compileCommand({
        expression,
        namespaces,
        config: options['config'],
        verbose: flags['verbose'],
      });
      return result.success ? 0 : 1;
    }

    case '': {
      console.log('treequery - XPath 1.0 queries over XML documents');
      console.log('');
      console.log('Run "treequery help" for usage information.');
      return 0;
    }

    default:
      return usage(`Unknown command: ${command}`);
  }
}
