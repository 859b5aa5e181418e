#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { isEmpty, renderDocument, toMarkdown } from './markdown/node';
import { Engine, markdownInputs, nullInput, textInputs } from './runtime/engine';
import { MarqConfig, loadConfig, loadConfigForScript } from './runtime/config';
import { errorMessage } from './runtime/errors';
import { updateWith } from './runtime/update';
import { RuntimeValue, selectedNode, valueToString } from './runtime/values';

export const VERSION = '0.1.0';

const USAGE = `
marq - jq-like queries over markdown v${VERSION}

Usage:
  marq <query> [files...]         Run a query over markdown files (stdin when none)
  marq -f <query.marq> [files...] Read the query from a file
  marq --parse <query>            Parse and print the AST
  marq --lex <query>              Tokenize and print tokens
  marq --help                     Show this help message

Options:
  -U, --update                    Merge results back into the document and print it
  -f, --from-file <path>          Read the query from a file
  --tree-walk                     Use the tree-walking evaluator instead of the compiler
  --max-depth <n>                 Maximum call stack depth (default: 256)
  --search-path <dir>             Add a module search path (repeatable)
  --input-format <format>         markdown (default), text (one input per line) or null
  --arg <name> <value>            Bind a string variable
  --config <path>                 Path to marq.config.json (auto-detected by default)
  --trace                         Enable execution tracing
  --version                       Print the version

Examples:
  marq '.h2' README.md
  marq -U '.code | upcase()' notes.md
  marq --input-format null '[1, 2, 3] | len()'
`;

type InputFormat = 'markdown' | 'text' | 'null';

interface CliOptions {
  query: string | null;
  queryFile: string | null;
  files: string[];
  update: boolean;
  treeWalk: boolean;
  maxDepth: number | null;
  searchPaths: string[];
  inputFormat: InputFormat;
  defines: [string, string][];
  configPath: string | null;
  trace: boolean;
  lex: boolean;
  parse: boolean;
  help: boolean;
  version: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => string;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text + '\n'),
  stderr: text => process.stderr.write(text + '\n'),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
};

function getArg(args: string[], index: number, flag: string): string {
  if (index + 1 >= args.length) {
    throw new Error(`Missing value for ${flag}`);
  }
  return args[index + 1];
}

function isInputFormat(value: string): value is InputFormat {
  return value === 'markdown' || value === 'text' || value === 'null';
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    query: null,
    queryFile: null,
    files: [],
    update: false,
    treeWalk: false,
    maxDepth: null,
    searchPaths: [],
    inputFormat: 'markdown',
    defines: [],
    configPath: null,
    trace: false,
    lex: false,
    parse: false,
    help: false,
    version: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--version':
        options.version = true;
        break;
      case '-U':
      case '--update':
        options.update = true;
        break;
      case '--tree-walk':
        options.treeWalk = true;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--lex':
        options.lex = true;
        break;
      case '--parse':
        options.parse = true;
        break;
      case '-f':
      case '--from-file':
        options.queryFile = getArg(args, i++, arg);
        break;
      case '--max-depth': {
        const depth = Number(getArg(args, i++, arg));
        if (!Number.isInteger(depth) || depth < 1) {
          throw new Error(`Invalid value for --max-depth: ${args[i]}`);
        }
        options.maxDepth = depth;
        break;
      }
      case '--search-path':
        options.searchPaths.push(getArg(args, i++, arg));
        break;
      case '--input-format': {
        const format = getArg(args, i++, arg);
        if (!isInputFormat(format)) {
          throw new Error(`Unknown input format "${format}". Use markdown, text or null.`);
        }
        options.inputFormat = format;
        break;
      }
      case '--arg': {
        const name = getArg(args, i++, arg);
        options.defines.push([name, getArg(args, i++, arg)]);
        break;
      }
      case '--config':
        options.configPath = getArg(args, i++, arg);
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (options.queryFile === null) {
    options.query = positional.shift() ?? null;
  }
  options.files = positional;
  return options;
}

/** Display form of one result. None and empty markdown print nothing. */
function formatOutput(value: RuntimeValue): string | null {
  if (value.kind === 'none') return null;
  if (value.kind === 'markdown') {
    const node = selectedNode(value);
    return node === null || isEmpty(node) ? null : toMarkdown(node);
  }
  return valueToString(value);
}

/** One input set per file, or one for stdin. Each is evaluated on its own. */
function readInputSets(options: CliOptions, io: CliIO): RuntimeValue[][] {
  if (options.inputFormat === 'null') return [nullInput()];

  const texts = options.files.length === 0
    ? [io.readStdin()]
    : options.files.map(file => {
      const filePath = path.resolve(file);
      if (!fs.existsSync(filePath)) {
        throw new Error(`File not found: ${filePath}`);
      }
      return fs.readFileSync(filePath, 'utf-8');
    });

  return texts.map(text => (options.inputFormat === 'text' ? textInputs(text) : markdownInputs(text)));
}

function createEngine(options: CliOptions, config: MarqConfig): Engine {
  const engine = new Engine({
    maxCallStackDepth: options.maxDepth ?? config.maxCallStackDepth,
    useCompiler: options.treeWalk ? false : config.useCompiler,
    trace: options.trace || (config.trace ?? false),
  });

  const searchPaths = [...options.searchPaths, ...(config.searchPaths ?? [])];
  if (searchPaths.length > 0) {
    engine.setSearchPaths(searchPaths);
  }
  for (const [name, value] of Object.entries(config.defines ?? {})) {
    engine.defineStringValue(name, value);
  }
  for (const [name, value] of options.defines) {
    engine.defineStringValue(name, value);
  }
  engine.loadBuiltinModule();
  return engine;
}

/** Run the CLI with the given arguments and return its exit code. */
export function run(args: string[], io: CliIO = defaultIO): number {
  try {
    const options = parseArgs(args);

    if (options.version) {
      io.stdout(VERSION);
      return 0;
    }
    if (options.help || (options.query === null && options.queryFile === null)) {
      io.stdout(USAGE);
      return options.help ? 0 : 1;
    }

    let source: string;
    if (options.queryFile !== null) {
      const filePath = path.resolve(options.queryFile);
      if (!fs.existsSync(filePath)) {
        throw new Error(`File not found: ${filePath}`);
      }
      source = fs.readFileSync(filePath, 'utf-8');
    } else {
      source = options.query ?? '';
    }

    if (options.lex) {
      for (const tok of new Lexer(source).tokenize()) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        io.stdout(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
      return 0;
    }

    if (options.parse) {
      const ast = new Parser().parse(new Lexer(source).tokenize());
      io.stdout(JSON.stringify(ast, (key, value: unknown) => (key === 'token' ? undefined : value), 2));
      return 0;
    }

    const config = options.configPath !== null
      ? loadConfig(options.configPath)
      : options.queryFile !== null ? loadConfigForScript(options.queryFile) : loadConfig();
    const engine = createEngine(options, config);
    for (const inputs of readInputSets(options, io)) {
      const results = engine.eval(source, inputs);

      if (options.update) {
        const nodes = updateWith(inputs, results).flatMap(value => {
          if (value.kind !== 'markdown') return [];
          const node = selectedNode(value);
          return node === null ? [] : [node];
        });
        io.stdout(renderDocument(nodes));
        continue;
      }

      for (const result of results) {
        const text = formatOutput(result);
        if (text !== null) io.stdout(text);
      }
    }
    return 0;
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return 1;
  }
}

function main(): void {
  process.exitCode = run(process.argv.slice(2));
}

if (require.main === module) {
  main();
}
