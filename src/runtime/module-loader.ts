import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as AST from '../parser/ast';
import { Token } from '../lexer/tokens';
import { parseSource } from '../parser/parser';
import { MarqError, errorMessage } from './errors';
import { MacroExpander } from './macro-expander';

export const MODULE_EXTENSION = '.marq';

export const DEFAULT_SEARCH_PATHS = [
  '$HOME/.marq',
  '$ORIGIN/../lib/marq',
  '$ORIGIN/../lib',
  '$ORIGIN',
];

/** A parsed module, split into the definitions its top level may hold. */
export interface LoadedModule {
  name: string;
  path: string;
  functions: AST.Def[];
  vars: (AST.Let | AST.Var)[];
  modules: AST.Module[];
  dependencies: (AST.Include | AST.Import)[];
}

/**
 * Finds, reads and parses `.marq` modules. Parsed modules are cached by
 * name; which modules have already been included is tracked separately so
 * that `include` runs a module's definitions at most once.
 */
export class ModuleLoader {
  private cache: Map<string, LoadedModule> = new Map();
  private included: Set<string> = new Set();
  private nextModuleId = 1;

  constructor(public searchPaths: string[] = DEFAULT_SEARCH_PATHS) {}

  isIncluded(name: string): boolean {
    return this.included.has(name);
  }

  markIncluded(name: string): void {
    this.included.add(name);
  }

  /** Resolve a module name to a file over the search paths, in order. */
  resolve(name: string, token?: Token): string {
    const file = name.endsWith(MODULE_EXTENSION) ? name : name + MODULE_EXTENSION;
    if (path.isAbsolute(file)) {
      if (fs.existsSync(file)) return file;
    } else {
      for (const dir of this.searchPaths) {
        const candidate = path.join(expandSearchPath(dir), file);
        if (fs.existsSync(candidate)) return candidate;
      }
    }
    throw new MarqError(
      'ModuleLoadError',
      `Module "${name}" not found in search paths: ${this.searchPaths.join(', ')}`,
      token,
    );
  }

  load(name: string, token?: Token): LoadedModule {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const resolved = this.resolve(name, token);
    let source: string;
    try {
      source = fs.readFileSync(resolved, 'utf-8');
    } catch (e) {
      throw new MarqError('ModuleLoadError', `Cannot read module "${name}" at ${resolved}: ${errorMessage(e)}`, token);
    }

    const module = this.loadSource(moduleName(name), source, resolved, token);
    this.cache.set(name, module);
    return module;
  }

  /** Parse module source. Anything other than definitions at its top level makes it invalid. */
  loadSource(name: string, source: string, filePath: string, token?: Token): LoadedModule {
    let program: AST.Program;
    try {
      program = new MacroExpander().expand(parseSource(source, this.nextModuleId++));
    } catch (e) {
      throw new MarqError('ModuleLoadError', `Syntax error in module "${name}": ${errorMessage(e)}`, token);
    }

    const module: LoadedModule = { name, path: filePath, functions: [], vars: [], modules: [], dependencies: [] };
    for (const node of program) {
      switch (node.type) {
        case 'Def':
          module.functions.push(node);
          break;
        case 'Let':
        case 'Var':
          module.vars.push(node);
          break;
        case 'Module':
          module.modules.push(node);
          break;
        case 'Include':
        case 'Import':
          module.dependencies.push(node);
          break;
        default:
          throw new MarqError(
            'ModuleLoadError',
            `Invalid module "${name}": unexpected ${node.type} at line ${node.token.line}`,
            token,
          );
      }
    }
    return module;
  }
}

/** Expand `$HOME` and `$ORIGIN` (the working directory) in a search path. */
export function expandSearchPath(dir: string): string {
  return dir
    .replace(/\$HOME/g, os.homedir())
    .replace(/\$ORIGIN/g, process.cwd());
}

/** The name a module is bound under: its file name without directory or extension. */
export function moduleName(name: string): string {
  return path.basename(name, MODULE_EXTENSION);
}
