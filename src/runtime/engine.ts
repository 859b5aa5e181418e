import * as fs from 'fs';
import * as path from 'path';
import * as AST from '../parser/ast';
import { parseSource } from '../parser/parser';
import { parseMarkdown } from '../markdown/parse';
import { Compiler } from './compiler';
import { Debugger, DebuggerHandler } from './debugger';
import { MarqError, isControlSignal, isStackOverflow } from './errors';
import { Evaluator, EvaluatorOptions } from './evaluator';
import { MacroExpander } from './macro-expander';
import { RuntimeValue, markdownValue, noneValue, stringValue } from './values';

export const BUILTIN_MODULE_NAME = 'builtin';

export interface EngineOptions extends EvaluatorOptions {
  /** Run programs through the closure compiler (default) or the tree-walking evaluator. */
  useCompiler?: boolean;
}

/**
 * Entry point for running queries. One engine holds one root environment;
 * definitions from earlier evaluations stay visible to later ones.
 */
export class Engine {
  private evaluator: Evaluator;
  private compiler: Compiler;
  private compilerEnabled: boolean;

  constructor(options: EngineOptions = {}) {
    this.evaluator = new Evaluator(options);
    this.compiler = new Compiler(this.evaluator);
    this.compilerEnabled = options.useCompiler ?? true;
  }

  useCompiler(enabled: boolean): void {
    this.compilerEnabled = enabled;
  }

  setMaxCallStackDepth(depth: number): void {
    this.evaluator.callStack.maxDepth = depth;
  }

  setSearchPaths(paths: string[]): void {
    this.evaluator.moduleLoader.searchPaths = paths;
  }

  setTrace(enabled: boolean): void {
    this.evaluator.traceEnabled = enabled;
  }

  /** Bind a string variable in the root environment. */
  defineStringValue(name: string, value: string): void {
    this.evaluator.globalEnv.define(name, stringValue(value));
  }

  /** Attach a debugger; the returned instance manages breakpoints. */
  setDebuggerHandler(handler: DebuggerHandler): Debugger {
    const dbg = new Debugger(handler);
    this.evaluator.debugger = dbg;
    return dbg;
  }

  /** Load the prelude shipped in lib/builtin.marq. */
  loadBuiltinModule(): void {
    const file = findBuiltinModule();
    const source = fs.readFileSync(file, 'utf-8');
    this.guard(() => this.evaluator.includeSource(BUILTIN_MODULE_NAME, source, file));
  }

  /** Include a module from the search paths into the root environment. */
  loadModule(name: string): void {
    this.guard(() => this.evaluator.include(name, this.evaluator.globalEnv));
  }

  eval(code: string, inputs: RuntimeValue[]): RuntimeValue[] {
    if (code.trim() === '') return [];
    return this.evaluate(parseSource(code), inputs);
  }

  evaluate(program: AST.Program, inputs: RuntimeValue[]): RuntimeValue[] {
    return this.guard(() => {
      const expanded = new MacroExpander().expand(program);
      this.evaluator.trace(`evaluate ${expanded.length} statement(s) over ${inputs.length} input(s)`);
      if (!this.compilerEnabled) {
        return this.evaluator.run(expanded, inputs);
      }
      const body = this.evaluator.prepare(expanded);
      return this.evaluator.execute(this.compiler.runner(body), inputs);
    });
  }

  /** Surface escaped control signals and host stack exhaustion as language errors. */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (isControlSignal(e)) {
        throw new MarqError('InternalError', 'break or continue used outside of a loop');
      }
      if (isStackOverflow(e)) {
        throw new MarqError('RecursionError', 'Maximum call stack size exceeded');
      }
      throw e;
    }
  }
}

/** The prelude lives in lib/ at the package root, both beside the sources and beside the build output. */
function findBuiltinModule(): string {
  const candidates = [
    path.join(__dirname, '..', '..', 'lib', 'builtin.marq'),
    path.join(__dirname, '..', '..', '..', 'lib', 'builtin.marq'),
  ];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (found === undefined) {
    throw new MarqError('ModuleLoadError', `Builtin module not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

// ─── Inputs ──────────────────────────────────────────────

/** One markdown value per top-level block of the document. */
export function markdownInputs(text: string): RuntimeValue[] {
  return parseMarkdown(text).map(node => markdownValue(node));
}

/** One string per line. A trailing newline does not add an empty line. */
export function textInputs(text: string): RuntimeValue[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map(stringValue);
}

/** A single None input, for queries that do not read any input. */
export function nullInput(): RuntimeValue[] {
  return [noneValue()];
}
