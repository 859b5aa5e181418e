import * as AST from '../parser/ast';
import { Token } from '../lexer/tokens';
import { EMPTY, MdNode, mapValues, text, toFragment } from '../markdown/node';
import { callNative, isNativeFunction } from './builtins';
import { CallStack, DEFAULT_MAX_CALL_STACK_DEPTH } from './call-stack';
import { Debugger } from './debugger';
import { EnvError, Environment } from './environment';
import { BreakSignal, ContinueSignal, MarqError, isControlSignal, isStackOverflow } from './errors';
import { LoadedModule, ModuleLoader, moduleName } from './module-loader';
import { applySelector } from './selector';
import {
  FunctionValue,
  RuntimeValue,
  arrayValue,
  boolValue,
  functionValue,
  isTruthy,
  literalToValue,
  markdownValue,
  moduleValue,
  nativeFunctionValue,
  noneValue,
  selectedNode,
  stringValue,
  valueText,
  valueToString,
  valuesEqual,
} from './values';

export interface EvaluatorOptions {
  maxCallStackDepth?: number;
  searchPaths?: string[];
  trace?: boolean;
  /** Sink for `debug()` output and trace lines. Defaults to stderr. */
  log?: (message: string) => void;
  /** Variables read by `$NAME`. Defaults to the process environment. */
  envVars?: Record<string, string | undefined>;
}

/** Runs a function body in its call environment. Each strategy supplies its own. */
export type BodyRunner = (body: AST.Program, input: RuntimeValue, env: Environment) => RuntimeValue;

/**
 * One pass over the inputs: `perInput` maps each input, then `once`, when
 * present, runs on the array of all per-input results.
 */
export interface PipelineRunner {
  perInput: (input: RuntimeValue) => RuntimeValue;
  once: ((input: RuntimeValue) => RuntimeValue) | null;
}

/**
 * Tree-walking evaluator. Also owns the runtime state both strategies share:
 * the root environment, call stack, module loader and debugger.
 */
export class Evaluator {
  readonly globalEnv: Environment = new Environment();
  readonly callStack: CallStack;
  readonly moduleLoader: ModuleLoader;
  debugger: Debugger | null = null;
  traceEnabled: boolean;
  private log: (message: string) => void;
  private envVars: Record<string, string | undefined>;
  private importStack: Set<string> = new Set();
  private runBody: BodyRunner = (body, input, env) => this.evalProgram(body, input, env);

  constructor(options: EvaluatorOptions = {}) {
    this.callStack = new CallStack(options.maxCallStackDepth ?? DEFAULT_MAX_CALL_STACK_DEPTH);
    this.moduleLoader = new ModuleLoader(options.searchPaths);
    this.traceEnabled = options.trace ?? false;
    this.log = options.log ?? (message => console.error(message));
    this.envVars = options.envVars ?? process.env;
  }

  /** Evaluate a macro-expanded program over the inputs. */
  run(program: AST.Program, inputs: RuntimeValue[]): RuntimeValue[] {
    const body = this.prepare(program);
    const nodesIndex = body.findIndex(node => node.type === 'Nodes');
    const head = nodesIndex === -1 ? body : body.slice(0, nodesIndex);
    const tail = nodesIndex === -1 ? null : body.slice(nodesIndex + 1);

    return this.execute({
      perInput: input => this.evalProgram(head, input, this.globalEnv),
      once: tail === null ? null : input => this.evalProgram(tail, input, this.globalEnv),
    }, inputs);
  }

  /**
   * Register top-level definitions and run top-level includes ahead of any
   * input, returning the statements left to run per input.
   */
  prepare(program: AST.Program): AST.Program {
    const body: AST.Program = [];
    for (const node of program) {
      if (node.type === 'Def') {
        this.globalEnv.define(node.name, functionValue(node.params, node.body, this.globalEnv));
      } else if (node.type === 'Include') {
        this.include(node.path, this.globalEnv, node.token);
      } else {
        body.push(node);
      }
    }
    return body;
  }

  execute(runner: PipelineRunner, inputs: RuntimeValue[]): RuntimeValue[] {
    const results = inputs.map(input => this.mapInput(input, runner.perInput));
    if (runner.once === null) return results;

    const result = runner.once(arrayValue(results));
    return result.kind === 'array' ? result.elements : [result];
  }

  /** Markdown inputs are mapped node by node; any other input is passed straight through. */
  private mapInput(input: RuntimeValue, f: (input: RuntimeValue) => RuntimeValue): RuntimeValue {
    if (input.kind !== 'markdown') {
      return f(input);
    }
    return markdownValue(mapValues(input.node, node => resultToNode(f(markdownValue(node)), node)));
  }

  // ─── Nodes ─────────────────────────────────────────────

  evalProgram(program: AST.Program, input: RuntimeValue, env: Environment): RuntimeValue {
    let value = input;
    for (const node of program) {
      value = this.evalNode(node, value, env);
    }
    return value;
  }

  evalNode(node: AST.Node, input: RuntimeValue, env: Environment): RuntimeValue {
    this.debugger?.onNode(node.token, input, env, this.callStack.depth);

    switch (node.type) {
      case 'Literal':
        return literalToValue(node.value);
      case 'Identifier':
        return this.resolveIdentifier(node.name, env, node.token);
      case 'Self':
      case 'Nodes':
        return input;
      case 'Selector':
        return applySelector(input, node);
      case 'Call':
        return this.callByName(
          node.name,
          () => node.args.map(arg => this.evalNode(arg, input, env)),
          input,
          env,
          node.token,
          this.runBody,
        );
      case 'CallDynamic': {
        const callee = this.evalNode(node.callee, input, env);
        return this.callValue(
          callee,
          'anonymous',
          () => node.args.map(arg => this.evalNode(arg, input, env)),
          input,
          env,
          node.token,
          this.runBody,
        );
      }
      case 'Let':
        env.define(node.name, this.evalNode(node.value, input, env));
        return input;
      case 'Var':
        env.defineMutable(node.name, this.evalNode(node.value, input, env));
        return input;
      case 'Assign':
        this.assign(node.name, this.evalNode(node.value, input, env), env, node.token);
        return input;
      case 'If':
        return this.evalIf(node, input, env);
      case 'While': {
        const loopEnv = env.child();
        return this.loopWhile(
          value => this.evalNode(node.condition, value, loopEnv),
          input,
          value => this.evalProgram(node.body, value, loopEnv),
        );
      }
      case 'Until': {
        const loopEnv = env.child();
        return this.loopUntil(
          value => this.evalNode(node.condition, value, loopEnv),
          input,
          value => this.evalProgram(node.body, value, loopEnv),
        );
      }
      case 'Foreach':
        return this.loopForeach(
          node,
          this.evalNode(node.iterable, input, env),
          env,
          (item, loopEnv) => this.evalProgram(node.body, item, loopEnv),
        );
      case 'Block':
        return this.evalProgram(node.body, input, env.child());
      case 'Def': {
        const fn = functionValue(node.params, node.body, env);
        env.define(node.name, fn);
        return fn;
      }
      case 'Fn':
        return functionValue(node.params, node.body, env);
      case 'Match':
        return this.evalMatch(node, input, env);
      case 'InterpolatedString':
        return this.interpolate(
          node.segments,
          expr => valueText(this.evalNode(expr, input, env)),
          input,
          node.token,
        );
      case 'MacroDef':
        throw new MarqError('InternalError', `Macro "${node.name}" was not expanded`, node.token);
      case 'Try':
        try {
          return this.evalNode(node.body, input, env);
        } catch (e) {
          if (!isRecoverable(e)) throw e;
          return this.evalNode(node.catchBody, input, env);
        }
      case 'Module':
        this.defineInlineModule(node, env);
        return input;
      case 'Include':
        this.include(node.path, env, node.token);
        return input;
      case 'Import':
        this.importModule(node.path, env, node.token);
        return input;
      case 'QualifiedAccess':
        return this.evalQualifiedAccess(node, input, env);
      case 'Break':
        throw new BreakSignal();
      case 'Continue':
        throw new ContinueSignal();
      case 'And': {
        const left = this.evalNode(node.left, input, env);
        if (!isTruthy(left)) return boolValue(false);
        const right = this.evalNode(node.right, input, env);
        return isTruthy(right) ? right : boolValue(false);
      }
      case 'Or': {
        const left = this.evalNode(node.left, input, env);
        return isTruthy(left) ? left : this.evalNode(node.right, input, env);
      }
      case 'Paren':
        return this.evalNode(node.expr, input, env);
    }
  }

  private evalIf(node: AST.If, input: RuntimeValue, env: Environment): RuntimeValue {
    for (const branch of node.branches) {
      if (branch.condition === null || isTruthy(this.evalNode(branch.condition, input, env))) {
        return this.evalNode(branch.body, input, env);
      }
    }
    return noneValue();
  }

  // ─── Loops ─────────────────────────────────────────────
  // Shared by both strategies: the caller supplies the condition and body.

  /**
   * Collects the value of every completed pass. Nothing runs when the
   * condition is initially falsy, and breaking out of the first pass yields None.
   */
  loopWhile(
    test: (value: RuntimeValue) => RuntimeValue,
    input: RuntimeValue,
    body: (value: RuntimeValue) => RuntimeValue,
  ): RuntimeValue {
    let current = input;
    if (!isTruthy(test(current))) return noneValue();

    const results: RuntimeValue[] = [];
    let first = true;
    do {
      try {
        current = body(current);
        results.push(current);
      } catch (e) {
        if (e instanceof BreakSignal) return first ? noneValue() : arrayValue(results);
        if (!(e instanceof ContinueSignal)) throw e;
        if (first) current = noneValue();
      }
      first = false;
    } while (isTruthy(test(current)));

    return arrayValue(results);
  }

  /** Runs while the condition is falsy and yields the last value. */
  loopUntil(
    test: (value: RuntimeValue) => RuntimeValue,
    input: RuntimeValue,
    body: (value: RuntimeValue) => RuntimeValue,
  ): RuntimeValue {
    let current = input;
    if (isTruthy(test(current))) return noneValue();

    do {
      try {
        current = body(current);
      } catch (e) {
        if (e instanceof BreakSignal) return current;
        if (!(e instanceof ContinueSignal)) throw e;
      }
    } while (!isTruthy(test(current)));

    return current;
  }

  /** Iterates arrays by element and strings by character, collecting each body result. */
  loopForeach(
    node: AST.Foreach,
    iterable: RuntimeValue,
    env: Environment,
    body: (item: RuntimeValue, loopEnv: Environment) => RuntimeValue,
  ): RuntimeValue {
    let items: RuntimeValue[];
    if (iterable.kind === 'array') {
      items = iterable.elements;
    } else if (iterable.kind === 'string') {
      items = [...iterable.value].map(stringValue);
    } else {
      throw new MarqError('InvalidTypes', `Cannot iterate over ${iterable.kind} in foreach`, node.token);
    }

    const loopEnv = env.child();
    const results: RuntimeValue[] = [];
    for (const item of items) {
      loopEnv.define(node.name, item);
      try {
        results.push(body(item, loopEnv));
      } catch (e) {
        if (e instanceof BreakSignal) break;
        if (e instanceof ContinueSignal) continue;
        throw e;
      }
    }
    return arrayValue(results);
  }

  // ─── Names & calls ─────────────────────────────────────

  /** A bound value, or a native function value when the name is a native. */
  resolveIdentifier(name: string, env: Environment, token: Token): RuntimeValue {
    const value = env.lookup(name);
    if (value !== undefined) return value;
    if (isNativeFunction(name)) return nativeFunctionValue(name);
    throw new MarqError('NotDefined', `"${name}" is not defined`, token);
  }

  assign(name: string, value: RuntimeValue, env: Environment, token: Token): void {
    try {
      env.assign(name, value);
    } catch (e) {
      if (!(e instanceof EnvError)) throw e;
      throw new MarqError(e.kind === 'NotFound' ? 'NotDefined' : 'AssignToImmutable', e.message, token);
    }
  }

  /** User functions bound under the name come first, then natives. */
  callByName(
    name: string,
    evalArgs: () => RuntimeValue[],
    input: RuntimeValue,
    env: Environment,
    token: Token,
    runBody: BodyRunner,
  ): RuntimeValue {
    const bound = env.lookup(name);
    if (bound !== undefined) {
      return this.callValue(bound, name, evalArgs, input, env, token, runBody);
    }
    if (!isNativeFunction(name)) {
      throw new MarqError('InvalidDefinition', `"${name}" is not defined`, token);
    }
    return this.callNative(name, evalArgs(), input, env, token);
  }

  callValue(
    callee: RuntimeValue,
    name: string,
    evalArgs: () => RuntimeValue[],
    input: RuntimeValue,
    env: Environment,
    token: Token,
    runBody: BodyRunner,
  ): RuntimeValue {
    switch (callee.kind) {
      case 'function':
        return this.callFunction(callee, name, evalArgs, input, token, runBody);
      case 'native':
        return this.callNative(callee.name, evalArgs(), input, env, token);
      default:
        throw new MarqError('InvalidDefinition', `"${name}" is not a function (got ${callee.kind})`, token);
    }
  }

  /**
   * Call a user function. Arguments bind positionally; with one parameter
   * more than arguments, the pipeline value binds to the first parameter.
   */
  callFunction(
    fn: FunctionValue,
    name: string,
    evalArgs: () => RuntimeValue[],
    input: RuntimeValue,
    token: Token,
    runBody: BodyRunner,
  ): RuntimeValue {
    this.callStack.push(name, token);
    try {
      const scope = fn.env.child();
      const args = evalArgs();
      let values: RuntimeValue[];
      if (fn.params.length === args.length) {
        values = args;
      } else if (fn.params.length === args.length + 1) {
        values = [input, ...args];
      } else {
        throw new MarqError(
          'InvalidNumberOfArguments',
          `"${name}" expects ${fn.params.length} argument(s) but got ${args.length}`,
          token,
        );
      }
      fn.params.forEach((param, i) => scope.define(param, values[i]));

      if (this.traceEnabled) {
        this.trace(`call ${name}(${values.map(valueToString).join(', ')})`);
      }
      return runBody(fn.body, input, scope);
    } finally {
      this.callStack.pop();
    }
  }

  callNative(name: string, args: RuntimeValue[], input: RuntimeValue, env: Environment, token: Token): RuntimeValue {
    return callNative(name, args, {
      input,
      env,
      token,
      log: this.log,
      breakpoint: () => this.debugger?.onBreakpoint(token, input, env, this.callStack.depth),
    });
  }

  interpolate(
    segments: AST.StringSegment[],
    evalExpr: (expr: AST.Node) => string,
    input: RuntimeValue,
    token: Token,
  ): RuntimeValue {
    let out = '';
    for (const segment of segments) {
      switch (segment.kind) {
        case 'text':
          out += segment.value;
          break;
        case 'expr':
          out += evalExpr(segment.expr);
          break;
        case 'env': {
          const value = this.envVars[segment.name];
          if (value === undefined) {
            throw new MarqError('EnvNotFound', `Environment variable "${segment.name}" is not set`, token);
          }
          out += value;
          break;
        }
        case 'self':
          out += valueText(input);
          break;
      }
    }
    return stringValue(out);
  }

  // ─── Pattern matching ──────────────────────────────────

  private evalMatch(node: AST.Match, input: RuntimeValue, env: Environment): RuntimeValue {
    const value = this.evalNode(node.value, input, env);
    for (const arm of node.arms) {
      const bindings = new Map<string, RuntimeValue>();
      if (!matchPattern(arm.pattern, value, bindings)) continue;

      const armEnv = env.child();
      for (const [name, bound] of bindings) {
        armEnv.define(name, bound);
      }
      if (arm.guard !== null && !isTruthy(this.evalNode(arm.guard, input, armEnv))) continue;
      return this.evalNode(arm.body, input, armEnv);
    }
    return noneValue();
  }

  // ─── Modules ───────────────────────────────────────────

  private evalQualifiedAccess(node: AST.QualifiedAccess, input: RuntimeValue, env: Environment): RuntimeValue {
    const module = env.lookup(node.module);
    if (module === undefined) {
      throw new MarqError('NotDefined', `Module "${node.module}" is not defined`, node.token);
    }
    if (module.kind !== 'module') {
      throw new MarqError('InvalidDefinition', `"${node.module}" is not a module`, node.token);
    }

    const target = node.target;
    if (target.kind === 'ident') {
      const value = module.env.lookup(target.name);
      if (value === undefined) {
        throw new MarqError('NotDefined', `"${node.module}::${target.name}" is not defined`, node.token);
      }
      return value;
    }
    return this.callByName(
      target.name,
      () => target.args.map(arg => this.evalNode(arg, input, env)),
      input,
      module.env,
      node.token,
      this.runBody,
    );
  }

  /** Define a module's members into the environment. Modules already included are skipped. */
  include(name: string, env: Environment, token?: Token): void {
    if (this.moduleLoader.isIncluded(name)) return;
    const module = this.moduleLoader.load(name, token);
    this.moduleLoader.markIncluded(name);
    this.trace(`include ${module.name} from ${module.path}`);
    this.defineModule(module, env);
  }

  /** Include module source that does not come from a file, such as the prelude. */
  includeSource(name: string, source: string, filePath: string): void {
    if (this.moduleLoader.isIncluded(name)) return;
    const module = this.moduleLoader.loadSource(name, source, filePath);
    this.moduleLoader.markIncluded(name);
    this.defineModule(module, this.globalEnv);
  }

  /** Bind a module value named after the module; its members are reached with `name::member`. */
  importModule(name: string, env: Environment, token?: Token): void {
    if (this.importStack.has(name)) {
      const cycle = [...this.importStack, name].join(' -> ');
      throw new MarqError('ModuleLoadError', `Circular import detected: ${cycle}`, token);
    }
    this.importStack.add(name);
    try {
      const module = this.moduleLoader.load(name, token);
      this.trace(`import ${module.name} from ${module.path}`);
      const moduleEnv = env.child();
      this.defineModule(module, moduleEnv);
      env.define(moduleName(name), moduleValue(module.name, moduleEnv));
    } finally {
      this.importStack.delete(name);
    }
  }

  private defineModule(module: LoadedModule, env: Environment): void {
    for (const dependency of module.dependencies) {
      if (dependency.type === 'Include') {
        this.include(dependency.path, env, dependency.token);
      } else {
        this.importModule(dependency.path, env, dependency.token);
      }
    }
    for (const def of module.functions) {
      env.define(def.name, functionValue(def.params, def.body, env));
    }
    for (const inline of module.modules) {
      this.defineInlineModule(inline, env);
    }
    for (const binding of module.vars) {
      const value = this.evalNode(binding.value, noneValue(), env);
      if (binding.type === 'Var') {
        env.defineMutable(binding.name, value);
      } else {
        env.define(binding.name, value);
      }
    }
  }

  private defineInlineModule(node: AST.Module, env: Environment): void {
    const moduleEnv = env.child();
    this.evalProgram(node.body, noneValue(), moduleEnv);
    env.define(node.name, moduleValue(node.name, moduleEnv));
  }

  trace(message: string): void {
    if (this.traceEnabled) {
      this.log(`[trace] ${message}`);
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────

/** How a per-node result replaces the node it was computed from. */
function resultToNode(result: RuntimeValue, node: MdNode): MdNode {
  switch (result.kind) {
    case 'none':
      return toFragment(node);
    case 'function':
    case 'native':
    case 'module':
      return EMPTY;
    case 'symbol':
      return text(result.name);
    case 'markdown':
      return selectedNode(result) ?? EMPTY;
    default:
      return text(valueToString(result));
  }
}

/** Errors a `try` may recover from: everything but control signals, a debugger abort and host stack exhaustion. */
export function isRecoverable(e: unknown): boolean {
  if (isControlSignal(e) || isStackOverflow(e)) return false;
  return !(e instanceof MarqError && e.errorType === 'Aborted');
}

export function matchPattern(pattern: AST.Pattern, value: RuntimeValue, bindings: Map<string, RuntimeValue>): boolean {
  switch (pattern.kind) {
    case 'wildcard':
      return true;
    case 'literal':
      return valuesEqual(literalToValue(pattern.value), value);
    case 'binding':
      bindings.set(pattern.name, value);
      return true;
    case 'array': {
      if (value.kind !== 'array') return false;
      const elements = value.elements;
      if (pattern.rest === null ? elements.length !== pattern.elements.length : elements.length < pattern.elements.length) {
        return false;
      }
      if (!pattern.elements.every((p, i) => matchPattern(p, elements[i], bindings))) return false;
      if (pattern.rest !== null) {
        bindings.set(pattern.rest, arrayValue(elements.slice(pattern.elements.length)));
      }
      return true;
    }
    case 'dict': {
      if (value.kind !== 'dict') return false;
      const entries = value.entries;
      return pattern.entries.every(entry => {
        const field = entries.get(entry.key);
        return field !== undefined && matchPattern(entry.pattern, field, bindings);
      });
    }
  }
}
