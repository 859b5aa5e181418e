import * as AST from '../parser/ast';
import { applySelector } from './selector';
import { CallStack } from './call-stack';
import { Environment } from './environment';
import { BreakSignal, ContinueSignal, MarqError } from './errors';
import { BodyRunner, Evaluator, PipelineRunner, isRecoverable } from './evaluator';
import {
  RuntimeValue,
  boolValue,
  functionValue,
  isTruthy,
  literalToValue,
  noneValue,
  valueText,
} from './values';

/** One evaluation step, built once and run against many inputs. */
export type CompiledStep = (input: RuntimeValue, stack: CallStack, env: Environment) => RuntimeValue;

export interface CompiledProgram {
  /** Position of the top-level `nodes` marker, or null when there is none. */
  nodesIndex: number | null;
  steps: CompiledStep[];
}

/** Node kinds that are handed to the tree-walking evaluator at run time. */
const EVALUATOR_NODES = new Set<AST.Node['type']>(['Match', 'QualifiedAccess', 'Module', 'Include', 'Import']);

function runSteps(steps: CompiledStep[], input: RuntimeValue, stack: CallStack, env: Environment): RuntimeValue {
  let value = input;
  for (const step of steps) {
    value = step(value, stack, env);
  }
  return value;
}

/**
 * Lowers a macro-expanded program into closures. Runtime services (calls,
 * loops, modules, the debugger) come from the evaluator so both strategies
 * behave the same.
 */
export class Compiler {
  constructor(private evaluator: Evaluator) {}

  compile(program: AST.Program): CompiledProgram {
    const steps = program.map(node => this.compileNode(node));
    const nodesIndex = program.findIndex(node => node.type === 'Nodes');
    return { nodesIndex: nodesIndex === -1 ? null : nodesIndex, steps };
  }

  /** Compile a prepared program into a runner over the shared call stack and root environment. */
  runner(program: AST.Program): PipelineRunner {
    const { nodesIndex, steps } = this.compile(program);
    const { callStack, globalEnv } = this.evaluator;
    const head = nodesIndex === null ? steps : steps.slice(0, nodesIndex);
    const tail = nodesIndex === null ? null : steps.slice(nodesIndex + 1);
    return {
      perInput: input => runSteps(head, input, callStack, globalEnv),
      once: tail === null ? null : input => runSteps(tail, input, callStack, globalEnv),
    };
  }

  private compileProgram(program: AST.Program): CompiledStep {
    const steps = program.map(node => this.compileNode(node));
    return (input, stack, env) => runSteps(steps, input, stack, env);
  }

  private compileNode(node: AST.Node): CompiledStep {
    const step = this.compileKind(node);
    const dbg = this.evaluator.debugger;
    if (dbg === null || EVALUATOR_NODES.has(node.type)) return step;
    return (input, stack, env) => {
      dbg.onNode(node.token, input, env, stack.depth);
      return step(input, stack, env);
    };
  }

  /** Function bodies are compiled afresh on every call. */
  private runBody: BodyRunner = (body, input, env) =>
    runSteps(body.map(node => this.compileNode(node)), input, this.evaluator.callStack, env);

  private compileKind(node: AST.Node): CompiledStep {
    const evaluator = this.evaluator;

    switch (node.type) {
      case 'Literal': {
        const value = literalToValue(node.value);
        return () => value;
      }
      case 'Identifier': {
        const { name, token } = node;
        return (_input, _stack, env) => evaluator.resolveIdentifier(name, env, token);
      }
      case 'Self':
      case 'Nodes':
        return input => input;
      case 'Selector':
        return input => applySelector(input, node);
      case 'Call': {
        const args = node.args.map(arg => this.compileNode(arg));
        return (input, stack, env) => evaluator.callByName(
          node.name,
          () => args.map(arg => arg(input, stack, env)),
          input,
          env,
          node.token,
          this.runBody,
        );
      }
      case 'CallDynamic': {
        const callee = this.compileNode(node.callee);
        const args = node.args.map(arg => this.compileNode(arg));
        return (input, stack, env) => evaluator.callValue(
          callee(input, stack, env),
          'anonymous',
          () => args.map(arg => arg(input, stack, env)),
          input,
          env,
          node.token,
          this.runBody,
        );
      }
      case 'Let': {
        const value = this.compileNode(node.value);
        return (input, stack, env) => {
          env.define(node.name, value(input, stack, env));
          return input;
        };
      }
      case 'Var': {
        const value = this.compileNode(node.value);
        return (input, stack, env) => {
          env.defineMutable(node.name, value(input, stack, env));
          return input;
        };
      }
      case 'Assign': {
        const value = this.compileNode(node.value);
        return (input, stack, env) => {
          evaluator.assign(node.name, value(input, stack, env), env, node.token);
          return input;
        };
      }
      case 'If': {
        const branches = node.branches.map(branch => ({
          condition: branch.condition === null ? null : this.compileNode(branch.condition),
          body: this.compileNode(branch.body),
        }));
        return (input, stack, env) => {
          for (const branch of branches) {
            if (branch.condition === null || isTruthy(branch.condition(input, stack, env))) {
              return branch.body(input, stack, env);
            }
          }
          return noneValue();
        };
      }
      case 'While':
      case 'Until': {
        const condition = this.compileNode(node.condition);
        const body = this.compileProgram(node.body);
        const isWhile = node.type === 'While';
        return (input, stack, env) => {
          const loopEnv = env.child();
          const test = (value: RuntimeValue) => condition(value, stack, loopEnv);
          const run = (value: RuntimeValue) => body(value, stack, loopEnv);
          return isWhile ? evaluator.loopWhile(test, input, run) : evaluator.loopUntil(test, input, run);
        };
      }
      case 'Foreach': {
        const iterable = this.compileNode(node.iterable);
        const body = this.compileProgram(node.body);
        return (input, stack, env) => evaluator.loopForeach(
          node,
          iterable(input, stack, env),
          env,
          (item, loopEnv) => body(item, stack, loopEnv),
        );
      }
      case 'Block': {
        const body = this.compileProgram(node.body);
        return (input, stack, env) => body(input, stack, env.child());
      }
      case 'Def':
        return (_input, _stack, env) => {
          const fn = functionValue(node.params, node.body, env);
          env.define(node.name, fn);
          return fn;
        };
      case 'Fn':
        return (_input, _stack, env) => functionValue(node.params, node.body, env);
      case 'InterpolatedString': {
        const exprs = new Map<AST.Node, CompiledStep>();
        for (const segment of node.segments) {
          if (segment.kind === 'expr') exprs.set(segment.expr, this.compileNode(segment.expr));
        }
        return (input, stack, env) => evaluator.interpolate(
          node.segments,
          expr => {
            const step = exprs.get(expr);
            return valueText(step === undefined ? evaluator.evalNode(expr, input, env) : step(input, stack, env));
          },
          input,
          node.token,
        );
      }
      case 'Try': {
        const body = this.compileNode(node.body);
        const catchBody = this.compileNode(node.catchBody);
        return (input, stack, env) => {
          try {
            return body(input, stack, env);
          } catch (e) {
            if (!isRecoverable(e)) throw e;
            return catchBody(input, stack, env);
          }
        };
      }
      case 'Match':
      case 'QualifiedAccess':
        return (input, _stack, env) => evaluator.evalNode(node, input, env);
      case 'Module':
      case 'Include':
      case 'Import':
        return (input, _stack, env) => {
          evaluator.evalNode(node, noneValue(), env);
          return input;
        };
      case 'Break':
        return () => {
          throw new BreakSignal();
        };
      case 'Continue':
        return () => {
          throw new ContinueSignal();
        };
      case 'And': {
        const left = this.compileNode(node.left);
        const right = this.compileNode(node.right);
        return (input, stack, env) => {
          if (!isTruthy(left(input, stack, env))) return boolValue(false);
          const value = right(input, stack, env);
          return isTruthy(value) ? value : boolValue(false);
        };
      }
      case 'Or': {
        const left = this.compileNode(node.left);
        const right = this.compileNode(node.right);
        return (input, stack, env) => {
          const value = left(input, stack, env);
          return isTruthy(value) ? value : right(input, stack, env);
        };
      }
      case 'Paren':
        return this.compileNode(node.expr);
      case 'MacroDef':
        throw new MarqError('InternalError', `Macro "${node.name}" was not expanded`, node.token);
    }
  }
}
