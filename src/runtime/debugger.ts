import { Token, TOP_LEVEL_MODULE_ID } from '../lexer/tokens';
import { Environment } from './environment';
import { MarqError } from './errors';
import { RuntimeValue } from './values';

export type DebuggerAction =
  | { type: 'Continue' }
  | { type: 'StepOver' }
  | { type: 'Next' }
  | { type: 'FunctionExit' }
  | { type: 'Quit' }
  | { type: 'SetBreakpoint'; line: number }
  | { type: 'ClearBreakpoint'; line: number };

export interface DebugContext {
  token: Token;
  input: RuntimeValue;
  env: Environment;
  callStackDepth: number;
  reason: 'breakpoint' | 'step';
}

export type DebuggerHandler = (context: DebugContext) => DebuggerAction;

/**
 * Stepping modes:
 *   run     pause only at breakpoints
 *   next    pause at the next node, at any depth
 *   over    pause at the next node at the same or a shallower depth
 *   finish  pause at the next node shallower than the current function
 */
type Mode = 'run' | 'next' | 'over' | 'finish';

export class Debugger {
  private breakpoints = new Set<number>();
  private mode: Mode = 'run';
  private depth = 0;
  private lastLine = -1;

  constructor(private handler: DebuggerHandler) {}

  setBreakpoint(line: number): void {
    this.breakpoints.add(line);
  }

  clearBreakpoint(line: number): void {
    this.breakpoints.delete(line);
  }

  getBreakpoints(): number[] {
    return [...this.breakpoints].sort((a, b) => a - b);
  }

  /** Called before each node is evaluated. */
  onNode(token: Token, input: RuntimeValue, env: Environment, callStackDepth: number): void {
    const lineChanged = token.line !== this.lastLine;
    this.lastLine = token.line;

    if (this.shouldStep(callStackDepth)) {
      this.pause({ token, input, env, callStackDepth, reason: 'step' });
    } else if (
      lineChanged
      && token.moduleId === TOP_LEVEL_MODULE_ID
      && this.breakpoints.has(token.line)
    ) {
      this.pause({ token, input, env, callStackDepth, reason: 'breakpoint' });
    }
  }

  /** Called by the `breakpoint()` builtin. */
  onBreakpoint(token: Token, input: RuntimeValue, env: Environment, callStackDepth: number): void {
    this.pause({ token, input, env, callStackDepth, reason: 'breakpoint' });
  }

  private shouldStep(depth: number): boolean {
    switch (this.mode) {
      case 'run': return false;
      case 'next': return true;
      case 'over': return depth <= this.depth;
      case 'finish': return depth < this.depth;
    }
  }

  private pause(context: DebugContext): void {
    for (;;) {
      const action = this.handler(context);
      switch (action.type) {
        case 'Continue':
          this.mode = 'run';
          return;
        case 'Next':
          this.mode = 'next';
          return;
        case 'StepOver':
          this.mode = 'over';
          this.depth = context.callStackDepth;
          return;
        case 'FunctionExit':
          this.mode = 'finish';
          this.depth = context.callStackDepth;
          return;
        case 'Quit':
          throw new MarqError('Aborted', 'Evaluation aborted by debugger', context.token);
        case 'SetBreakpoint':
          this.setBreakpoint(action.line);
          break;
        case 'ClearBreakpoint':
          this.clearBreakpoint(action.line);
          break;
      }
    }
  }
}
