import { Token } from '../lexer/tokens';
import { MarqError } from './errors';

export const DEFAULT_MAX_CALL_STACK_DEPTH = 256;

export interface Frame {
  name: string;
  token: Token;
}

/**
 * Frames of user-defined function calls. Depth is bounded so runaway
 * recursion fails with RecursionError instead of exhausting the host stack.
 */
export class CallStack {
  private frames: Frame[] = [];

  constructor(public maxDepth: number = DEFAULT_MAX_CALL_STACK_DEPTH) {}

  push(name: string, token: Token): void {
    if (this.frames.length >= this.maxDepth) {
      throw new MarqError(
        'RecursionError',
        `Maximum call stack depth of ${this.maxDepth} exceeded in "${name}"`,
        token,
      );
    }
    this.frames.push({ name, token });
  }

  pop(): void {
    this.frames.pop();
  }

  get depth(): number {
    return this.frames.length;
  }
}
