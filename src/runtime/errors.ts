import { Token } from '../lexer/tokens';

export type ErrorType =
  | 'LexerError'
  | 'ParseError'
  | 'UndefinedMacro'
  | 'ArityMismatch'
  | 'RecursionLimit'
  | 'RecursionError'
  | 'NotDefined'
  | 'EnvNotFound'
  | 'IndexOutOfBounds'
  | 'InvalidTypes'
  | 'InvalidNumberOfArguments'
  | 'InvalidDefinition'
  | 'InvalidRegularExpression'
  | 'ZeroDivision'
  | 'UserDefined'
  | 'AssignToImmutable'
  | 'ModuleLoadError'
  | 'Aborted'
  | 'InternalError';

/** Every error surfaced by the language carries its type and, where known, the token it came from. */
export class MarqError extends Error {
  constructor(
    public errorType: ErrorType,
    message: string,
    public token?: Token,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'MarqError';
  }
}

export class MacroExpansionError extends MarqError {
  constructor(
    errorType: 'UndefinedMacro' | 'ArityMismatch' | 'RecursionLimit',
    message: string,
    public macroName?: string,
    public expected?: number,
    public got?: number,
    token?: Token,
  ) {
    super(errorType, message, token);
    this.name = 'MacroExpansionError';
  }

  static undefinedMacro(name: string, token?: Token): MacroExpansionError {
    return new MacroExpansionError('UndefinedMacro', `Macro "${name}" is not defined`, name, undefined, undefined, token);
  }

  static arityMismatch(name: string, expected: number, got: number, token?: Token): MacroExpansionError {
    return new MacroExpansionError(
      'ArityMismatch',
      `Macro "${name}" expects ${expected} argument(s) but got ${got}`,
      name,
      expected,
      got,
      token,
    );
  }

  static recursionLimit(token?: Token): MacroExpansionError {
    return new MacroExpansionError('RecursionLimit', 'Macro expansion exceeded the maximum depth', undefined, undefined, undefined, token);
  }
}

/** Sentinel thrown to implement break. */
export class BreakSignal {
  readonly signal = 'break';
}

/** Sentinel thrown to implement continue. */
export class ContinueSignal {
  readonly signal = 'continue';
}

export function isControlSignal(e: unknown): e is BreakSignal | ContinueSignal {
  return e instanceof BreakSignal || e instanceof ContinueSignal;
}

export function isStackOverflow(e: unknown): e is RangeError {
  return e instanceof RangeError && e.message.includes('call stack');
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
