import { RuntimeValue } from './values';

export type EnvErrorKind = 'NotFound' | 'AssignToImmutable';

export class EnvError extends Error {
  constructor(
    public kind: EnvErrorKind,
    public variable: string,
  ) {
    super(kind === 'NotFound' ? `"${variable}" is not defined` : `Cannot assign to immutable variable "${variable}"`);
    this.name = 'EnvError';
  }
}

interface Binding {
  value: RuntimeValue;
  mutable: boolean;
}

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain.
 */
export class Environment {
  private bindings: Map<string, Binding> = new Map();
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  define(name: string, value: RuntimeValue): void {
    this.bindings.set(name, { value, mutable: false });
  }

  defineMutable(name: string, value: RuntimeValue): void {
    this.bindings.set(name, { value, mutable: true });
  }

  /** Look a name up through the scope chain, throwing NotFound on a miss. */
  resolve(name: string): RuntimeValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new EnvError('NotFound', name);
    }
    return value;
  }

  lookup(name: string): RuntimeValue | undefined {
    const binding = this.findBinding(name);
    return binding?.value;
  }

  /**
   * Rebind an existing mutable variable in the nearest scope that defines it.
   * Never creates a binding.
   */
  assign(name: string, value: RuntimeValue): void {
    const binding = this.findBinding(name);
    if (binding === undefined) {
      throw new EnvError('NotFound', name);
    }
    if (!binding.mutable) {
      throw new EnvError('AssignToImmutable', name);
    }
    binding.value = value;
  }

  has(name: string): boolean {
    return this.findBinding(name) !== undefined;
  }

  child(): Environment {
    return new Environment(this);
  }

  private findBinding(name: string): Binding | undefined {
    let env: Environment | null = this;
    while (env !== null) {
      const binding = env.bindings.get(name);
      if (binding !== undefined) return binding;
      env = env.parent;
    }
    return undefined;
  }
}
