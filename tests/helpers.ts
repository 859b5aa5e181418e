import { RuntimeValue, valueToString } from '../src/runtime/values';

/** Plain JavaScript form of a runtime value, for assertions. */
export function plain(value: RuntimeValue): unknown {
  switch (value.kind) {
    case 'none': return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'symbol': return `:${value.name}`;
    case 'array': return value.elements.map(plain);
    case 'dict': return Object.fromEntries([...value.entries].map(([k, v]) => [k, plain(v)]));
    default: return valueToString(value);
  }
}

/** Both execution strategies, as `[label, useCompiler]`. */
export const STRATEGIES: [string, boolean][] = [
  ['compiler', true],
  ['tree-walking evaluator', false],
];
