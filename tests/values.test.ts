import { Environment, EnvError } from '../src/runtime/environment';
import { CallStack } from '../src/runtime/call-stack';
import { TokenType } from '../src/lexer/tokens';
import { parseSource } from '../src/parser/parser';
import {
  arrayValue,
  boolValue,
  compareValues,
  dictValue,
  functionValue,
  isTruthy,
  markdownValue,
  noneValue,
  numberValue,
  stringValue,
  symbolValue,
  valueLength,
  valueText,
  valueToString,
  valuesEqual,
} from '../src/runtime/values';

describe('Environment', () => {
  it('should resolve names through parent scopes', () => {
    const root = new Environment();
    root.define('a', numberValue(1));
    const child = root.child();
    expect(child.resolve('a')).toEqual(numberValue(1));
    expect(child.has('a')).toBe(true);
    expect(child.lookup('b')).toBeUndefined();
  });

  it('should shadow without touching the parent', () => {
    const root = new Environment();
    root.define('a', numberValue(1));
    const child = root.child();
    child.define('a', numberValue(2));
    expect(child.resolve('a')).toEqual(numberValue(2));
    expect(root.resolve('a')).toEqual(numberValue(1));
  });

  it('should assign to the nearest mutable binding', () => {
    const root = new Environment();
    root.defineMutable('n', numberValue(1));
    root.child().assign('n', numberValue(5));
    expect(root.resolve('n')).toEqual(numberValue(5));
  });

  it('should reject assignment to immutable or missing bindings', () => {
    const env = new Environment();
    env.define('k', numberValue(1));
    expect(() => env.assign('k', numberValue(2))).toThrow(new EnvError('AssignToImmutable', 'k'));
    expect(() => env.assign('missing', numberValue(2))).toThrow('"missing" is not defined');
    expect(() => env.resolve('missing')).toThrow(EnvError);
  });
});

describe('CallStack', () => {
  const token = { type: TokenType.IDENTIFIER, value: 'f', line: 1, column: 1, moduleId: 0 };

  it('should track depth', () => {
    const stack = new CallStack(2);
    stack.push('f', token);
    stack.push('g', token);
    expect(stack.depth).toBe(2);
    stack.pop();
    expect(stack.depth).toBe(1);
  });

  it('should refuse to grow past its limit', () => {
    const stack = new CallStack(1);
    stack.push('f', token);
    expect(() => stack.push('g', token)).toThrow('RecursionError: Maximum call stack depth of 1 exceeded in "g"');
  });
});

describe('Runtime values', () => {
  it('should apply truthiness rules', () => {
    expect(isTruthy(noneValue())).toBe(false);
    expect(isTruthy(numberValue(0))).toBe(false);
    expect(isTruthy(stringValue(''))).toBe(false);
    expect(isTruthy(arrayValue([]))).toBe(false);
    expect(isTruthy(dictValue([]))).toBe(true);
    expect(isTruthy(symbolValue('a'))).toBe(true);
    expect(isTruthy(markdownValue({ type: 'paragraph', children: [] }, { index: 3 }))).toBe(false);
  });

  it('should measure lengths', () => {
    expect(valueLength(numberValue(3.9))).toBe(3);
    expect(valueLength(stringValue('日本'))).toBe(2);
    expect(valueLength(boolValue(true))).toBe(0);
  });

  it('should format values for display', () => {
    expect(valueToString(arrayValue([stringValue('a'), numberValue(1), noneValue()]))).toBe('["a", 1, None]');
    expect(valueToString(dictValue([['b', boolValue(true)], ['a', symbolValue('s')]]))).toBe('{"a": :s, "b": true}');
    expect(valueToString(numberValue(1.5))).toBe('1.5');
    expect(valueText(markdownValue({ type: 'heading', depth: 1, children: [{ type: 'text', value: 'T' }] }))).toBe('T');
  });

  it('should compare values structurally', () => {
    expect(valuesEqual(arrayValue([numberValue(1)]), arrayValue([numberValue(1)]))).toBe(true);
    expect(valuesEqual(numberValue(1), stringValue('1'))).toBe(false);
    expect(valuesEqual(dictValue([['a', noneValue()]]), dictValue([['a', noneValue()]]))).toBe(true);
  });

  it('should compare functions by parameters and body only', () => {
    const body = parseSource('add(x, 1)');
    const a = functionValue(['x'], body, new Environment());
    const b = functionValue(['x'], parseSource('add(x,   1)'), new Environment());
    expect(valuesEqual(a, b)).toBe(true);
    expect(valuesEqual(a, functionValue(['y'], body, new Environment()))).toBe(false);
  });

  it('should order values by kind, then value', () => {
    expect(compareValues(noneValue(), numberValue(0))).toBeLessThan(0);
    expect(compareValues(numberValue(2), numberValue(10))).toBeLessThan(0);
    expect(compareValues(stringValue('b'), stringValue('a'))).toBeGreaterThan(0);
  });
});
