import { Engine, markdownInputs, nullInput, textInputs } from '../src/runtime/engine';
import { Compiler } from '../src/runtime/compiler';
import { Evaluator } from '../src/runtime/evaluator';
import { parseSource } from '../src/parser/parser';
import { valueToString } from '../src/runtime/values';
import { updateWith } from '../src/runtime/update';
import { query } from '../src';
import { STRATEGIES, plain } from './helpers';

describe.each(STRATEGIES)('Engine (%s)', (_label, useCompiler) => {
  let engine: Engine;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    engine = new Engine({
      useCompiler,
      log: message => logs.push(message),
      envVars: { USER: 'test-user' },
    });
  });

  function run(code: string): unknown[] {
    return engine.eval(code, nullInput()).map(plain);
  }

  describe('expressions', () => {
    it('should evaluate literals', () => {
      expect(run('"42"')).toEqual(['42']);
      expect(run('None')).toEqual([null]);
      expect(run(':sym')).toEqual([':sym']);
    });

    it('should return nothing for an empty query', () => {
      expect(engine.eval('  ', nullInput())).toEqual([]);
    });

    it('should evaluate operators through the builtins', () => {
      expect(run('1 + 2 * 3')).toEqual([7]);
      expect(run('[1, 2][1]')).toEqual([2]);
      expect(run('{a: 1}')).toEqual([{ a: 1 }]);
    });

    it('should short-circuit and/or', () => {
      expect(run('false and error("x")')).toEqual([false]);
      expect(run('true or error("x")')).toEqual([true]);
      expect(run('1 and 2')).toEqual([2]);
      expect(run('None or "d"')).toEqual(['d']);
    });

    it('should pick the first truthy if branch', () => {
      expect(run('if true: "yes" else: "no"')).toEqual(['yes']);
      expect(run('if 0: "a" elif "x": "b" else: "c"')).toEqual(['b']);
      expect(run('if false: 1')).toEqual([null]);
    });

    it('should pass the pipeline value along', () => {
      expect(run('"abc" | upcase() | self')).toEqual(['ABC']);
    });
  });

  describe('bindings', () => {
    it('should rebind mutable variables', () => {
      expect(run('var x = 1 | x = add(x, 1) | x')).toEqual([2]);
    });

    it('should reject assignment to immutable bindings', () => {
      expect(() => run('let y = 1 | y = 2')).toThrow('AssignToImmutable: Cannot assign to immutable variable "y"');
    });

    it('should reject assignment to unknown names', () => {
      expect(() => run('z = 1')).toThrow('NotDefined: "z" is not defined');
    });

    it('should report unknown identifiers and functions', () => {
      expect(() => run('nope')).toThrow('NotDefined: "nope" is not defined');
      expect(() => run('nope()')).toThrow('InvalidDefinition: "nope" is not defined');
    });

    it('should scope blocks', () => {
      expect(run('let a = 1 | do let a = 2 | a end')).toEqual([2]);
      expect(() => run('do let b = 1 end | b')).toThrow('NotDefined: "b" is not defined');
    });

    it('should keep definitions between evaluations', () => {
      run('def twice(x): mul(x, 2);');
      expect(run('twice(4)')).toEqual([8]);
    });

    it('should expose string values defined on the engine', () => {
      engine.defineStringValue('who', 'world');
      expect(run('who')).toEqual(['world']);
    });
  });

  describe('loops', () => {
    it('should collect every pass of a while loop', () => {
      expect(run('let x = 0 | while lt(x, 3): let x = add(x, 1) | x')).toEqual([[1, 2, 3]]);
    });

    it('should yield None when a while condition starts false', () => {
      expect(run('while false: 1')).toEqual([null]);
    });

    it('should yield the last value of an until loop', () => {
      expect(run('var n = 0 | until gte(n, 3): n = add(n, 1) | n')).toEqual([3]);
    });

    it('should map foreach over arrays and strings', () => {
      expect(run('foreach(x, array(1, 2, 3)): add(x, 1);')).toEqual([[2, 3, 4]]);
      expect(run('foreach(c, "ab"): upcase(c);')).toEqual([['A', 'B']]);
    });

    it('should stop at break and skip at continue', () => {
      expect(run('foreach(x, [1, 2, 3]): if x == 2: break else: add(x, 1);')).toEqual([[2]]);
      expect(run('foreach(x, [1, 2, 3]): if x == 2: continue else: x;')).toEqual([[1, 3]]);
    });

    it('should yield None when a while loop breaks on its first pass', () => {
      expect(run('while true: break')).toEqual([null]);
    });

    it('should keep the passes before a later break', () => {
      expect(run('let x = 0 | while true: let x = add(x, 1) | if x == 3: break else: x')).toEqual([[1, 2]]);
    });

    it('should reset the running value when the first while pass continues', () => {
      const code = 'var n = 0 | 5 | while lt(n, 2): n = add(n, 1) | if eq(n, 1): continue else: self';
      expect(run(code)).toEqual([[null]]);
    });

    it('should yield None when an until condition starts true', () => {
      expect(run('until true: 1')).toEqual([null]);
    });

    it('should return the running value when an until loop breaks', () => {
      expect(run('var n = 0 | until false: n = add(n, 1) | if n == 3: break else: n')).toEqual([2]);
    });

    it('should keep the running value when an until pass continues', () => {
      const code = 'var n = 0 | until gte(n, 3): n = add(n, 1) | if n == 3: continue else: mul(n, 10)';
      expect(run(code)).toEqual([20]);
    });

    it('should reject iterating over a number', () => {
      expect(() => run('foreach(x, 3): x;')).toThrow('InvalidTypes: Cannot iterate over number in foreach');
    });

    it('should reject break outside a loop', () => {
      expect(() => run('break')).toThrow('InternalError: break or continue used outside of a loop');
    });
  });

  describe('functions', () => {
    it('should bind the pipeline value to a missing first parameter', () => {
      expect(run('def inc(x): add(x, 1); inc(5)')).toEqual([6]);
      expect(run('def inc(x): add(x, 1); 1 | inc()')).toEqual([2]);
    });

    it('should reject other argument counts', () => {
      expect(() => run('def f(a, b): a; f()')).toThrow('InvalidNumberOfArguments: "f" expects 2 argument(s) but got 0');
    });

    it('should capture the defining environment', () => {
      expect(run('let k = 10 | let addk = fn(v): add(v, k); | addk(5)')).toEqual([15]);
    });

    it('should call a parenthesized function value', () => {
      expect(run('(fn(x): mul(x, 2);)(4)')).toEqual([8]);
    });

    it('should recurse', () => {
      expect(run('def fact(n): if n <= 1: 1 else: n * fact(n - 1); fact(5)')).toEqual([120]);
    });

    it('should bound the call stack depth', () => {
      engine.setMaxCallStackDepth(10);
      expect(() => run('def f(n): f(n); f(1)')).toThrow('RecursionError: Maximum call stack depth of 10 exceeded in "f"');
    });

    it('should stop unbounded recursion at the default depth', () => {
      expect(() => run('def f(n): f(n); f(1)')).toThrow('RecursionError: Maximum call stack depth of 256 exceeded in "f"');
    });

    it('should not let try swallow host stack exhaustion', () => {
      engine.setMaxCallStackDepth(1_000_000);
      expect(() => run('def f(n): try: f(n) catch: 1; f(1)')).toThrow('RecursionError: Maximum call stack size exceeded');
    });

    it('should treat native names as function values', () => {
      expect(run('let u = upcase | u("a")')).toEqual(['A']);
    });

    it('should reject calling a value that is not a function', () => {
      expect(() => run('let v = 1 | v()')).toThrow('InvalidDefinition: "v" is not a function (got number)');
    });
  });

  describe('match', () => {
    it('should destructure arrays with a rest binding', () => {
      expect(run('match (array(1, 2, 3)): | [a, ..rest]: rest | _: None end')).toEqual([[2, 3]]);
    });

    it('should match dict fields', () => {
      expect(run('match ({k: 1}): | {k: 2}: "two" | {k}: k end')).toEqual([1]);
    });

    it('should honor guards', () => {
      expect(run('match (5): | n if n > 3: "big" | _: "small" end')).toEqual(['big']);
      expect(run('match (2): | n if n > 3: "big" | _: "small" end')).toEqual(['small']);
    });

    it('should yield None when no arm matches', () => {
      expect(run('match (1): | 2: "two" end')).toEqual([null]);
    });
  });

  describe('errors', () => {
    it('should recover with try/catch', () => {
      expect(run('try: error("boom") catch: "recovered"')).toEqual(['recovered']);
    });

    it('should surface user errors', () => {
      expect(() => run('error("boom")')).toThrow('UserDefined: boom');
    });
  });

  describe('strings', () => {
    it('should interpolate expressions, self and environment variables', () => {
      expect(run('let name = "marq" | s"hi ${name} ${$USER}"')).toEqual(['hi marq test-user']);
      expect(run('"x" | s"<${self}>"')).toEqual(['<x>']);
      expect(run('$USER')).toEqual(['test-user']);
    });

    it('should report missing environment variables', () => {
      expect(() => run('s"${$MISSING}"')).toThrow('EnvNotFound: Environment variable "MISSING" is not set');
    });
  });

  describe('inputs', () => {
    it('should run the part after nodes once over all results', () => {
      const results = engine.eval('upcase() | nodes | join(",")', textInputs('a\nb\n'));
      expect(results.map(plain)).toEqual(['A,B']);
    });

    it('should map markdown inputs node by node', () => {
      const results = engine.eval('.h1 | upcase()', markdownInputs('# Title\n\nbody'));
      expect(results.map(valueToString)).toEqual(['# TITLE', '']);
    });

    it('should reproduce markdown inputs when merging an identity query', () => {
      const inputs = markdownInputs('# Title\n\nSome *text*.\n\n- a\n- b');
      expect(updateWith(inputs, engine.eval('self', inputs))).toEqual(inputs);
    });

    it('should read attributes with selectors', () => {
      const results = engine.eval('.code | .lang', markdownInputs('```js\nx\n```'));
      expect(results.map(valueToString)).toEqual(['js']);
    });
  });

  describe('logging', () => {
    it('should log debug output', () => {
      expect(run('debug(1)')).toEqual([1]);
      expect(logs).toEqual(['[debug] 1']);
    });

    it('should trace calls when enabled', () => {
      engine.setTrace(true);
      run('def f(x): x; f(2)');
      expect(logs).toContain('[trace] call f(2)');
    });
  });

  describe('prelude', () => {
    beforeEach(() => {
      engine.loadBuiltinModule();
    });

    it('should provide collection helpers', () => {
      expect(run('map(array(1, 2), fn(x): add(x, 1);)')).toEqual([[2, 3]]);
      expect(run('filter(array(1, 2, 3, 4), fn(x): gt(x, 2);)')).toEqual([[3, 4]]);
      expect(run('fold(array(1, 2, 3), 0, fn(a, b): add(a, b);)')).toEqual([6]);
      expect(run('first(array(4, 5))')).toEqual([4]);
      expect(run('last(array(4, 5))')).toEqual([5]);
      expect(run('"x" | identity()')).toEqual(['x']);
      expect(run('is_empty("")')).toEqual([true]);
    });
  });
});

describe('Compiler', () => {
  it('should record the position of the nodes marker', () => {
    const compiled = new Compiler(new Evaluator()).compile(parseSource('1 | nodes | 2'));
    expect(compiled.nodesIndex).toBe(1);
    expect(compiled.steps).toHaveLength(3);
  });

  it('should report no nodes marker', () => {
    expect(new Compiler(new Evaluator()).compile(parseSource('1 | 2')).nodesIndex).toBeNull();
  });
});

describe('query()', () => {
  it('should run a query over a markdown document with the prelude', () => {
    const results = query('.h2 | upcase()', '# One\n\n## Two');
    expect(results.map(valueToString)).toEqual(['', '## TWO']);
  });
});

describe('textInputs()', () => {
  it('should drop a trailing empty line', () => {
    expect(textInputs('a\nb\n').map(plain)).toEqual(['a', 'b']);
    expect(textInputs('a\n\nb').map(plain)).toEqual(['a', '', 'b']);
  });
});
