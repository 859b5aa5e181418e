import { parseSource } from '../src/parser/parser';
import { MarqError } from '../src/runtime/errors';

/** The program without source tokens, for structural comparison. */
function parse(source: string): unknown {
  return JSON.parse(JSON.stringify(parseSource(source), (key, value: unknown) => (key === 'token' ? undefined : value)));
}

const num = (value: number) => ({ type: 'Literal', value: { kind: 'number', value } });
const str = (value: string) => ({ type: 'Literal', value: { kind: 'string', value } });
const ident = (name: string) => ({ type: 'Identifier', name });
const call = (name: string, ...args: unknown[]) => ({ type: 'Call', name, args });

describe('Parser', () => {
  describe('pipelines', () => {
    it('should parse an empty program', () => {
      expect(parse('')).toEqual([]);
    });

    it('should split statements on pipes', () => {
      expect(parse('.h1 | upcase() | self')).toEqual([
        { type: 'Selector', selector: { kind: 'name', name: 'h1' } },
        call('upcase'),
        { type: 'Self' },
      ]);
    });

    it('should allow a statement directly after a body ended by a semicolon', () => {
      expect(parse('def f(x): x; f(1)')).toEqual([
        { type: 'Def', name: 'f', params: ['x'], body: [ident('x')] },
        call('f', num(1)),
      ]);
    });

    it('should parse the nodes marker', () => {
      expect(parse('.h | nodes | len()')).toEqual([
        { type: 'Selector', selector: { kind: 'name', name: 'h' } },
        { type: 'Nodes' },
        call('len'),
      ]);
    });
  });

  describe('literals', () => {
    it('should parse every literal kind', () => {
      expect(parse('[1, "a", true, None, :sym]')).toEqual([
        call(
          'array',
          num(1),
          str('a'),
          { type: 'Literal', value: { kind: 'bool', value: true } },
          { type: 'Literal', value: { kind: 'none' } },
          { type: 'Literal', value: { kind: 'symbol', value: 'sym' } },
        ),
      ]);
    });

    it('should fold a negative number literal', () => {
      expect(parse('-3')).toEqual([num(-3)]);
    });

    it('should desugar dict literals with bare keys', () => {
      expect(parse('{a: 1, "b": 2}')).toEqual([call('dict', str('a'), num(1), str('b'), num(2))]);
    });

    it('should split interpolated strings into segments', () => {
      expect(parse('s"Hi ${name}, ${self} ${$USER}"')).toEqual([
        {
          type: 'InterpolatedString',
          segments: [
            { kind: 'text', value: 'Hi ' },
            { kind: 'expr', expr: ident('name') },
            { kind: 'text', value: ', ' },
            { kind: 'self' },
            { kind: 'text', value: ' ' },
            { kind: 'env', name: 'USER' },
          ],
        },
      ]);
    });

    it('should parse an environment reference as an interpolated string', () => {
      expect(parse('$HOME')).toEqual([
        { type: 'InterpolatedString', segments: [{ kind: 'env', name: 'HOME' }] },
      ]);
    });
  });

  describe('operators', () => {
    it('should respect precedence', () => {
      expect(parse('1 + 2 * 3')).toEqual([call('add', num(1), call('mul', num(2), num(3)))]);
    });

    it('should be left associative', () => {
      expect(parse('1 - 2 - 3')).toEqual([call('sub', call('sub', num(1), num(2)), num(3))]);
    });

    it('should bind comparison tighter than equality', () => {
      expect(parse('1 < 2 == true')).toEqual([
        call('eq', call('lt', num(1), num(2)), { type: 'Literal', value: { kind: 'bool', value: true } }),
      ]);
    });

    it('should keep and/or as nodes', () => {
      expect(parse('a or b and c')).toEqual([
        { type: 'Or', left: ident('a'), right: { type: 'And', left: ident('b'), right: ident('c') } },
      ]);
    });

    it('should desugar unary operators', () => {
      expect(parse('!x')).toEqual([call('not', ident('x'))]);
      expect(parse('-x')).toEqual([call('negate', ident('x'))]);
    });

    it('should desugar indexing to get', () => {
      expect(parse('xs[0]')).toEqual([call('get', ident('xs'), num(0))]);
    });

    it('should parse a call on a parenthesized expression as a dynamic call', () => {
      expect(parse('(f)(1)')).toEqual([
        { type: 'CallDynamic', callee: { type: 'Paren', expr: ident('f') }, args: [num(1)] },
      ]);
    });
  });

  describe('definitions and control flow', () => {
    it('should parse let, var and assignment', () => {
      expect(parse('let a = 1 | var b = 2 | b = 3')).toEqual([
        { type: 'Let', name: 'a', value: num(1) },
        { type: 'Var', name: 'b', value: num(2) },
        { type: 'Assign', name: 'b', value: num(3) },
      ]);
    });

    it('should parse if/elif/else', () => {
      expect(parse('if a: 1 elif b: 2 else: 3')).toEqual([
        {
          type: 'If',
          branches: [
            { condition: ident('a'), body: num(1) },
            { condition: ident('b'), body: num(2) },
            { condition: null, body: num(3) },
          ],
        },
      ]);
    });

    it('should parse while with a pipeline body', () => {
      expect(parse('while lt(x, 3): let x = add(x, 1) | x')).toEqual([
        {
          type: 'While',
          condition: call('lt', ident('x'), num(3)),
          body: [{ type: 'Let', name: 'x', value: call('add', ident('x'), num(1)) }, ident('x')],
        },
      ]);
    });

    it('should parse foreach', () => {
      expect(parse('foreach(x, xs): f(x);')).toEqual([
        { type: 'Foreach', name: 'x', iterable: ident('xs'), body: [call('f', ident('x'))] },
      ]);
    });

    it('should parse fn, macro and do blocks', () => {
      expect(parse('fn(a): a;')).toEqual([{ type: 'Fn', params: ['a'], body: [ident('a')] }]);
      expect(parse('macro twice(x): add(x, x);')).toEqual([
        { type: 'MacroDef', name: 'twice', params: ['x'], body: [call('add', ident('x'), ident('x'))] },
      ]);
      expect(parse('do 1 | 2 end')).toEqual([{ type: 'Block', body: [num(1), num(2)] }]);
    });

    it('should parse try/catch', () => {
      expect(parse('try: error("x") catch: "fallback"')).toEqual([
        { type: 'Try', body: call('error', str('x')), catchBody: str('fallback') },
      ]);
    });

    it('should parse match arms with patterns and guards', () => {
      expect(parse('match (v): | [a, ..rest] if a: rest | {k: 1}: "one" | _: None end')).toEqual([
        {
          type: 'Match',
          value: { type: 'Paren', expr: ident('v') },
          arms: [
            {
              pattern: { kind: 'array', elements: [{ kind: 'binding', name: 'a' }], rest: 'rest' },
              guard: ident('a'),
              body: ident('rest'),
            },
            {
              pattern: { kind: 'dict', entries: [{ key: 'k', pattern: { kind: 'literal', value: { kind: 'number', value: 1 } } }] },
              guard: null,
              body: str('one'),
            },
            { pattern: { kind: 'wildcard' }, guard: null, body: { type: 'Literal', value: { kind: 'none' } } },
          ],
        },
      ]);
    });

    it('should parse modules, includes, imports and qualified access', () => {
      expect(parse('module m: def f(): 1; end | include "a" | import "b" | m::f() | m::x')).toEqual([
        { type: 'Module', name: 'm', body: [{ type: 'Def', name: 'f', params: [], body: [num(1)] }] },
        { type: 'Include', path: 'a' },
        { type: 'Import', path: 'b' },
        { type: 'QualifiedAccess', module: 'm', target: { kind: 'call', name: 'f', args: [] } },
        { type: 'QualifiedAccess', module: 'm', target: { kind: 'ident', name: 'x' } },
      ]);
    });

    it('should parse break and continue', () => {
      expect(parse('foreach(x, xs): if x: break else: continue')).toEqual([
        {
          type: 'Foreach',
          name: 'x',
          iterable: ident('xs'),
          body: [{
            type: 'If',
            branches: [
              { condition: ident('x'), body: { type: 'Break' } },
              { condition: null, body: { type: 'Continue' } },
            ],
          }],
        },
      ]);
    });
  });

  describe('errors', () => {
    it('should report unexpected tokens with their position', () => {
      expect(() => parseSource('1 )')).toThrow(MarqError);
      expect(() => parseSource('1 )')).toThrow("ParseError: line 1, column 3: Unexpected RPAREN ')'");
    });

    it('should report a missing closing parenthesis', () => {
      expect(() => parseSource('f(1')).toThrow('ParseError: line 1, column 4: Expected RPAREN but got EOF');
    });
  });
});
