import { Engine, markdownInputs, nullInput } from '../src/runtime/engine';
import { isNativeFunction, nativeFunctionNames } from '../src/runtime/builtins';
import { valueToString } from '../src/runtime/values';
import { plain } from './helpers';

describe('Builtins', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = new Engine();
  });

  function run(code: string): unknown {
    const [result] = engine.eval(code, nullInput());
    return plain(result);
  }

  it('should list native function names', () => {
    expect(nativeFunctionNames()).toContain('add');
    expect(isNativeFunction('upcase')).toBe(true);
    expect(isNativeFunction('map')).toBe(false);
  });

  describe('dispatch', () => {
    it('should supply the pipeline value as the first argument', () => {
      expect(run('"a,b" | split(",")')).toEqual(['a', 'b']);
      expect(run('len()')).toBe(0);
    });

    it('should reject unsupported argument counts', () => {
      expect(() => run('upcase(1, 2, 3)')).toThrow('InvalidNumberOfArguments: "upcase" expects 1 argument(s) but got 3');
    });

    it('should reject unsupported argument types', () => {
      expect(() => run('upcase(1)')).toThrow('InvalidTypes: Invalid types for "upcase": number');
    });
  });

  describe('arithmetic', () => {
    it('should add across kinds', () => {
      expect(run('add("a", 1)')).toBe('a1');
      expect(run('add(None, 3)')).toBe(3);
      expect(run('add(array(1), 2)')).toEqual([1, 2]);
      expect(run('add({a: 1}, {b: 2})')).toEqual({ a: 1, b: 2 });
    });

    it('should subtract, multiply and divide', () => {
      expect(run('sub(array(1, 2, 3), array(2))')).toEqual([1, 3]);
      expect(run('mul("ab", 2)')).toBe('abab');
      expect(run('div(7, 2)')).toBe(3.5);
      expect(run('mod(7, 3)')).toBe(1);
      expect(run('pow(2, 10)')).toBe(1024);
    });

    it('should reject division by zero', () => {
      expect(() => run('div(1, 0)')).toThrow('ZeroDivision: Division by zero');
      expect(() => run('mod(1, 0)')).toThrow('ZeroDivision: Division by zero');
    });

    it('should round numbers', () => {
      expect(run('abs(-3)')).toBe(3);
      expect(run('round(2.5)')).toBe(3);
      expect(run('floor(2.7)')).toBe(2);
      expect(run('ceil(1.2)')).toBe(2);
      expect(run('trunc(-1.7)')).toBe(-1);
      expect(run('negate(2)')).toBe(-2);
    });

    it('should compare values', () => {
      expect(run('min(3, 1)')).toBe(1);
      expect(run('max("a", "b")')).toBe('b');
      expect(run('eq(array(1), array(1))')).toBe(true);
      expect(run('1 != 2')).toBe(true);
      expect(run('"a" < "b"')).toBe(true);
      expect(run('!1')).toBe(false);
      expect(run('not(0)')).toBe(true);
    });
  });

  describe('collections', () => {
    it('should index arrays, dicts and strings', () => {
      expect(run('get(array(1, 2, 3), -1)')).toBe(3);
      expect(run('[1, 2][5]')).toBeNull();
      expect(run('get({a: 1}, "a")')).toBe(1);
      expect(run('"abc"[1]')).toBe('b');
      expect(run('nth(array(1, 2), 1)')).toBe(2);
    });

    it('should set and delete entries', () => {
      expect(run('set(array(1, 2), 0, 9)')).toEqual([9, 2]);
      expect(run('set({a: 1}, "b", 2)')).toEqual({ a: 1, b: 2 });
      expect(run('del({a: 1, b: 2}, "a")')).toEqual({ b: 2 });
      expect(run('del(array(1, 2, 3), 1)')).toEqual([1, 3]);
    });

    it('should reject out of bounds updates', () => {
      expect(() => run('set(array(1, 2), 5, 0)')).toThrow('IndexOutOfBounds: Index 5 is out of bounds for length 2');
    });

    it('should list keys, values and entries in key order', () => {
      expect(run('keys({b: 1, a: 2})')).toEqual(['a', 'b']);
      expect(run('values({b: 1, a: 2})')).toEqual([2, 1]);
      expect(run('entries({a: 1})')).toEqual([['a', 1]]);
    });

    it('should measure lengths', () => {
      expect(run('len("héllo")')).toBe(5);
      expect(run('len(array(1, 2))')).toBe(2);
      expect(run('len({a: 1})')).toBe(1);
      expect(run('len(:abc)')).toBe(3);
    });

    it('should reshape arrays', () => {
      expect(run('sort(array(3, "a", 1, None))')).toEqual([null, 1, 3, 'a']);
      expect(run('uniq(array(1, 1, 2))')).toEqual([1, 2]);
      expect(run('compact(array(1, None))')).toEqual([1]);
      expect(run('flatten(array(1, array(2, array(3))))')).toEqual([1, 2, 3]);
      expect(run('reverse("abc")')).toBe('cba');
    });

    it('should build ranges with an exclusive end', () => {
      expect(run('range(3)')).toEqual([0, 1, 2]);
      expect(run('range(1, 7, 2)')).toEqual([1, 3, 5]);
      expect(run('range(3, 0, -1)')).toEqual([3, 2, 1]);
    });

    it('should reject odd dict arguments', () => {
      expect(() => run('dict("a")')).toThrow('InvalidNumberOfArguments: "dict" expects key/value pairs');
    });
  });

  describe('strings', () => {
    it('should report types', () => {
      expect(run('type(1)')).toBe('number');
      expect(run('type(upcase)')).toBe('function');
      expect(run('type(None)')).toBe('none');
      expect(run('is_none(None)')).toBe(true);
    });

    it('should convert values', () => {
      expect(run('to_number("42")')).toBe(42);
      expect(run('to_string(array("a", 1))')).toBe('["a", 1]');
      expect(run(':sym | to_string()')).toBe(':sym');
      expect(run('to_text(:a)')).toBe('a');
      expect(() => run('to_number("x")')).toThrow('InvalidTypes: Invalid types for "to_number": string');
    });

    it('should change case and trim', () => {
      expect(run('downcase("AB")')).toBe('ab');
      expect(run('trim("  x ")')).toBe('x');
    });

    it('should split, join and replace', () => {
      expect(run('split("a,b,c", ",")')).toEqual(['a', 'b', 'c']);
      expect(run('join(array("a", "b"), "-")')).toBe('a-b');
      expect(run('replace("aaa", "a", "b")')).toBe('bbb');
      expect(run('gsub("a1b22", "[0-9]+", "#")')).toBe('a#b#');
    });

    it('should test prefixes, suffixes and patterns', () => {
      expect(run('starts_with("abc", "ab")')).toBe(true);
      expect(run('ends_with("abc", "bc")')).toBe(true);
      expect(run('test("abc", "^a")')).toBe(true);
      expect(() => run('test("abc", "(")')).toThrow('InvalidRegularExpression');
    });

    it('should slice and search', () => {
      expect(run('slice("hello", 1, 3)')).toBe('el');
      expect(run('slice(array(1, 2, 3, 4), -2, 4)')).toEqual([3, 4]);
      expect(run('index("hello", "l")')).toBe(2);
      expect(run('rindex("hello", "l")')).toBe(3);
      expect(run('repeat("ab", 3)')).toBe('ababab');
    });

    it('should convert code points', () => {
      expect(run('explode("AB")')).toEqual([65, 66]);
      expect(run('implode(array(72, 105))')).toBe('Hi');
    });

    it('should encode', () => {
      expect(run('base64("hi")')).toBe('aGk=');
      expect(run('base64d("aGk=")')).toBe('hi');
      expect(run('url_encode("a b&c")')).toBe('a%20b%26c');
    });
  });

  describe('markdown', () => {
    it('should build markdown nodes', () => {
      expect(run('md_h("Title", 2) | to_markdown()')).toBe('## Title');
      expect(run('md_code("x", "js") | to_markdown()')).toBe('```js\nx\n```');
      expect(run('md_link("a", "https://example.com") | to_markdown()')).toBe('[a](https://example.com)');
      expect(run('md_list("item", 1) | to_markdown()')).toBe('  - item');
      expect(run('md_strong("b") | to_markdown()')).toBe('**b**');
    });

    it('should render html', () => {
      expect(run('to_html("**b**")')).toBe('<p><strong>b</strong></p>\n');
    });

    it('should read node names and attributes', () => {
      const names = engine.eval('md_name()', markdownInputs('# A'));
      expect(names.map(valueToString)).toEqual(['heading']);
      const depths = engine.eval('attr("depth")', markdownInputs('## A'));
      expect(depths.map(valueToString)).toEqual(['2']);
    });
  });

  describe('runtime', () => {
    it('should raise user errors', () => {
      expect(() => run('error("bad")')).toThrow('UserDefined: bad');
    });
  });
});
