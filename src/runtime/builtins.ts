/**
 * Native function library.
 *
 * Each native declares the argument counts it accepts. A call that passes one
 * argument fewer than an accepted count receives the pipeline value as its
 * first argument, so `"a,b" | split(",")` is `split("a,b", ",")`.
 */

import { Token } from '../lexer/tokens';
import {
  MdNode,
  nodeAttr,
  nodeName,
  nodeValue,
  text,
  withValue,
} from '../markdown/node';
import { renderHtml } from '../markdown/parse';
import { Environment } from './environment';
import { MarqError, errorMessage } from './errors';
import { attributeToValue } from './selector';
import {
  RuntimeValue,
  arrayValue,
  boolValue,
  compareValues,
  dictValue,
  isTruthy,
  markdownValue,
  noneValue,
  numberValue,
  selectedNode,
  stringValue,
  typeName,
  valueLength,
  valueText,
  valueToString,
  valuesEqual,
} from './values';

export interface NativeContext {
  name: string;
  input: RuntimeValue;
  env: Environment;
  token: Token;
  log: (message: string) => void;
  breakpoint: () => void;
}

type NativeImpl = (args: RuntimeValue[], ctx: NativeContext) => RuntimeValue;

interface NativeFunction {
  /** Accepted argument counts; null accepts any number of arguments. */
  arity: number[] | null;
  call: NativeImpl;
}

const NATIVES = new Map<string, NativeFunction>();

function define(name: string, arity: number[] | null, call: NativeImpl): void {
  NATIVES.set(name, { arity, call });
}

export function isNativeFunction(name: string): boolean {
  return NATIVES.has(name);
}

export function nativeFunctionNames(): string[] {
  return [...NATIVES.keys()].sort();
}

/** Dispatch a native by name, supplying the pipeline value as an implicit first argument where needed. */
export function callNative(name: string, args: RuntimeValue[], ctx: Omit<NativeContext, 'name'>): RuntimeValue {
  const fn = NATIVES.get(name);
  if (fn === undefined) {
    throw new MarqError('InvalidDefinition', `"${name}" is not a function`, ctx.token);
  }
  const context: NativeContext = { ...ctx, name };
  if (fn.arity === null || fn.arity.includes(args.length)) {
    return fn.call(args, context);
  }
  if (fn.arity.includes(args.length + 1)) {
    return fn.call([ctx.input, ...args], context);
  }
  throw new MarqError(
    'InvalidNumberOfArguments',
    `"${name}" expects ${fn.arity.join(' or ')} argument(s) but got ${args.length}`,
    ctx.token,
  );
}

// ─── Helpers ─────────────────────────────────────────────

function invalidTypes(ctx: NativeContext, args: RuntimeValue[]): MarqError {
  return new MarqError('InvalidTypes', `Invalid types for "${ctx.name}": ${args.map(typeName).join(', ')}`, ctx.token);
}

/** Text of strings, symbols and markdown values; null for anything else. */
function textOf(value: RuntimeValue): string | null {
  switch (value.kind) {
    case 'string': return value.value;
    case 'symbol': return value.name;
    case 'markdown': return valueText(value);
    default: return null;
  }
}

function requireText(ctx: NativeContext, value: RuntimeValue, args: RuntimeValue[]): string {
  const s = textOf(value);
  if (s === null) throw invalidTypes(ctx, args);
  return s;
}

function requireNumber(ctx: NativeContext, value: RuntimeValue, args: RuntimeValue[]): number {
  if (value.kind !== 'number') throw invalidTypes(ctx, args);
  return value.value;
}

/** Rewrite the text of a string or markdown value, keeping its kind. */
function mapText(ctx: NativeContext, value: RuntimeValue, args: RuntimeValue[], f: (s: string) => string): RuntimeValue {
  switch (value.kind) {
    case 'none':
      return value;
    case 'string':
      return stringValue(f(value.value));
    case 'markdown': {
      const target = selectedNode(value);
      return target === null ? value : markdownValue(withValue(target, f(nodeValue(target))));
    }
    default:
      throw invalidTypes(ctx, args);
  }
}

function compileRegex(ctx: NativeContext, pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (e) {
    throw new MarqError('InvalidRegularExpression', errorMessage(e), ctx.token);
  }
}

function normalizeIndex(index: number, length: number): number {
  const i = Math.trunc(index);
  return i < 0 ? Math.max(length + i, 0) : Math.min(i, length);
}

function numeric(name: string, f: (n: number) => number): void {
  define(name, [1], (args, ctx) => {
    const [value] = args;
    if (value.kind === 'none') return value;
    return numberValue(f(requireNumber(ctx, value, args)));
  });
}

function compare(name: string, test: (order: number) => boolean): void {
  define(name, [2], ([a, b]) => boolValue(test(compareValues(a, b))));
}

function dictKey(ctx: NativeContext, key: RuntimeValue, args: RuntimeValue[]): string {
  switch (key.kind) {
    case 'string': return key.value;
    case 'symbol': return key.name;
    case 'number': return valueToString(key);
    default: throw invalidTypes(ctx, args);
  }
}

function markdownText(s: RuntimeValue): MdNode[] {
  return [text(valueText(s))];
}

// ─── Collections ─────────────────────────────────────────

define('array', null, args => arrayValue(args));

define('dict', null, (args, ctx) => {
  if (args.length % 2 !== 0) {
    throw new MarqError('InvalidNumberOfArguments', '"dict" expects key/value pairs', ctx.token);
  }
  const entries: [string, RuntimeValue][] = [];
  for (let i = 0; i < args.length; i += 2) {
    entries.push([dictKey(ctx, args[i], args), args[i + 1]]);
  }
  return dictValue(entries);
});

define('get', [2], (args, ctx) => {
  const [container, key] = args;
  switch (container.kind) {
    case 'none':
      return container;
    case 'array': {
      const i = Math.trunc(requireNumber(ctx, key, args));
      return container.elements[i < 0 ? container.elements.length + i : i] ?? noneValue();
    }
    case 'string': {
      const chars = [...container.value];
      const i = Math.trunc(requireNumber(ctx, key, args));
      const ch = chars[i < 0 ? chars.length + i : i];
      return ch === undefined ? noneValue() : stringValue(ch);
    }
    case 'dict':
      return container.entries.get(dictKey(ctx, key, args)) ?? noneValue();
    case 'markdown':
      return markdownValue(container.node, { index: Math.trunc(requireNumber(ctx, key, args)) });
    default:
      throw invalidTypes(ctx, args);
  }
});

define('set', [3], (args, ctx) => {
  const [container, key, value] = args;
  if (container.kind === 'dict') {
    return dictValue([...container.entries, [dictKey(ctx, key, args), value]]);
  }
  if (container.kind === 'array') {
    const i = Math.trunc(requireNumber(ctx, key, args));
    if (i < 0 || i >= container.elements.length) {
      throw new MarqError('IndexOutOfBounds', `Index ${i} is out of bounds for length ${container.elements.length}`, ctx.token);
    }
    const elements = [...container.elements];
    elements[i] = value;
    return arrayValue(elements);
  }
  throw invalidTypes(ctx, args);
});

define('del', [2], (args, ctx) => {
  const [container, key] = args;
  if (container.kind === 'dict') {
    const name = dictKey(ctx, key, args);
    return dictValue([...container.entries].filter(([k]) => k !== name));
  }
  if (container.kind === 'array') {
    const i = Math.trunc(requireNumber(ctx, key, args));
    if (i < 0 || i >= container.elements.length) {
      throw new MarqError('IndexOutOfBounds', `Index ${i} is out of bounds for length ${container.elements.length}`, ctx.token);
    }
    return arrayValue(container.elements.filter((_, j) => j !== i));
  }
  throw invalidTypes(ctx, args);
});

define('keys', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind === 'dict') return arrayValue([...v.entries.keys()].map(stringValue));
  if (v.kind === 'array') return arrayValue(v.elements.map((_, i) => numberValue(i)));
  throw invalidTypes(ctx, args);
});

define('values', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind === 'dict') return arrayValue([...v.entries.values()]);
  if (v.kind === 'array') return v;
  throw invalidTypes(ctx, args);
});

define('entries', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'dict') throw invalidTypes(ctx, args);
  return arrayValue([...v.entries].map(([k, value]) => arrayValue([stringValue(k), value])));
});

define('len', [1], ([v]) => numberValue(valueLength(v)));
define('type', [1], ([v]) => stringValue(typeName(v)));
define('is_none', [1], ([v]) => boolValue(v.kind === 'none'));

define('nth', [2], (args, ctx) => {
  const [v, n] = args;
  const i = Math.trunc(requireNumber(ctx, n, args));
  if (v.kind === 'array') {
    return v.elements[i < 0 ? v.elements.length + i : i] ?? noneValue();
  }
  if (v.kind === 'string') {
    const chars = [...v.value];
    const ch = chars[i < 0 ? chars.length + i : i];
    return ch === undefined ? noneValue() : stringValue(ch);
  }
  if (v.kind === 'none') return v;
  throw invalidTypes(ctx, args);
});

define('reverse', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind === 'array') return arrayValue([...v.elements].reverse());
  if (v.kind === 'string') return stringValue([...v.value].reverse().join(''));
  if (v.kind === 'none') return v;
  throw invalidTypes(ctx, args);
});

define('sort', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  return arrayValue([...v.elements].sort(compareValues));
});

define('uniq', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  const out: RuntimeValue[] = [];
  for (const el of v.elements) {
    if (!out.some(seen => valuesEqual(seen, el))) out.push(el);
  }
  return arrayValue(out);
});

define('compact', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  return arrayValue(v.elements.filter(el => el.kind !== 'none'));
});

define('flatten', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  const flat = (elements: RuntimeValue[]): RuntimeValue[] =>
    elements.flatMap(el => (el.kind === 'array' ? flat(el.elements) : [el]));
  return arrayValue(flat(v.elements));
});

/** range(end), range(start, end) or range(start, end, step); `end` is exclusive. */
define('range', [1, 2, 3], (args, ctx) => {
  const nums = args.map(a => requireNumber(ctx, a, args));
  const [start, end, step] = nums.length === 1 ? [0, nums[0], 1] : [nums[0], nums[1], nums[2] ?? 1];
  if (step === 0) {
    throw new MarqError('InvalidTypes', '"range" step must not be zero', ctx.token);
  }
  const out: RuntimeValue[] = [];
  for (let i = start; step > 0 ? i < end : i > end; i += step) {
    out.push(numberValue(i));
  }
  return arrayValue(out);
});

// ─── Arithmetic & comparison ─────────────────────────────

define('add', [2], (args, ctx) => {
  const [a, b] = args;
  if (a.kind === 'none') return b;
  if (b.kind === 'none') return a;
  if (a.kind === 'number' && b.kind === 'number') return numberValue(a.value + b.value);
  if (a.kind === 'array' && b.kind === 'array') return arrayValue([...a.elements, ...b.elements]);
  if (a.kind === 'array') return arrayValue([...a.elements, b]);
  if (a.kind === 'dict' && b.kind === 'dict') return dictValue([...a.entries, ...b.entries]);
  if (a.kind === 'markdown' && (b.kind === 'string' || b.kind === 'number')) {
    return mapText(ctx, a, args, s => s + valueText(b));
  }
  if (a.kind === 'string' || b.kind === 'string') return stringValue(valueText(a) + valueText(b));
  throw invalidTypes(ctx, args);
});

define('sub', [2], (args, ctx) => {
  const [a, b] = args;
  if (a.kind === 'number' && b.kind === 'number') return numberValue(a.value - b.value);
  if (a.kind === 'array' && b.kind === 'array') {
    const removed = b.elements;
    return arrayValue(a.elements.filter(el => !removed.some(r => valuesEqual(el, r))));
  }
  throw invalidTypes(ctx, args);
});

define('mul', [2], (args, ctx) => {
  const [a, b] = args;
  if (a.kind === 'number' && b.kind === 'number') return numberValue(a.value * b.value);
  if (a.kind === 'string' && b.kind === 'number') return stringValue(a.value.repeat(Math.max(0, Math.trunc(b.value))));
  if (a.kind === 'array' && b.kind === 'number') {
    const times = Math.max(0, Math.trunc(b.value));
    return arrayValue(Array.from({ length: times }, () => a.elements).flat());
  }
  throw invalidTypes(ctx, args);
});

define('div', [2], (args, ctx) => {
  const [a, b] = args;
  if (a.kind === 'number' && b.kind === 'number') {
    if (b.value === 0) throw new MarqError('ZeroDivision', 'Division by zero', ctx.token);
    return numberValue(a.value / b.value);
  }
  if (a.kind === 'string' && b.kind === 'string') return arrayValue(a.value.split(b.value).map(stringValue));
  throw invalidTypes(ctx, args);
});

define('mod', [2], (args, ctx) => {
  const [a, b] = args;
  if (a.kind === 'number' && b.kind === 'number') {
    if (b.value === 0) throw new MarqError('ZeroDivision', 'Division by zero', ctx.token);
    return numberValue(a.value % b.value);
  }
  throw invalidTypes(ctx, args);
});

define('pow', [2], (args, ctx) => numberValue(Math.pow(requireNumber(ctx, args[0], args), requireNumber(ctx, args[1], args))));

numeric('negate', n => -n);
numeric('abs', Math.abs);
numeric('ceil', Math.ceil);
numeric('floor', Math.floor);
numeric('round', Math.round);
numeric('trunc', Math.trunc);

define('min', [2], ([a, b]) => (compareValues(a, b) <= 0 ? a : b));
define('max', [2], ([a, b]) => (compareValues(a, b) >= 0 ? a : b));

define('eq', [2], ([a, b]) => boolValue(valuesEqual(a, b)));
define('ne', [2], ([a, b]) => boolValue(!valuesEqual(a, b)));
compare('lt', order => order < 0);
compare('lte', order => order <= 0);
compare('gt', order => order > 0);
compare('gte', order => order >= 0);
define('not', [1], ([v]) => boolValue(!isTruthy(v)));

// ─── Strings ─────────────────────────────────────────────

define('to_string', [1], ([v]) => stringValue(valueToString(v)));
define('to_text', [1], ([v]) => (v.kind === 'none' ? v : stringValue(valueText(v))));

define('to_number', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind === 'number') return v;
  if (v.kind === 'bool') return numberValue(v.value ? 1 : 0);
  const s = textOf(v);
  const n = s === null || s.trim() === '' ? NaN : Number(s.trim());
  if (Number.isNaN(n)) throw invalidTypes(ctx, args);
  return numberValue(n);
});

define('upcase', [1], (args, ctx) => mapText(ctx, args[0], args, s => s.toUpperCase()));
define('downcase', [1], (args, ctx) => mapText(ctx, args[0], args, s => s.toLowerCase()));
define('trim', [1], (args, ctx) => mapText(ctx, args[0], args, s => s.trim()));

define('starts_with', [2], (args, ctx) => {
  const [v, prefix] = args;
  if (v.kind === 'none') return boolValue(false);
  return boolValue(requireText(ctx, v, args).startsWith(requireText(ctx, prefix, args)));
});

define('ends_with', [2], (args, ctx) => {
  const [v, suffix] = args;
  if (v.kind === 'none') return boolValue(false);
  return boolValue(requireText(ctx, v, args).endsWith(requireText(ctx, suffix, args)));
});

define('split', [2], (args, ctx) => {
  const [v, sep] = args;
  if (v.kind === 'none') return arrayValue([]);
  const s = requireText(ctx, v, args);
  const separator = requireText(ctx, sep, args);
  const parts = separator === '' ? [...s] : s.split(separator);
  return arrayValue(parts.map(stringValue));
});

define('join', [2], (args, ctx) => {
  const [v, sep] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  return stringValue(v.elements.map(valueText).join(requireText(ctx, sep, args)));
});

define('replace', [3], (args, ctx) => {
  const [v, from, to] = args;
  const pattern = requireText(ctx, from, args);
  const replacement = requireText(ctx, to, args);
  return mapText(ctx, v, args, s => s.split(pattern).join(replacement));
});

define('gsub', [3], (args, ctx) => {
  const [v, pattern, to] = args;
  const regex = compileRegex(ctx, requireText(ctx, pattern, args), 'gu');
  const replacement = requireText(ctx, to, args);
  return mapText(ctx, v, args, s => s.replace(regex, replacement));
});

define('test', [2], (args, ctx) => {
  const [v, pattern] = args;
  if (v.kind === 'none') return boolValue(false);
  const regex = compileRegex(ctx, requireText(ctx, pattern, args), 'u');
  return boolValue(regex.test(requireText(ctx, v, args)));
});

define('explode', [1], (args, ctx) => {
  const s = requireText(ctx, args[0], args);
  return arrayValue([...s].map(ch => numberValue(ch.codePointAt(0) ?? 0)));
});

define('implode', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind !== 'array') throw invalidTypes(ctx, args);
  return stringValue(String.fromCodePoint(...v.elements.map(el => requireNumber(ctx, el, args))));
});

define('slice', [3], (args, ctx) => {
  const [v, from, to] = args;
  const start = requireNumber(ctx, from, args);
  const end = requireNumber(ctx, to, args);
  if (v.kind === 'array') {
    const n = v.elements.length;
    return arrayValue(v.elements.slice(normalizeIndex(start, n), normalizeIndex(end, n)));
  }
  if (v.kind === 'none') return v;
  const chars = [...requireText(ctx, v, args)];
  return stringValue(chars.slice(normalizeIndex(start, chars.length), normalizeIndex(end, chars.length)).join(''));
});

define('index', [2], (args, ctx) => {
  const [v, needle] = args;
  if (v.kind === 'array') return numberValue(v.elements.findIndex(el => valuesEqual(el, needle)));
  if (v.kind === 'none') return numberValue(-1);
  return numberValue(requireText(ctx, v, args).indexOf(requireText(ctx, needle, args)));
});

define('rindex', [2], (args, ctx) => {
  const [v, needle] = args;
  if (v.kind === 'array') {
    for (let i = v.elements.length - 1; i >= 0; i--) {
      if (valuesEqual(v.elements[i], needle)) return numberValue(i);
    }
    return numberValue(-1);
  }
  if (v.kind === 'none') return numberValue(-1);
  return numberValue(requireText(ctx, v, args).lastIndexOf(requireText(ctx, needle, args)));
});

define('repeat', [2], (args, ctx) => {
  const [v, n] = args;
  const times = Math.max(0, Math.trunc(requireNumber(ctx, n, args)));
  if (v.kind === 'array') return arrayValue(Array.from({ length: times }, () => v.elements).flat());
  return stringValue(requireText(ctx, v, args).repeat(times));
});

define('base64', [1], (args, ctx) => stringValue(Buffer.from(requireText(ctx, args[0], args), 'utf-8').toString('base64')));
define('base64d', [1], (args, ctx) => stringValue(Buffer.from(requireText(ctx, args[0], args), 'base64').toString('utf-8')));
define('url_encode', [1], (args, ctx) => stringValue(encodeURIComponent(requireText(ctx, args[0], args))));

// ─── Markdown ────────────────────────────────────────────

define('md_name', [1], ([v]) => {
  if (v.kind !== 'markdown') return noneValue();
  const node = selectedNode(v);
  return node === null ? noneValue() : stringValue(nodeName(node));
});

define('attr', [2], (args, ctx) => {
  const [v, name] = args;
  if (v.kind !== 'markdown') return noneValue();
  const node = selectedNode(v);
  return node === null ? noneValue() : attributeToValue(nodeAttr(node, requireText(ctx, name, args)));
});

define('to_markdown', [1], ([v]) => stringValue(valueToString(v)));

define('to_html', [1], (args, ctx) => {
  const [v] = args;
  if (v.kind === 'markdown' || v.kind === 'string') return stringValue(renderHtml(valueToString(v)));
  if (v.kind === 'none') return v;
  throw invalidTypes(ctx, args);
});

define('md_text', [1], ([s]) => markdownValue(text(valueText(s))));

define('md_h', [2], (args, ctx) => {
  const depth = Math.min(6, Math.max(1, Math.trunc(requireNumber(ctx, args[1], args))));
  return markdownValue({ type: 'heading', depth, children: markdownText(args[0]) });
});

define('md_code', [2], ([s, lang]) =>
  markdownValue({ type: 'code', value: valueText(s), lang: lang.kind === 'none' ? null : valueText(lang) }));

define('md_strong', [1], ([s]) => markdownValue({ type: 'strong', children: markdownText(s) }));
define('md_em', [1], ([s]) => markdownValue({ type: 'emphasis', children: markdownText(s) }));

define('md_link', [2], ([s, url]) =>
  markdownValue({ type: 'link', url: valueText(url), title: null, children: markdownText(s) }));

define('md_list', [2], (args, ctx) => markdownValue({
  type: 'list',
  level: Math.max(0, Math.trunc(requireNumber(ctx, args[1], args))),
  index: 0,
  start: 1,
  ordered: false,
  checked: null,
  children: markdownText(args[0]),
}));

// ─── Runtime ─────────────────────────────────────────────

define('error', [1], ([message], ctx) => {
  throw new MarqError('UserDefined', valueText(message), ctx.token);
});

define('debug', [1], ([v], ctx) => {
  ctx.log(`[debug] ${valueToString(v)}`);
  return v;
});

define('breakpoint', [0], (_args, ctx) => {
  ctx.breakpoint();
  return ctx.input;
});
