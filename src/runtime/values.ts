/**
 * Runtime value types.
 * Every expression evaluates to a RuntimeValue.
 */

import * as AST from '../parser/ast';
import type { Environment } from './environment';
import { MdNode, findAtIndex, nodeValue, toMarkdown } from '../markdown/node';

export type RuntimeValue =
  | NoneValue
  | BoolValue
  | NumberValue
  | StringValue
  | SymbolValue
  | ArrayValue
  | DictValue
  | MarkdownValue
  | FunctionValue
  | NativeFunctionValue
  | ModuleValue;

export interface NoneValue {
  kind: 'none';
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface SymbolValue {
  kind: 'symbol';
  name: string;
}

export interface ArrayValue {
  kind: 'array';
  elements: RuntimeValue[];
}

/** Entries are kept sorted by key. */
export interface DictValue {
  kind: 'dict';
  entries: Map<string, RuntimeValue>;
}

/** A document node, optionally narrowed to one of its children by an index selector. */
export interface MarkdownValue {
  kind: 'markdown';
  node: MdNode;
  selector: { index: number } | null;
}

export interface FunctionValue {
  kind: 'function';
  params: string[];
  body: AST.Program;
  env: Environment;
}

export interface NativeFunctionValue {
  kind: 'native';
  name: string;
}

export interface ModuleValue {
  kind: 'module';
  name: string;
  env: Environment;
}

// Constructors

const NONE: NoneValue = { kind: 'none' };

export function noneValue(): NoneValue {
  return NONE;
}

export function boolValue(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function numberValue(value: number): NumberValue {
  return { kind: 'number', value };
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function symbolValue(name: string): SymbolValue {
  return { kind: 'symbol', name };
}

export function arrayValue(elements: RuntimeValue[]): ArrayValue {
  return { kind: 'array', elements };
}

export function dictValue(entries: Iterable<[string, RuntimeValue]>): DictValue {
  const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return { kind: 'dict', entries: new Map(sorted) };
}

export function markdownValue(node: MdNode, selector: { index: number } | null = null): MarkdownValue {
  return { kind: 'markdown', node, selector };
}

export function functionValue(params: string[], body: AST.Program, env: Environment): FunctionValue {
  return { kind: 'function', params, body, env };
}

export function nativeFunctionValue(name: string): NativeFunctionValue {
  return { kind: 'native', name };
}

export function moduleValue(name: string, env: Environment): ModuleValue {
  return { kind: 'module', name, env };
}

export function literalToValue(literal: AST.LiteralValue): RuntimeValue {
  switch (literal.kind) {
    case 'string': return stringValue(literal.value);
    case 'number': return numberValue(literal.value);
    case 'bool': return boolValue(literal.value);
    case 'symbol': return symbolValue(literal.value);
    case 'none': return noneValue();
  }
}

// Markdown helpers

/** The node a markdown value addresses: its selected child, or the node itself. */
export function selectedNode(value: MarkdownValue): MdNode | null {
  return value.selector === null ? value.node : findAtIndex(value.node, value.selector.index);
}

// Semantics

export function isTruthy(value: RuntimeValue): boolean {
  switch (value.kind) {
    case 'none': return false;
    case 'bool': return value.value;
    case 'number': return value.value !== 0;
    case 'string': return value.value.length > 0;
    case 'array': return value.elements.length > 0;
    case 'markdown': return value.selector === null || selectedNode(value) !== null;
    case 'symbol':
    case 'dict':
    case 'function':
    case 'native':
    case 'module':
      return true;
  }
}

/** Length of a value. For numbers this is the truncated value, used as a repeat count. */
export function valueLength(value: RuntimeValue): number {
  switch (value.kind) {
    case 'number': return Math.trunc(value.value);
    case 'string': return [...value.value].length;
    case 'symbol': return [...value.name].length;
    case 'array': return value.elements.length;
    case 'dict': return value.entries.size;
    case 'markdown': return [...valueText(value)].length;
    case 'bool':
    case 'none':
    case 'function':
    case 'native':
    case 'module':
      return 0;
  }
}

export function isEmptyValue(value: RuntimeValue): boolean {
  return valueLength(value) === 0;
}

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (!Number.isFinite(n)) return n > 0 ? 'Infinity' : '-Infinity';
  return String(n);
}

/** Display form: strings are raw at the top level and quoted inside collections. */
export function valueToString(value: RuntimeValue): string {
  switch (value.kind) {
    case 'none': return 'None';
    case 'bool': return value.value ? 'true' : 'false';
    case 'number': return formatNumber(value.value);
    case 'string': return value.value;
    case 'symbol': return `:${value.name}`;
    case 'array': return `[${value.elements.map(reprValue).join(', ')}]`;
    case 'dict': {
      const entries = [...value.entries].map(([k, v]) => `${JSON.stringify(k)}: ${reprValue(v)}`);
      return `{${entries.join(', ')}}`;
    }
    case 'markdown': {
      const node = selectedNode(value);
      return node === null ? '' : toMarkdown(node);
    }
    case 'function': return `function/${value.params.length}`;
    case 'native': return `native_function: ${value.name}`;
    case 'module': return `module: ${value.name}`;
  }
}

function reprValue(value: RuntimeValue): string {
  return value.kind === 'string' ? JSON.stringify(value.value) : valueToString(value);
}

/** Text form: markdown values yield their plain text, symbols their name. */
export function valueText(value: RuntimeValue): string {
  switch (value.kind) {
    case 'markdown': {
      const node = selectedNode(value);
      return node === null ? '' : nodeValue(node);
    }
    case 'symbol':
      return value.name;
    default:
      return valueToString(value);
  }
}

export function typeName(value: RuntimeValue): string {
  switch (value.kind) {
    case 'native': return 'function';
    default: return value.kind;
  }
}

/** Structural equality. Functions compare on parameters and body only. */
export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none';
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'number':
      return b.kind === 'number' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'symbol':
      return b.kind === 'symbol' && b.name === a.name;
    case 'array': {
      if (b.kind !== 'array' || a.elements.length !== b.elements.length) return false;
      const others = b.elements;
      return a.elements.every((el, i) => valuesEqual(el, others[i]));
    }
    case 'dict': {
      if (b.kind !== 'dict' || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
      }
      return true;
    }
    case 'markdown':
      return b.kind === 'markdown'
        && AST.astEqual(a.node, b.node)
        && (a.selector?.index ?? null) === (b.selector?.index ?? null);
    case 'function':
      return b.kind === 'function'
        && AST.astEqual(a.params, b.params)
        && AST.astEqual(a.body, b.body);
    case 'native':
      return b.kind === 'native' && b.name === a.name;
    case 'module':
      return b.kind === 'module' && b.name === a.name;
  }
}

const KIND_ORDER: RuntimeValue['kind'][] = [
  'none', 'bool', 'number', 'string', 'symbol', 'markdown', 'array', 'dict', 'function', 'native', 'module',
];

/** Total order used by sort, min and max: by kind first, then by value. */
export function compareValues(a: RuntimeValue, b: RuntimeValue): number {
  if (a.kind !== b.kind) {
    return KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind);
  }
  if (a.kind === 'number' && b.kind === 'number') return a.value - b.value;
  if (a.kind === 'bool' && b.kind === 'bool') return Number(a.value) - Number(b.value);
  if (a.kind === 'array' && b.kind === 'array') {
    const n = Math.min(a.elements.length, b.elements.length);
    for (let i = 0; i < n; i++) {
      const c = compareValues(a.elements[i], b.elements[i]);
      if (c !== 0) return c;
    }
    return a.elements.length - b.elements.length;
  }
  const left = valueText(a);
  const right = valueText(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
