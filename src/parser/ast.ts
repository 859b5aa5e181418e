import { Token } from '../lexer/tokens';

export type Node =
  | Literal
  | Identifier
  | Self
  | Nodes
  | Selector
  | Call
  | CallDynamic
  | Let
  | Var
  | Assign
  | If
  | While
  | Until
  | Foreach
  | Block
  | Def
  | Fn
  | Match
  | InterpolatedString
  | MacroDef
  | Try
  | Module
  | Include
  | Import
  | QualifiedAccess
  | Break
  | Continue
  | And
  | Or
  | Paren;

/** A pipeline: each node's output is the next node's input. */
export type Program = Node[];

export interface BaseNode {
  token: Token;
}

export type LiteralValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'symbol'; value: string }
  | { kind: 'none' };

export interface Literal extends BaseNode {
  type: 'Literal';
  value: LiteralValue;
}

export interface Identifier extends BaseNode {
  type: 'Identifier';
  name: string;
}

export interface Self extends BaseNode {
  type: 'Self';
}

/** Marks the point where per-input evaluation ends and the collected results are processed once. */
export interface Nodes extends BaseNode {
  type: 'Nodes';
}

export type SelectorKind =
  | { kind: 'name'; name: string }
  | { kind: 'index'; index: number };

export interface Selector extends BaseNode {
  type: 'Selector';
  selector: SelectorKind;
}

export interface Call extends BaseNode {
  type: 'Call';
  name: string;
  args: Node[];
}

export interface CallDynamic extends BaseNode {
  type: 'CallDynamic';
  callee: Node;
  args: Node[];
}

export interface Let extends BaseNode {
  type: 'Let';
  name: string;
  value: Node;
}

export interface Var extends BaseNode {
  type: 'Var';
  name: string;
  value: Node;
}

export interface Assign extends BaseNode {
  type: 'Assign';
  name: string;
  value: Node;
}

/** A branch without a condition is the trailing else. */
export interface IfBranch {
  condition: Node | null;
  body: Node;
}

export interface If extends BaseNode {
  type: 'If';
  branches: IfBranch[];
}

export interface While extends BaseNode {
  type: 'While';
  condition: Node;
  body: Program;
}

export interface Until extends BaseNode {
  type: 'Until';
  condition: Node;
  body: Program;
}

export interface Foreach extends BaseNode {
  type: 'Foreach';
  name: string;
  iterable: Node;
  body: Program;
}

export interface Block extends BaseNode {
  type: 'Block';
  body: Program;
}

export interface Def extends BaseNode {
  type: 'Def';
  name: string;
  params: string[];
  body: Program;
}

export interface Fn extends BaseNode {
  type: 'Fn';
  params: string[];
  body: Program;
}

export type Pattern =
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'wildcard' }
  | { kind: 'binding'; name: string }
  | { kind: 'array'; elements: Pattern[]; rest: string | null }
  | { kind: 'dict'; entries: { key: string; pattern: Pattern }[] };

export interface MatchArm {
  pattern: Pattern;
  guard: Node | null;
  body: Node;
}

export interface Match extends BaseNode {
  type: 'Match';
  value: Node;
  arms: MatchArm[];
}

export type StringSegment =
  | { kind: 'text'; value: string }
  | { kind: 'expr'; expr: Node }
  | { kind: 'env'; name: string }
  | { kind: 'self' };

export interface InterpolatedString extends BaseNode {
  type: 'InterpolatedString';
  segments: StringSegment[];
}

export interface MacroDef extends BaseNode {
  type: 'MacroDef';
  name: string;
  params: string[];
  body: Program;
}

export interface Try extends BaseNode {
  type: 'Try';
  body: Node;
  catchBody: Node;
}

export interface Module extends BaseNode {
  type: 'Module';
  name: string;
  body: Program;
}

export interface Include extends BaseNode {
  type: 'Include';
  path: string;
}

export interface Import extends BaseNode {
  type: 'Import';
  path: string;
}

export type AccessTarget =
  | { kind: 'ident'; name: string }
  | { kind: 'call'; name: string; args: Node[] };

export interface QualifiedAccess extends BaseNode {
  type: 'QualifiedAccess';
  module: string;
  target: AccessTarget;
}

export interface Break extends BaseNode {
  type: 'Break';
}

export interface Continue extends BaseNode {
  type: 'Continue';
}

export interface And extends BaseNode {
  type: 'And';
  left: Node;
  right: Node;
}

export interface Or extends BaseNode {
  type: 'Or';
  left: Node;
  right: Node;
}

export interface Paren extends BaseNode {
  type: 'Paren';
  expr: Node;
}

/**
 * Structural equality that ignores source tokens. Used for function value
 * equality and for comparing programs before and after rewriting.
 */
export function astEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => astEqual(item, b[i]));
  }
  if (typeof a !== 'object' || a === null || typeof b !== 'object' || b === null || Array.isArray(b)) {
    return false;
  }
  const left = Object.entries(a).filter(([key]) => key !== 'token');
  const right = new Map(Object.entries(b).filter(([key]) => key !== 'token'));
  if (left.length !== right.size) return false;
  return left.every(([key, value]) => right.has(key) && astEqual(value, right.get(key)));
}
