import * as AST from '../parser/ast';
import { Token } from '../lexer/tokens';
import { MacroExpansionError, isStackOverflow } from './errors';

/** Nesting depth at which expansion gives up. */
export const MAX_EXPANSION_DEPTH = 1000;

interface MacroDefinition {
  name: string;
  params: string[];
  body: AST.Program;
}

type NodeRewrite = (node: AST.Node) => AST.Node;
type ProgramRewrite = (program: AST.Program) => AST.Program;

/**
 * Rebuild a node with every child node and child program rewritten.
 * Leaves are returned as they are.
 */
function rewriteChildren(node: AST.Node, rewrite: NodeRewrite, rewriteProgram: ProgramRewrite): AST.Node {
  switch (node.type) {
    case 'Literal':
    case 'Identifier':
    case 'Self':
    case 'Nodes':
    case 'Selector':
    case 'Include':
    case 'Import':
    case 'Break':
    case 'Continue':
    case 'MacroDef':
      return node;
    case 'Call':
      return { ...node, args: node.args.map(rewrite) };
    case 'CallDynamic':
      return { ...node, callee: rewrite(node.callee), args: node.args.map(rewrite) };
    case 'Let':
    case 'Var':
    case 'Assign':
      return { ...node, value: rewrite(node.value) };
    case 'If':
      return {
        ...node,
        branches: node.branches.map(branch => ({
          condition: branch.condition === null ? null : rewrite(branch.condition),
          body: rewrite(branch.body),
        })),
      };
    case 'While':
    case 'Until':
      return { ...node, condition: rewrite(node.condition), body: rewriteProgram(node.body) };
    case 'Foreach':
      return { ...node, iterable: rewrite(node.iterable), body: rewriteProgram(node.body) };
    case 'Block':
    case 'Def':
    case 'Fn':
    case 'Module':
      return { ...node, body: rewriteProgram(node.body) };
    case 'Match':
      return {
        ...node,
        value: rewrite(node.value),
        arms: node.arms.map(arm => ({
          pattern: arm.pattern,
          guard: arm.guard === null ? null : rewrite(arm.guard),
          body: rewrite(arm.body),
        })),
      };
    case 'InterpolatedString':
      return {
        ...node,
        segments: node.segments.map((segment): AST.StringSegment =>
          segment.kind === 'expr' ? { kind: 'expr', expr: rewrite(segment.expr) } : segment),
      };
    case 'Try':
      return { ...node, body: rewrite(node.body), catchBody: rewrite(node.catchBody) };
    case 'QualifiedAccess':
      return node.target.kind === 'call'
        ? { ...node, target: { ...node.target, args: node.target.args.map(rewrite) } }
        : node;
    case 'And':
    case 'Or':
      return { ...node, left: rewrite(node.left), right: rewrite(node.right) };
    case 'Paren':
      return { ...node, expr: rewrite(node.expr) };
  }
}

/**
 * Replace macro parameters in a body with the unevaluated argument nodes.
 * Def and Fn parameters shadow macro parameters of the same name.
 */
function substitute(node: AST.Node, bindings: Map<string, AST.Node>): AST.Node {
  if (bindings.size === 0) return node;

  switch (node.type) {
    case 'Identifier':
      return bindings.get(node.name) ?? node;
    case 'Call': {
      const args = node.args.map(arg => substitute(arg, bindings));
      const callee = bindings.get(node.name);
      return callee === undefined
        ? { ...node, args }
        : { type: 'CallDynamic', callee, args, token: node.token };
    }
    case 'Def':
    case 'Fn': {
      const inner = new Map(bindings);
      for (const param of node.params) inner.delete(param);
      return { ...node, body: node.body.map(child => substitute(child, inner)) };
    }
    default:
      return rewriteChildren(
        node,
        child => substitute(child, bindings),
        program => program.map(child => substitute(child, bindings)),
      );
  }
}

/**
 * Macro expansion: a pre-pass that removes every macro definition and
 * replaces every macro call with the macro body, arguments substituted by
 * name. Macros live in one flat registry, so a definition is visible to call
 * sites anywhere in the program, including ones that precede it.
 */
export class MacroExpander {
  private macros: Map<string, MacroDefinition> = new Map();
  private depth = 0;

  expand(program: AST.Program): AST.Program {
    this.macros = new Map();
    this.depth = 0;
    this.collectProgram(program);
    if (this.macros.size === 0) return program;
    try {
      return this.expandProgram(program);
    } catch (e) {
      // Recursion nested in arguments can exhaust the host stack before the depth bound.
      if (isStackOverflow(e)) throw MacroExpansionError.recursionLimit();
      throw e;
    }
  }

  /** Expand a single call to a registered macro. */
  expandMacro(name: string, args: AST.Node[], token?: Token): AST.Program {
    const macro = this.macros.get(name);
    if (macro === undefined) {
      throw MacroExpansionError.undefinedMacro(name, token);
    }
    if (macro.params.length !== args.length) {
      throw MacroExpansionError.arityMismatch(name, macro.params.length, args.length, token);
    }

    this.depth++;
    if (this.depth > MAX_EXPANSION_DEPTH) {
      throw MacroExpansionError.recursionLimit(token);
    }
    try {
      const bindings = new Map(macro.params.map((param, i): [string, AST.Node] => [param, args[i]]));
      const body = macro.body.map(node => substitute(node, bindings));
      return this.expandProgram(body);
    } finally {
      this.depth--;
    }
  }

  // ─── Collection ────────────────────────────────────────

  private collectProgram(program: AST.Program): void {
    for (const node of program) {
      this.collectNode(node);
    }
  }

  private collectNode(node: AST.Node): void {
    if (node.type === 'MacroDef') {
      this.macros.set(node.name, { name: node.name, params: node.params, body: node.body });
      return;
    }
    rewriteChildren(
      node,
      child => {
        this.collectNode(child);
        return child;
      },
      program => {
        this.collectProgram(program);
        return program;
      },
    );
  }

  // ─── Expansion ─────────────────────────────────────────

  private expandProgram(program: AST.Program): AST.Program {
    const out: AST.Program = [];
    for (const node of program) {
      if (node.type === 'MacroDef') continue;
      if (node.type === 'Call' && this.macros.has(node.name)) {
        out.push(...this.expandMacro(node.name, node.args.map(arg => this.expandNode(arg)), node.token));
        continue;
      }
      out.push(this.expandNode(node));
    }
    return out;
  }

  private expandNode(node: AST.Node): AST.Node {
    if (node.type === 'MacroDef') {
      return { type: 'Block', body: [], token: node.token };
    }
    if (node.type === 'Call' && this.macros.has(node.name)) {
      const expanded = this.expandMacro(node.name, node.args.map(arg => this.expandNode(arg)), node.token);
      return expanded.length === 1 ? expanded[0] : { type: 'Block', body: expanded, token: node.token };
    }
    return rewriteChildren(node, child => this.expandNode(child), program => this.expandProgram(program));
  }
}
