import { Token, TokenType } from '../lexer/tokens';
import { Lexer, escapeChar } from '../lexer/lexer';
import { MarqError } from '../runtime/errors';
import * as AST from './ast';

/** Tokens that end a pipeline without being part of it. */
const PIPELINE_END = new Set<TokenType>([
  TokenType.EOF,
  TokenType.SEMICOLON,
  TokenType.RPAREN,
  TokenType.COMMA,
  TokenType.RBRACKET,
  TokenType.RBRACE,
  TokenType.END,
  TokenType.ELSE,
  TokenType.ELIF,
  TokenType.CATCH,
]);

const BINARY_OPERATORS: Partial<Record<TokenType, string>> = {
  [TokenType.EQ]: 'eq',
  [TokenType.NEQ]: 'ne',
  [TokenType.LT]: 'lt',
  [TokenType.LTE]: 'lte',
  [TokenType.GT]: 'gt',
  [TokenType.GTE]: 'gte',
  [TokenType.PLUS]: 'add',
  [TokenType.MINUS]: 'sub',
  [TokenType.STAR]: 'mul',
  [TokenType.SLASH]: 'div',
  [TokenType.PERCENT]: 'mod',
};

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(tokens: Token[]): AST.Program {
    this.tokens = tokens;
    this.pos = 0;

    const program = this.parsePipeline();
    if (!this.check(TokenType.EOF)) {
      const tok = this.peek();
      throw this.error(`Unexpected ${tok.type} '${tok.value}'`);
    }
    return program;
  }

  // ─── Pipelines ─────────────────────────────────────────

  /**
   * Statements joined by `|`. A statement whose body consumed a trailing `;`
   * may be followed directly by the next statement.
   */
  private parsePipeline(): AST.Program {
    const body: AST.Program = [];
    if (this.atPipelineEnd()) return body;

    for (;;) {
      body.push(this.parseExpression());
      if (this.match(TokenType.PIPE)) continue;
      if (this.previous().type === TokenType.SEMICOLON && !this.atPipelineEnd()) continue;
      break;
    }
    return body;
  }

  /** A `:`-introduced body, optionally terminated by `;`. */
  private parseBody(): AST.Program {
    this.expect(TokenType.COLON);
    const body = this.parsePipeline();
    this.match(TokenType.SEMICOLON);
    return body;
  }

  private atPipelineEnd(): boolean {
    return PIPELINE_END.has(this.peek().type);
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Node {
    return this.parseOr();
  }

  private parseOr(): AST.Node {
    let left = this.parseAnd();
    while (this.check(TokenType.OR)) {
      const token = this.advance();
      const right = this.parseAnd();
      left = { type: 'Or', left, right, token };
    }
    return left;
  }

  private parseAnd(): AST.Node {
    let left = this.parseEquality();
    while (this.check(TokenType.AND)) {
      const token = this.advance();
      const right = this.parseEquality();
      left = { type: 'And', left, right, token };
    }
    return left;
  }

  private parseEquality(): AST.Node {
    return this.parseBinary(() => this.parseComparison(), [TokenType.EQ, TokenType.NEQ]);
  }

  private parseComparison(): AST.Node {
    return this.parseBinary(() => this.parseAdditive(), [TokenType.LT, TokenType.LTE, TokenType.GT, TokenType.GTE]);
  }

  private parseAdditive(): AST.Node {
    return this.parseBinary(() => this.parseMultiplicative(), [TokenType.PLUS, TokenType.MINUS]);
  }

  private parseMultiplicative(): AST.Node {
    return this.parseBinary(() => this.parseUnary(), [TokenType.STAR, TokenType.SLASH, TokenType.PERCENT]);
  }

  /** Left-associative binary operators, desugared to builtin calls. */
  private parseBinary(operand: () => AST.Node, types: TokenType[]): AST.Node {
    let left = operand();
    for (;;) {
      const tok = this.peek();
      const name = BINARY_OPERATORS[tok.type];
      if (name === undefined || !types.includes(tok.type)) return left;
      this.advance();
      const right = operand();
      left = { type: 'Call', name, args: [left, right], token: tok };
    }
  }

  private parseUnary(): AST.Node {
    if (this.check(TokenType.NOT)) {
      const token = this.advance();
      return { type: 'Call', name: 'not', args: [this.parseUnary()], token };
    }
    if (this.check(TokenType.MINUS)) {
      const token = this.advance();
      const operand = this.parseUnary();
      if (operand.type === 'Literal' && operand.value.kind === 'number') {
        return { type: 'Literal', value: { kind: 'number', value: -operand.value.value }, token };
      }
      return { type: 'Call', name: 'negate', args: [operand], token };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): AST.Node {
    let node = this.parsePrimary();
    for (;;) {
      if (this.check(TokenType.LBRACKET)) {
        const token = this.advance();
        const index = this.parseExpression();
        this.expect(TokenType.RBRACKET);
        node = { type: 'Call', name: 'get', args: [node, index], token };
      } else if (this.check(TokenType.LPAREN) && (node.type === 'Paren' || node.type === 'CallDynamic')) {
        const token = this.peek();
        node = { type: 'CallDynamic', callee: node, args: this.parseArgs(), token };
      } else {
        return node;
      }
    }
  }

  private parsePrimary(): AST.Node {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.NUMBER:
        this.advance();
        return { type: 'Literal', value: { kind: 'number', value: parseFloat(tok.value) }, token: tok };
      case TokenType.STRING:
        this.advance();
        return { type: 'Literal', value: { kind: 'string', value: tok.value }, token: tok };
      case TokenType.BOOLEAN:
        this.advance();
        return { type: 'Literal', value: { kind: 'bool', value: tok.value === 'true' }, token: tok };
      case TokenType.NONE:
        this.advance();
        return { type: 'Literal', value: { kind: 'none' }, token: tok };
      case TokenType.SYMBOL:
        this.advance();
        return { type: 'Literal', value: { kind: 'symbol', value: tok.value }, token: tok };
      case TokenType.INTERPOLATED_STRING:
        this.advance();
        return { type: 'InterpolatedString', segments: this.parseSegments(tok), token: tok };
      case TokenType.ENV:
        this.advance();
        return { type: 'InterpolatedString', segments: [{ kind: 'env', name: tok.value }], token: tok };
      case TokenType.SELECTOR:
        this.advance();
        return { type: 'Selector', selector: this.selectorKind(tok.value), token: tok };
      case TokenType.SELF:
        this.advance();
        return { type: 'Self', token: tok };
      case TokenType.NODES:
        this.advance();
        return { type: 'Nodes', token: tok };
      case TokenType.BREAK:
        this.advance();
        return { type: 'Break', token: tok };
      case TokenType.CONTINUE:
        this.advance();
        return { type: 'Continue', token: tok };
      case TokenType.IDENTIFIER:
        return this.parseIdentifier();
      case TokenType.LPAREN:
        return this.parseParen();
      case TokenType.LBRACKET:
        return this.parseArrayLiteral();
      case TokenType.LBRACE:
        return this.parseDictLiteral();
      case TokenType.LET:
      case TokenType.VAR:
        return this.parseLet();
      case TokenType.DEF:
        return this.parseDef();
      case TokenType.FN: {
        this.advance();
        const params = this.parseParams();
        return { type: 'Fn', params, body: this.parseBody(), token: tok };
      }
      case TokenType.MACRO: {
        this.advance();
        const name = this.expect(TokenType.IDENTIFIER).value;
        const params = this.parseParams();
        return { type: 'MacroDef', name, params, body: this.parseBody(), token: tok };
      }
      case TokenType.IF:
        return this.parseIf();
      case TokenType.WHILE:
      case TokenType.UNTIL: {
        this.advance();
        const condition = this.parseExpression();
        const body = this.parseBody();
        return tok.type === TokenType.WHILE
          ? { type: 'While', condition, body, token: tok }
          : { type: 'Until', condition, body, token: tok };
      }
      case TokenType.FOREACH:
        return this.parseForeach();
      case TokenType.DO: {
        this.advance();
        const body = this.parsePipeline();
        this.expect(TokenType.END);
        return { type: 'Block', body, token: tok };
      }
      case TokenType.TRY: {
        this.advance();
        this.expect(TokenType.COLON);
        const body = this.parseExpression();
        this.expect(TokenType.CATCH);
        this.expect(TokenType.COLON);
        return { type: 'Try', body, catchBody: this.parseExpression(), token: tok };
      }
      case TokenType.MATCH:
        return this.parseMatch();
      case TokenType.MODULE: {
        this.advance();
        const name = this.expect(TokenType.IDENTIFIER).value;
        this.expect(TokenType.COLON);
        const body = this.parsePipeline();
        this.expect(TokenType.END);
        return { type: 'Module', name, body, token: tok };
      }
      case TokenType.INCLUDE:
      case TokenType.IMPORT: {
        this.advance();
        const path = this.expect(TokenType.STRING).value;
        return tok.type === TokenType.INCLUDE
          ? { type: 'Include', path, token: tok }
          : { type: 'Import', path, token: tok };
      }
      default:
        throw this.error(`Unexpected ${tok.type} '${tok.value}'`);
    }
  }

  private parseIdentifier(): AST.Node {
    const tok = this.advance();

    if (this.check(TokenType.EQUALS)) {
      this.advance();
      return { type: 'Assign', name: tok.value, value: this.parseExpression(), token: tok };
    }

    if (this.check(TokenType.LPAREN)) {
      return { type: 'Call', name: tok.value, args: this.parseArgs(), token: tok };
    }

    if (this.match(TokenType.DOUBLE_COLON)) {
      const name = this.expect(TokenType.IDENTIFIER).value;
      const target: AST.AccessTarget = this.check(TokenType.LPAREN)
        ? { kind: 'call', name, args: this.parseArgs() }
        : { kind: 'ident', name };
      return { type: 'QualifiedAccess', module: tok.value, target, token: tok };
    }

    return { type: 'Identifier', name: tok.value, token: tok };
  }

  private parseParen(): AST.Node {
    const tok = this.expect(TokenType.LPAREN);
    const body = this.parsePipeline();
    this.expect(TokenType.RPAREN);
    if (body.length === 1) {
      return { type: 'Paren', expr: body[0], token: tok };
    }
    return { type: 'Paren', expr: { type: 'Block', body, token: tok }, token: tok };
  }

  private parseArrayLiteral(): AST.Call {
    const tok = this.expect(TokenType.LBRACKET);
    const args: AST.Node[] = [];
    while (!this.check(TokenType.RBRACKET)) {
      args.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RBRACKET);
    return { type: 'Call', name: 'array', args, token: tok };
  }

  private parseDictLiteral(): AST.Call {
    const tok = this.expect(TokenType.LBRACE);
    const args: AST.Node[] = [];
    while (!this.check(TokenType.RBRACE)) {
      const keyTok = this.peek();
      if (keyTok.type === TokenType.IDENTIFIER && this.peekAhead(1)?.type === TokenType.COLON) {
        this.advance();
        args.push({ type: 'Literal', value: { kind: 'string', value: keyTok.value }, token: keyTok });
      } else {
        args.push(this.parseExpression());
      }
      this.expect(TokenType.COLON);
      args.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RBRACE);
    return { type: 'Call', name: 'dict', args, token: tok };
  }

  private parseArgs(): AST.Node[] {
    this.expect(TokenType.LPAREN);
    const args: AST.Node[] = [];
    while (!this.check(TokenType.RPAREN)) {
      args.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RPAREN);
    return args;
  }

  private parseParams(): string[] {
    this.expect(TokenType.LPAREN);
    const params: string[] = [];
    while (!this.check(TokenType.RPAREN)) {
      params.push(this.expect(TokenType.IDENTIFIER).value);
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RPAREN);
    return params;
  }

  // ─── Definitions & control flow ────────────────────────

  private parseLet(): AST.Let | AST.Var {
    const tok = this.advance();
    const name = this.expect(TokenType.IDENTIFIER).value;
    this.expect(TokenType.EQUALS);
    const value = this.parseExpression();
    return tok.type === TokenType.LET
      ? { type: 'Let', name, value, token: tok }
      : { type: 'Var', name, value, token: tok };
  }

  private parseDef(): AST.Def {
    const tok = this.expect(TokenType.DEF);
    const name = this.expect(TokenType.IDENTIFIER).value;
    const params = this.parseParams();
    return { type: 'Def', name, params, body: this.parseBody(), token: tok };
  }

  private parseIf(): AST.If {
    const tok = this.expect(TokenType.IF);
    const branches: AST.IfBranch[] = [];

    const condition = this.parseExpression();
    this.expect(TokenType.COLON);
    branches.push({ condition, body: this.parseExpression() });

    while (this.match(TokenType.ELIF)) {
      const elifCondition = this.parseExpression();
      this.expect(TokenType.COLON);
      branches.push({ condition: elifCondition, body: this.parseExpression() });
    }

    if (this.match(TokenType.ELSE)) {
      this.expect(TokenType.COLON);
      branches.push({ condition: null, body: this.parseExpression() });
    }

    return { type: 'If', branches, token: tok };
  }

  private parseForeach(): AST.Foreach {
    const tok = this.expect(TokenType.FOREACH);
    this.expect(TokenType.LPAREN);
    const name = this.expect(TokenType.IDENTIFIER).value;
    this.expect(TokenType.COMMA);
    const iterable = this.parseExpression();
    this.expect(TokenType.RPAREN);
    return { type: 'Foreach', name, iterable, body: this.parseBody(), token: tok };
  }

  private parseMatch(): AST.Match {
    const tok = this.expect(TokenType.MATCH);
    const value = this.parseExpression();
    this.expect(TokenType.COLON);

    const arms: AST.MatchArm[] = [];
    while (this.match(TokenType.PIPE)) {
      const pattern = this.parsePattern();
      const guard = this.match(TokenType.IF) ? this.parseExpression() : null;
      this.expect(TokenType.COLON);
      arms.push({ pattern, guard, body: this.parseExpression() });
    }
    this.expect(TokenType.END);

    if (arms.length === 0) {
      throw this.error('match requires at least one arm');
    }
    return { type: 'Match', value, arms, token: tok };
  }

  private parsePattern(): AST.Pattern {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.NUMBER:
      case TokenType.STRING:
      case TokenType.BOOLEAN:
      case TokenType.NONE:
      case TokenType.SYMBOL:
      case TokenType.MINUS: {
        const literal = this.parseUnary();
        if (literal.type !== 'Literal') {
          throw this.error('Expected a literal pattern');
        }
        return { kind: 'literal', value: literal.value };
      }
      case TokenType.IDENTIFIER:
        this.advance();
        return tok.value === '_' ? { kind: 'wildcard' } : { kind: 'binding', name: tok.value };
      case TokenType.LBRACKET: {
        this.advance();
        const elements: AST.Pattern[] = [];
        let rest: string | null = null;
        while (!this.check(TokenType.RBRACKET)) {
          if (this.match(TokenType.RANGE)) {
            rest = this.expect(TokenType.IDENTIFIER).value;
            break;
          }
          elements.push(this.parsePattern());
          if (!this.match(TokenType.COMMA)) break;
        }
        this.expect(TokenType.RBRACKET);
        return { kind: 'array', elements, rest };
      }
      case TokenType.LBRACE: {
        this.advance();
        const entries: { key: string; pattern: AST.Pattern }[] = [];
        while (!this.check(TokenType.RBRACE)) {
          const keyTok = this.advance();
          if (keyTok.type !== TokenType.IDENTIFIER && keyTok.type !== TokenType.STRING) {
            throw this.error(`Expected a dict key but got ${keyTok.type}`);
          }
          const pattern: AST.Pattern = this.match(TokenType.COLON)
            ? this.parsePattern()
            : { kind: 'binding', name: keyTok.value };
          entries.push({ key: keyTok.value, pattern });
          if (!this.match(TokenType.COMMA)) break;
        }
        this.expect(TokenType.RBRACE);
        return { kind: 'dict', entries };
      }
      default:
        throw this.error(`Unexpected ${tok.type} '${tok.value}' in pattern`);
    }
  }

  // ─── Strings & selectors ───────────────────────────────

  private parseSegments(tok: Token): AST.StringSegment[] {
    const raw = tok.value;
    const segments: AST.StringSegment[] = [];
    let text = '';
    let i = 0;

    while (i < raw.length) {
      const ch = raw[i];
      if (ch === '\\' && i + 1 < raw.length) {
        text += escapeChar(raw[i + 1]);
        i += 2;
      } else if (ch === '$' && raw[i + 1] === '{') {
        if (text !== '') {
          segments.push({ kind: 'text', value: text });
          text = '';
        }
        const close = findClosingBrace(raw, i + 2);
        segments.push(this.parseInterpolation(raw.slice(i + 2, close).trim(), tok));
        i = close + 1;
      } else {
        text += ch;
        i++;
      }
    }
    if (text !== '') {
      segments.push({ kind: 'text', value: text });
    }
    return segments;
  }

  private parseInterpolation(source: string, tok: Token): AST.StringSegment {
    if (source === 'self') return { kind: 'self' };
    const env = /^\$([A-Za-z_][A-Za-z0-9_]*)$/.exec(source);
    if (env) return { kind: 'env', name: env[1] };

    const program = new Parser().parse(new Lexer(source, tok.moduleId).tokenize());
    if (program.length === 0) {
      throw this.error('Empty interpolation');
    }
    const expr: AST.Node = program.length === 1 ? program[0] : { type: 'Block', body: program, token: tok };
    return { kind: 'expr', expr };
  }

  private selectorKind(value: string): AST.SelectorKind {
    if (value.startsWith('[')) {
      return { kind: 'index', index: parseInt(value.slice(1, -1), 10) };
    }
    return { kind: 'name', name: value };
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private peekAhead(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private previous(): Token {
    return this.tokens[this.pos - 1] ?? this.peek();
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.type !== TokenType.EOF) this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token {
    const tok = this.peek();
    if (tok.type !== type) {
      throw this.error(`Expected ${type} but got ${tok.type} '${tok.value}'`);
    }
    return this.advance();
  }

  private error(message: string): MarqError {
    const tok = this.peek();
    return new MarqError('ParseError', `line ${tok.line}, column ${tok.column}: ${message}`, tok);
  }
}

/** Index of the `}` closing an interpolation that starts at `from`, skipping nested braces and strings. */
function findClosingBrace(raw: string, from: number): number {
  let depth = 1;
  let inString = false;
  for (let i = from; i < raw.length; i++) {
    const ch = raw[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return raw.length;
}

/** Lex and parse source text in one step. */
export function parseSource(source: string, moduleId?: number): AST.Program {
  return new Parser().parse(new Lexer(source, moduleId).tokenize());
}
