import { Token, TokenType, KEYWORDS, TOP_LEVEL_MODULE_ID } from './tokens';
import { MarqError } from '../runtime/errors';

/** Characters after which `:name` reads as a symbol rather than a colon. */
const SYMBOL_PREFIX = new Set([' ', '\t', '\n', '\r', '(', ',', '[', '=']);

/** Translate the character after a backslash. Unknown escapes keep the backslash. */
export function escapeChar(ch: string): string {
  switch (ch) {
    case 'n': return '\n';
    case 't': return '\t';
    case 'r': return '\r';
    case '\\': return '\\';
    case '"': return '"';
    case '$': return '$';
    default: return '\\' + ch;
  }
}

export class Lexer {
  private source: string;
  private moduleId: number;
  private tokens: Token[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, moduleId: number = TOP_LEVEL_MODULE_ID) {
    this.source = source;
    this.moduleId = moduleId;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.newline();
        continue;
      }

      if (ch === '#') {
        this.skipComment();
        continue;
      }

      if (ch === 's' && this.peekChar(1) === '"') {
        this.readInterpolatedString();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (this.isDigit(ch)) {
        this.readNumber();
        continue;
      }

      if (this.isAlpha(ch)) {
        this.readIdentifier();
        continue;
      }

      this.readOperator();
    }

    this.addToken(TokenType.EOF, '');
    return this.tokens;
  }

  private skipComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
      this.advance();
    }
  }

  private readString(): void {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\\') {
        this.advance();
        if (this.pos < this.source.length) {
          text += escapeChar(this.source[this.pos]);
          this.advance();
        }
      } else if (ch === '\n') {
        text += ch;
        this.newline();
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw this.error(`Unterminated string starting at line ${startLine}`);
    }
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startLine, startCol);
  }

  /**
   * Interpolated strings keep their raw text; the parser splits them into
   * segments. `${...}` regions are skipped as a unit so quotes inside an
   * embedded expression do not end the string.
   */
  private readInterpolatedString(): void {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // s
    this.advance(); // "
    let raw = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\\' && this.pos + 1 < this.source.length) {
        raw += ch + this.source[this.pos + 1];
        this.advance();
        this.advance();
      } else if (ch === '$' && this.peekChar(1) === '{') {
        raw += this.readInterpolation();
      } else if (ch === '\n') {
        raw += ch;
        this.newline();
      } else {
        raw += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw this.error(`Unterminated string starting at line ${startLine}`);
    }
    this.advance(); // closing quote
    this.addTokenAt(TokenType.INTERPOLATED_STRING, raw, startLine, startCol);
  }

  private readInterpolation(): string {
    let raw = '${';
    this.advance();
    this.advance();
    let depth = 1;
    let inString = false;
    while (this.pos < this.source.length && depth > 0) {
      const ch = this.source[this.pos];
      if (inString) {
        if (ch === '\\' && this.pos + 1 < this.source.length) {
          raw += ch;
          this.advance();
        } else if (ch === '"') {
          inString = false;
        }
      } else if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
      }
      raw += this.source[this.pos];
      if (this.source[this.pos] === '\n') {
        this.newline();
      } else {
        this.advance();
      }
    }
    if (depth > 0) {
      throw this.error('Unterminated interpolation');
    }
    return raw;
  }

  private readNumber(): void {
    const startCol = this.column;
    let num = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      num += this.source[this.pos];
      this.advance();
    }
    // A single dot followed by a digit is a fraction; `1..` is a range.
    if (this.source[this.pos] === '.' && this.isDigit(this.peekChar(1))) {
      num += '.';
      this.advance();
      while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
        num += this.source[this.pos];
        this.advance();
      }
    }
    this.addTokenAt(TokenType.NUMBER, num, this.line, startCol);
  }

  private readIdentifier(): void {
    const startCol = this.column;
    const id = this.readWord();

    if (Object.hasOwn(KEYWORDS, id)) {
      this.addTokenAt(KEYWORDS[id], id, this.line, startCol);
    } else {
      this.addTokenAt(TokenType.IDENTIFIER, id, this.line, startCol);
    }
  }

  private readWord(): string {
    let id = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      id += this.source[this.pos];
      this.advance();
    }
    return id;
  }

  private readSelector(): void {
    const startCol = this.column;
    this.advance(); // .
    if (this.source[this.pos] === '[') {
      this.advance();
      let digits = '';
      while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
        digits += this.source[this.pos];
        this.advance();
      }
      if (digits === '' || this.source[this.pos] !== ']') {
        throw this.error('Expected an index in selector ".[n]"');
      }
      this.advance();
      this.addTokenAt(TokenType.SELECTOR, `[${digits}]`, this.line, startCol);
      return;
    }
    this.addTokenAt(TokenType.SELECTOR, this.readWord(), this.line, startCol);
  }

  private readOperator(): void {
    const ch = this.source[this.pos];
    const next = this.peekChar(1);
    const startCol = this.column;

    switch (ch) {
      case ':':
        if (next === ':') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.DOUBLE_COLON, '::', this.line, startCol);
        } else if (this.isAlpha(next) && this.startsSymbol()) {
          this.advance();
          this.addTokenAt(TokenType.SYMBOL, this.readWord(), this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.COLON, ':', this.line, startCol);
        }
        break;
      case '.':
        if (next === '.') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.RANGE, '..', this.line, startCol);
        } else if (this.isAlpha(next) || next === '[') {
          this.readSelector();
        } else {
          throw this.error(`Unexpected character '${ch}'`);
        }
        break;
      case '$':
        if (this.isAlpha(next)) {
          this.advance();
          this.addTokenAt(TokenType.ENV, this.readWord(), this.line, startCol);
        } else {
          throw this.error(`Unexpected character '${ch}'`);
        }
        break;
      case '=':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.EQ, '==', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.EQUALS, '=', this.line, startCol);
        }
        break;
      case '!':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.NEQ, '!=', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.NOT, '!', this.line, startCol);
        }
        break;
      case '<':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.LTE, '<=', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.LT, '<', this.line, startCol);
        }
        break;
      case '>':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.GTE, '>=', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.GT, '>', this.line, startCol);
        }
        break;
      default: {
        const type = SINGLE_CHAR_TOKENS[ch];
        if (type === undefined) {
          throw this.error(`Unexpected character '${ch}'`);
        }
        this.advance();
        this.addTokenAt(type, ch, this.line, startCol);
      }
    }
  }

  private startsSymbol(): boolean {
    return this.pos === 0 || SYMBOL_PREFIX.has(this.source[this.pos - 1]);
  }

  private peekChar(offset: number): string {
    return this.pos + offset < this.source.length ? this.source[this.pos + offset] : '';
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private newline(): void {
    this.pos++;
    this.line++;
    this.column = 1;
  }

  private addToken(type: TokenType, value: string): void {
    this.addTokenAt(type, value, this.line, this.column);
  }

  private addTokenAt(type: TokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column, moduleId: this.moduleId });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string): MarqError {
    return new MarqError('LexerError', `line ${this.line}, column ${this.column}: ${message}`, {
      type: TokenType.EOF,
      value: '',
      line: this.line,
      column: this.column,
      moduleId: this.moduleId,
    });
  }
}

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '|': TokenType.PIPE,
  ';': TokenType.SEMICOLON,
  ',': TokenType.COMMA,
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '*': TokenType.STAR,
  '/': TokenType.SLASH,
  '%': TokenType.PERCENT,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  '[': TokenType.LBRACKET,
  ']': TokenType.RBRACKET,
  '{': TokenType.LBRACE,
  '}': TokenType.RBRACE,
};
