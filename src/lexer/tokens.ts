export enum TokenType {
  // Literals
  STRING = 'STRING',
  INTERPOLATED_STRING = 'INTERPOLATED_STRING', // s"..."
  NUMBER = 'NUMBER',
  BOOLEAN = 'BOOLEAN',
  NONE = 'NONE',
  SYMBOL = 'SYMBOL',           // :name
  IDENTIFIER = 'IDENTIFIER',
  SELECTOR = 'SELECTOR',       // .h1, .text, .[0]
  ENV = 'ENV',                 // $NAME

  // Operators
  PIPE = 'PIPE',               // |
  SEMICOLON = 'SEMICOLON',     // ;
  COLON = 'COLON',             // :
  DOUBLE_COLON = 'DOUBLE_COLON', // ::
  COMMA = 'COMMA',             // ,
  EQUALS = 'EQUALS',           // =
  PLUS = 'PLUS',               // +
  MINUS = 'MINUS',             // -
  STAR = 'STAR',               // *
  SLASH = 'SLASH',             // /
  PERCENT = 'PERCENT',         // %
  NOT = 'NOT',                 // !
  RANGE = 'RANGE',             // ..

  // Comparison
  EQ = 'EQ',                   // ==
  NEQ = 'NEQ',                 // !=
  LT = 'LT',                   // <
  LTE = 'LTE',                 // <=
  GT = 'GT',                   // >
  GTE = 'GTE',                 // >=

  // Delimiters
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',

  // Keywords
  DEF = 'DEF',
  FN = 'FN',
  LET = 'LET',
  VAR = 'VAR',
  IF = 'IF',
  ELIF = 'ELIF',
  ELSE = 'ELSE',
  WHILE = 'WHILE',
  UNTIL = 'UNTIL',
  FOREACH = 'FOREACH',
  DO = 'DO',
  END = 'END',
  MACRO = 'MACRO',
  MODULE = 'MODULE',
  INCLUDE = 'INCLUDE',
  IMPORT = 'IMPORT',
  MATCH = 'MATCH',
  TRY = 'TRY',
  CATCH = 'CATCH',
  BREAK = 'BREAK',
  CONTINUE = 'CONTINUE',
  SELF = 'SELF',
  NODES = 'NODES',
  AND = 'AND',
  OR = 'OR',

  // Special
  EOF = 'EOF',
}

export const KEYWORDS: Record<string, TokenType> = {
  'def': TokenType.DEF,
  'fn': TokenType.FN,
  'let': TokenType.LET,
  'var': TokenType.VAR,
  'if': TokenType.IF,
  'elif': TokenType.ELIF,
  'else': TokenType.ELSE,
  'while': TokenType.WHILE,
  'until': TokenType.UNTIL,
  'foreach': TokenType.FOREACH,
  'do': TokenType.DO,
  'end': TokenType.END,
  'macro': TokenType.MACRO,
  'module': TokenType.MODULE,
  'include': TokenType.INCLUDE,
  'import': TokenType.IMPORT,
  'match': TokenType.MATCH,
  'try': TokenType.TRY,
  'catch': TokenType.CATCH,
  'break': TokenType.BREAK,
  'continue': TokenType.CONTINUE,
  'self': TokenType.SELF,
  'nodes': TokenType.NODES,
  'and': TokenType.AND,
  'or': TokenType.OR,
  'true': TokenType.BOOLEAN,
  'false': TokenType.BOOLEAN,
  'None': TokenType.NONE,
};

/** Module id of code parsed at the top level, as opposed to loaded modules. */
export const TOP_LEVEL_MODULE_ID = 0;

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  moduleId: number;
}
