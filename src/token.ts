export enum TokenType {
  INTEGER_CONST = "INTEGER_CONST",
  REAL_CONST = "REAL_CONST",
  PLUS = "PLUS",
  MINUS = "MINUS",
  MULTIPLY = "MULTIPLY",
  INTEGER_DIVIDE = "INTEGER_DIVIDE",
  FLOAT_DIVIDE = "FLOAT_DIVIDE",
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  ID = "ID",
  PROGRAM = "PROGRAM",
  VAR = "VAR",
  BEGIN = "BEGIN",
  END = "END",
  INTEGER = "INTEGER",
  REAL = "REAL",
  SEMI = "SEMI",
  COLON = "COLON",
  COMMA = "COMMA",
  ASSIGN = "ASSIGN",
  DOT = "DOT",
  EOF = "EOF",
}

export type Literal = string | number;

export type Token = {
  readonly type: TokenType;
  readonly value?: Literal;
  readonly pos: number;
};

/** reserved words, matched case-insensitively */
export const keywords: ReadonlyMap<string, TokenType> = new Map([
  ["PROGRAM", TokenType.PROGRAM],
  ["VAR", TokenType.VAR],
  ["BEGIN", TokenType.BEGIN],
  ["END", TokenType.END],
  ["INTEGER", TokenType.INTEGER],
  ["REAL", TokenType.REAL],
  ["DIV", TokenType.INTEGER_DIVIDE],
]);

export const showToken = (tok: Token): string =>
  tok.value === undefined || tok.type === TokenType.EOF
    ? tok.type
    : `${tok.type} '${tok.value}'`;
