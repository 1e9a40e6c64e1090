import { LexicalError } from "./errors.ts";
import { keywords, type Token, TokenType } from "./token.ts";
import { err, isalnum, isalpha, isdigit, isspace } from "./utils.ts";

const punctuation: ReadonlyMap<string, TokenType> = new Map([
  ["+", TokenType.PLUS],
  ["-", TokenType.MINUS],
  ["*", TokenType.MULTIPLY],
  ["/", TokenType.FLOAT_DIVIDE],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  [";", TokenType.SEMI],
  [":", TokenType.COLON],
  [",", TokenType.COMMA],
  [".", TokenType.DOT],
]);

/**Lexer */
export class Lexer {
  private pos: number;
  private tok: Token;

  constructor(private src: string) {
    this.pos = 0;
    this.tok = { type: TokenType.EOF, pos: 0 };
  }

  private atEnd = (): boolean => this.pos >= this.src.length;

  private current = (): string => this.atEnd() ? "\0" : this.src[this.pos];

  private peek = (): string =>
    this.pos + 1 < this.src.length ? this.src[this.pos + 1] : "\0";

  private bump = (): void => {
    this.pos++;
  };

  // whitespace and `{ ... }` comments, in any order
  private skipTrivia = (): void => {
    while (true) {
      while (isspace(this.current())) this.bump();
      if (this.current() !== "{") return;

      const start = this.pos;
      while (!this.atEnd() && this.current() !== "}") this.bump();
      if (this.atEnd()) {
        err(LexicalError, `Unterminated comment starting at offset ${start}`);
      }
      this.bump();
    }
  };

  private digits = (): string => {
    let s = "";
    while (isdigit(this.current())) {
      s += this.current();
      this.bump();
    }
    return s;
  };

  private parseNumber = (): Token => {
    const pos = this.pos;
    const intPart = this.digits();

    if (this.current() === "." && isdigit(this.peek())) {
      this.bump();
      const fracPart = this.digits();
      const value = parseFloat(`${intPart}.${fracPart}`);
      if (!Number.isFinite(value)) {
        return err(LexicalError, `Real constant out of range at offset ${pos}`);
      }
      return { type: TokenType.REAL_CONST, value, pos };
    }
    const value = parseInt(intPart, 10);
    if (!Number.isSafeInteger(value)) {
      return err(LexicalError, `Integer constant out of range at offset ${pos}`);
    }
    return { type: TokenType.INTEGER_CONST, value, pos };
  };

  private parseAlpha = (): Token => {
    const pos = this.pos;
    let alpha = "";
    while (isalnum(this.current())) {
      alpha += this.current();
      this.bump();
    }
    const type = keywords.get(alpha.toUpperCase()) ?? TokenType.ID;
    return { type, value: alpha, pos };
  };

  public nextToken = (): Token => {
    this.skipTrivia();
    const pos = this.pos;
    const ch = this.current();
    const single = punctuation.get(ch);

    if (this.atEnd()) {
      this.tok = { type: TokenType.EOF, pos };
    } else if (isdigit(ch)) {
      this.tok = this.parseNumber();
    } else if (ch === ":" && this.peek() === "=") {
      this.bump();
      this.bump();
      this.tok = { type: TokenType.ASSIGN, value: ":=", pos };
    } else if (single !== undefined) {
      this.bump();
      this.tok = { type: single, value: ch, pos };
    } else if (isalpha(ch)) {
      this.tok = this.parseAlpha();
    } else {
      err(LexicalError, `Unable to tokenize '${this.src.slice(this.pos)}'`);
    }
    return this.tok;
  };

  public currentToken = (): Token => {
    return this.tok;
  };

  /** Drains the remaining input, the last token being EOF */
  public tokens = (): Token[] => {
    const out: Token[] = [];
    do {
      out.push(this.nextToken());
    } while (this.tok.type !== TokenType.EOF);
    return out;
  };
}
