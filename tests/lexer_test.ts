import { expect, test } from "vitest";
import { LexicalError } from "../src/errors.ts";
import { Lexer } from "../src/lexer.ts";
import { TokenType } from "../src/token.ts";

test("Lexer: statement tokens", () => {
  const tokens = new Lexer("BEGIN a := 2; _num := a * 5.0; END.").tokens();
  expect(tokens.map((t) => t.type)).toEqual([
    TokenType.BEGIN,
    TokenType.ID,
    TokenType.ASSIGN,
    TokenType.INTEGER_CONST,
    TokenType.SEMI,
    TokenType.ID,
    TokenType.ASSIGN,
    TokenType.ID,
    TokenType.MULTIPLY,
    TokenType.REAL_CONST,
    TokenType.SEMI,
    TokenType.END,
    TokenType.DOT,
    TokenType.EOF,
  ]);
  expect(tokens[1].value).toBe("a");
  expect(tokens[3].value).toBe(2);
  expect(tokens[5].value).toBe("_num");
  expect(tokens[9].value).toBe(5);
});

test("Lexer: keywords ignore case and keep their spelling", () => {
  const tokens = new Lexer("begin Div End program").tokens();
  expect(tokens.map((t) => [t.type, t.value])).toEqual([
    [TokenType.BEGIN, "begin"],
    [TokenType.INTEGER_DIVIDE, "Div"],
    [TokenType.END, "End"],
    [TokenType.PROGRAM, "program"],
    [TokenType.EOF, undefined],
  ]);
});

test("Lexer: reals need digits on both sides of the point", () => {
  const tokens = new Lexer("3.14 5.").tokens();
  expect(tokens.map((t) => [t.type, t.value])).toEqual([
    [TokenType.REAL_CONST, 3.14],
    [TokenType.INTEGER_CONST, 5],
    [TokenType.DOT, "."],
    [TokenType.EOF, undefined],
  ]);
});

test("Lexer: colon and assignment", () => {
  const tokens = new Lexer("x : INTEGER; x:=1").tokens();
  expect(tokens.map((t) => t.type)).toEqual([
    TokenType.ID,
    TokenType.COLON,
    TokenType.INTEGER,
    TokenType.SEMI,
    TokenType.ID,
    TokenType.ASSIGN,
    TokenType.INTEGER_CONST,
    TokenType.EOF,
  ]);
});

test("Lexer: comments are skipped", () => {
  const tokens = new Lexer("{ first } 1 {second}{third}\n").tokens();
  expect(tokens).toEqual([
    { type: TokenType.INTEGER_CONST, value: 1, pos: 10 },
    { type: TokenType.EOF, pos: 28 },
  ]);
});

test("Lexer: token offsets", () => {
  const tokens = new Lexer("a := 1").tokens();
  expect(tokens.map((t) => t.pos)).toEqual([0, 2, 5, 6]);
});

test("Lexer: EOF repeats once input is exhausted", () => {
  const lexer = new Lexer(" ");
  expect(lexer.nextToken().type).toBe(TokenType.EOF);
  expect(lexer.nextToken().type).toBe(TokenType.EOF);
  expect(lexer.currentToken().type).toBe(TokenType.EOF);
});

test("Lexer: unterminated comment", () => {
  const lexer = new Lexer("{ unterminated");
  expect(() => lexer.nextToken()).toThrow(LexicalError);
  expect(() => new Lexer("1 { open").tokens()).toThrow(
    "Lexer: Unterminated comment starting at offset 2",
  );
});

test("Lexer: unknown character reports the rest of the input", () => {
  const lexer = new Lexer("1 + @x");
  expect(lexer.nextToken().type).toBe(TokenType.INTEGER_CONST);
  expect(lexer.nextToken().type).toBe(TokenType.PLUS);
  expect(() => lexer.nextToken()).toThrow("Lexer: Unable to tokenize '@x'");
});

test("Lexer: integer constants beyond the exact range", () => {
  const lexer = new Lexer("12 99999999999999999999");
  expect(lexer.nextToken()).toEqual({
    type: TokenType.INTEGER_CONST,
    value: 12,
    pos: 0,
  });
  expect(() => lexer.nextToken()).toThrow(
    "Lexer: Integer constant out of range at offset 3",
  );
});
