import { describe, expect, test } from "vitest";
import type { Expression } from "../src/ast.ts";
import { parseExpression, parseProgram } from "../src/core.ts";
import { LispPrinter } from "../src/printers/lisp.ts";
import { RpnPrinter } from "../src/printers/rpn.ts";
import { visit, type Visitor } from "../src/visitor.ts";

const rpn = new RpnPrinter();
const lisp = new LispPrinter();

const demo = "PROGRAM Demo; VAR x : INTEGER; BEGIN x := 2 END.";

describe("RpnPrinter", () => {
  test.each([
    ["1 + 2 * 3", "1 2 3 * +"],
    ["(1 + 2) * 3", "1 2 + 3 *"],
    ["1 - 2 - 3", "1 2 - 3 -"],
    ["-5", "0 5 -"],
    ["+5", "5"],
    ["7 DIV 2 / 1.0", "7 2 div 1.0 /"],
    ["rate * 2.5", "rate 2.5 *"],
  ])("%s", (src, expected) => {
    expect(rpn.print(parseExpression(src))).toBe(expected);
  });

  test("program", () => {
    expect(rpn.print(parseProgram(demo))).toBe(
      "x INTEGER :; x 2 :=; Demo program",
    );
    expect(rpn.print(parseProgram("PROGRAM e; BEGIN END."))).toBe(
      "e program",
    );
  });
});

describe("LispPrinter", () => {
  test.each([
    ["1 + 2 * 3", "(+ 1 (* 2 3))"],
    ["(1 + 2) * 3", "(* (+ 1 2) 3)"],
    ["-(3 + 4)", "(- (+ 3 4))"],
    ["+x", "x"],
    ["10 div 4 / 2", "(/ (div 10 4) 2)"],
  ])("%s", (src, expected) => {
    expect(lisp.print(parseExpression(src))).toBe(expected);
  });

  test("program", () => {
    expect(lisp.print(parseProgram(demo))).toBe(
      "(program Demo (block (var x INTEGER) (begin (:= x 2))))",
    );
    expect(lisp.print(parseProgram("PROGRAM e; BEGIN END."))).toBe(
      "(program e (block (begin)))",
    );
  });
});

test("visit: a new traversal needs no change to the AST", () => {
  const nothing = () => 0;
  const depth: Visitor<number> = {
    Program: nothing,
    Block: nothing,
    VarDecl: nothing,
    Type: nothing,
    Compound: nothing,
    Assign: nothing,
    NoOp: nothing,
    BinOp: (node) =>
      1 + Math.max(visit(depth, node.left), visit(depth, node.right)),
    UnaryOp: (node) => 1 + visit(depth, node.argument),
    Num: () => 1,
    Var: () => 1,
  };
  const tree: Expression = parseExpression("1 + 2 * (3 - -4)");
  expect(visit(depth, tree)).toBe(5);
});
