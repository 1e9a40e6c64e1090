import type { Expression, Program } from "./ast.ts";
import { Context } from "./ast-walking/context.ts";
import {
  Interpreter,
  type InterpreterOptions,
} from "./ast-walking/interpreter.ts";
import type { NumericValue } from "./ast-walking/value.ts";
import { Lexer } from "./lexer.ts";
import { Parser } from "./parser.ts";

export const parseProgram = (src: string): Program =>
  new Parser(new Lexer(src)).parse();

export const parseExpression = (src: string): Expression =>
  new Parser(new Lexer(src)).parseExpression();

/** Evaluates one arithmetic expression, e.g. `"1 + 2 * 3"` */
export const calculate = (src: string): NumericValue =>
  new Interpreter(new Context()).calculate(parseExpression(src));

/** Runs a `PROGRAM ... .` unit in a fresh context */
export const run = (src: string, options: InterpreterOptions = {}): Context =>
  new Interpreter(new Context(), options).interpret(parseProgram(src));
