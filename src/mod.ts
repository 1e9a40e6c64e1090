export { Lexer } from "./lexer.ts";
export { Parser } from "./parser.ts";
export { Interpreter } from "./ast-walking/interpreter.ts";
export type { InterpreterOptions } from "./ast-walking/interpreter.ts";
export { Context } from "./ast-walking/context.ts";
export { SemanticAnalyzer, SymbolTable } from "./ast-walking/symbols.ts";
export type { NumericValue } from "./ast-walking/value.ts";
export { RpnPrinter } from "./printers/rpn.ts";
export { LispPrinter } from "./printers/lisp.ts";
export { visit } from "./visitor.ts";
export type { Visitor } from "./visitor.ts";
export { TokenType } from "./token.ts";
export type { Token } from "./token.ts";
export type * from "./ast.ts";
export * from "./errors.ts";
export { calculate, parseExpression, parseProgram, run } from "./core.ts";
