import type { Expression, Program } from "../ast.ts";
import { InternalError } from "../errors.ts";
import { TokenType } from "../token.ts";
import { err, type Writer } from "../utils.ts";
import { visit, type Visitor } from "../visitor.ts";
import type { Context } from "./context.ts";
import { SemanticAnalyzer, type SymbolTable } from "./symbols.ts";
import {
  add,
  integer,
  intDiv,
  mul,
  neg,
  type NumericValue,
  real,
  realDiv,
  show,
  sub,
} from "./value.ts";

export type InterpreterOptions = {
  /** report each declaration and assignment */
  trace?: boolean;
  /** report symbol table defines and lookups */
  verbose?: boolean;
  writer?: Writer;
};

type Result = NumericValue | undefined;

/**Interpreter */
export class Interpreter implements Visitor<Result> {
  private context: Context;
  private trace: boolean;
  private verbose: boolean;
  private writer: Writer;
  public symbols?: SymbolTable;

  constructor(ctx: Context, options: InterpreterOptions = {}) {
    this.context = ctx;
    this.trace = options.trace ?? false;
    this.verbose = options.verbose ?? false;
    this.writer = options.writer ?? console.log;
  }

  /** Runs a whole program against the context and returns it */
  public interpret = (program: Program): Context => {
    const analyzer = new SemanticAnalyzer(this.verbose, this.writer);
    visit(analyzer, program);
    this.symbols = analyzer.table;

    visit(this, program);
    return this.context;
  };

  /** Evaluates a standalone arithmetic expression */
  public calculate = (expr: Expression): NumericValue => this.eval(expr);

  private eval = (expr: Expression): NumericValue => {
    const value = visit(this, expr);
    if (value === undefined) {
      return err(InternalError, `Expression produced no value: ${expr.type}`);
    }
    return value;
  };

  private log = (line: string): void => {
    if (this.trace) this.writer(line);
  };

  public Program: Visitor<Result>["Program"] = (node) => {
    this.log(`Program ${node.name}`);
    return visit(this, node.block);
  };

  public Block: Visitor<Result>["Block"] = (node) => {
    for (const decl of node.declarations) visit(this, decl);
    for (const stmt of node.statements) visit(this, stmt);
    return undefined;
  };

  // declared types are not enforced at run time
  public VarDecl: Visitor<Result>["VarDecl"] = (node) => {
    this.log(`Declare ${node.variable.name} : ${node.typeSpec.name}`);
    return undefined;
  };

  public Type: Visitor<Result>["Type"] = () => undefined;

  public Compound: Visitor<Result>["Compound"] = (node) => {
    for (const stmt of node.body) visit(this, stmt);
    return undefined;
  };

  public Assign: Visitor<Result>["Assign"] = (node) => {
    const value = this.eval(node.right);
    this.context.setVar(node.left.name, value);
    this.log(`${node.left.name} := ${show(value)}`);
    return undefined;
  };

  public NoOp: Visitor<Result>["NoOp"] = () => undefined;

  public BinOp: Visitor<Result>["BinOp"] = (node) => {
    const left = this.eval(node.left);
    const right = this.eval(node.right);

    switch (node.op.type) {
      case TokenType.PLUS:
        return add(left, right);
      case TokenType.MINUS:
        return sub(left, right);
      case TokenType.MULTIPLY:
        return mul(left, right);
      case TokenType.INTEGER_DIVIDE:
        return intDiv(left, right);
      case TokenType.FLOAT_DIVIDE:
        return realDiv(left, right);
      default:
        return err(InternalError, `Unknown operator: ${node.op.type}`);
    }
  };

  public UnaryOp: Visitor<Result>["UnaryOp"] = (node) => {
    const value = this.eval(node.argument);
    switch (node.op.type) {
      case TokenType.PLUS:
        return value;
      case TokenType.MINUS:
        return neg(value);
      default:
        return err(InternalError, `Unknown operator: ${node.op.type}`);
    }
  };

  public Num: Visitor<Result>["Num"] = (node) =>
    node.token.type === TokenType.REAL_CONST
      ? real(node.value)
      : integer(node.value);

  public Var: Visitor<Result>["Var"] = (node) =>
    this.context.getVar(node.name);
}
