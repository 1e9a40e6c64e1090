import type { AnyNode } from "../ast.ts";
import { TokenType } from "../token.ts";
import { visit, type Visitor } from "../visitor.ts";
import { join, literal, opSymbol } from "./notation.ts";

/** Prefix S-expression rendering: `1 + 2 * 3` is `(+ 1 (* 2 3))` */
export class LispPrinter implements Visitor<string> {
  public print = (node: AnyNode): string => visit(this, node);

  public Program: Visitor<string>["Program"] = (node) =>
    `(program ${node.name} ${visit(this, node.block)})`;

  public Block: Visitor<string>["Block"] = (node) =>
    `(${
      join([
        "block",
        ...node.declarations.map((n) => visit(this, n)),
        this.Compound({ type: "Compound", body: node.statements }),
      ], " ")
    })`;

  public VarDecl: Visitor<string>["VarDecl"] = (node) =>
    `(var ${node.variable.name} ${visit(this, node.typeSpec)})`;

  public Type: Visitor<string>["Type"] = (node) => node.name;

  public Compound: Visitor<string>["Compound"] = (node) =>
    `(${join(["begin", ...node.body.map((n) => visit(this, n))], " ")})`;

  public Assign: Visitor<string>["Assign"] = (node) =>
    `(:= ${node.left.name} ${visit(this, node.right)})`;

  public NoOp: Visitor<string>["NoOp"] = () => "";

  public BinOp: Visitor<string>["BinOp"] = (node) =>
    `(${opSymbol(node.op)} ${visit(this, node.left)} ${
      visit(this, node.right)
    })`;

  public UnaryOp: Visitor<string>["UnaryOp"] = (node) =>
    node.op.type === TokenType.MINUS
      ? `(- ${visit(this, node.argument)})`
      : visit(this, node.argument);

  public Num: Visitor<string>["Num"] = (node) => literal(node);

  public Var: Visitor<string>["Var"] = (node) => node.name;
}
