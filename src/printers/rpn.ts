import type { AnyNode } from "../ast.ts";
import { TokenType } from "../token.ts";
import { visit, type Visitor } from "../visitor.ts";
import { join, literal, opSymbol } from "./notation.ts";

/** Postfix (reverse Polish) rendering: `1 + 2 * 3` is `1 2 3 * +` */
export class RpnPrinter implements Visitor<string> {
  public print = (node: AnyNode): string => visit(this, node);

  public Program: Visitor<string>["Program"] = (node) =>
    join([visit(this, node.block), `${node.name} program`], "; ");

  public Block: Visitor<string>["Block"] = (node) =>
    join(
      [...node.declarations, ...node.statements].map((n) => visit(this, n)),
      "; ",
    );

  public VarDecl: Visitor<string>["VarDecl"] = (node) =>
    `${node.variable.name} ${visit(this, node.typeSpec)} :`;

  public Type: Visitor<string>["Type"] = (node) => node.name;

  public Compound: Visitor<string>["Compound"] = (node) =>
    join(node.body.map((n) => visit(this, n)), "; ");

  public Assign: Visitor<string>["Assign"] = (node) =>
    `${node.left.name} ${visit(this, node.right)} :=`;

  public NoOp: Visitor<string>["NoOp"] = () => "";

  public BinOp: Visitor<string>["BinOp"] = (node) =>
    `${visit(this, node.left)} ${visit(this, node.right)} ${
      opSymbol(node.op)
    }`;

  // no unary operators in postfix: -x is written 0 x -
  public UnaryOp: Visitor<string>["UnaryOp"] = (node) =>
    node.op.type === TokenType.MINUS
      ? `0 ${visit(this, node.argument)} -`
      : visit(this, node.argument);

  public Num: Visitor<string>["Num"] = (node) => literal(node);

  public Var: Visitor<string>["Var"] = (node) => node.name;
}
