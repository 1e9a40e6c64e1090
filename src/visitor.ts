import type { AnyNode, NodeType } from "./ast.ts";
import { InternalError } from "./errors.ts";
import { err } from "./utils.ts";

export type NodeOf<K extends NodeType> = Extract<AnyNode, { type: K }>;

/**
 * One handler per node type. A traversal (evaluation, printing, analysis)
 * is a separate object of this shape, so adding one never touches the AST.
 */
export type Visitor<R> = {
  readonly [K in NodeType]: (node: NodeOf<K>) => R;
};

export const visit = <R>(visitor: Visitor<R>, node: AnyNode): R => {
  switch (node.type) {
    case "Program":
      return visitor.Program(node);
    case "Block":
      return visitor.Block(node);
    case "VarDecl":
      return visitor.VarDecl(node);
    case "Type":
      return visitor.Type(node);
    case "Compound":
      return visitor.Compound(node);
    case "Assign":
      return visitor.Assign(node);
    case "NoOp":
      return visitor.NoOp(node);
    case "BinOp":
      return visitor.BinOp(node);
    case "UnaryOp":
      return visitor.UnaryOp(node);
    case "Num":
      return visitor.Num(node);
    case "Var":
      return visitor.Var(node);
    default:
      return err(
        InternalError,
        `Unknown node type: ${(node as AnyNode).type}`,
      );
  }
};
