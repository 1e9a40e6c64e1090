import type { Token } from "./token.ts";

export type NodeType =
  | "Program"
  | "Block"
  | "VarDecl"
  | "Type"
  | "Compound"
  | "Assign"
  | "NoOp"
  | "BinOp"
  | "UnaryOp"
  | "Num"
  | "Var";

export interface Node {
  readonly type: NodeType;
}

export interface Program extends Node {
  readonly type: "Program";
  readonly name: string;
  readonly token: Token;
  readonly block: Block;
}

export interface Block extends Node {
  readonly type: "Block";
  readonly declarations: readonly VarDecl[];
  readonly statements: readonly Statement[];
}

export interface VarDecl extends Node {
  readonly type: "VarDecl";
  readonly variable: Var;
  readonly typeSpec: Type;
}

export type TypeName = "INTEGER" | "REAL";

export interface Type extends Node {
  readonly type: "Type";
  readonly token: Token;
  readonly name: TypeName;
}

export type Statement = Compound | Assign | NoOp;

export interface Compound extends Node {
  readonly type: "Compound";
  readonly body: readonly Statement[];
}

export interface Assign extends Node {
  readonly type: "Assign";
  readonly left: Var;
  readonly right: Expression;
}

export interface NoOp extends Node {
  readonly type: "NoOp";
}

export type Expression = BinOp | UnaryOp | Num | Var;

export interface BinOp extends Node {
  readonly type: "BinOp";
  readonly op: Token;
  readonly left: Expression;
  readonly right: Expression;
}

export interface UnaryOp extends Node {
  readonly type: "UnaryOp";
  readonly op: Token;
  readonly argument: Expression;
}

export interface Num extends Node {
  readonly type: "Num";
  readonly token: Token;
  readonly value: number;
}

export interface Var extends Node {
  readonly type: "Var";
  readonly token: Token;
  readonly name: string;
}

export type AnyNode =
  | Program
  | Block
  | VarDecl
  | Type
  | Statement
  | Expression;
