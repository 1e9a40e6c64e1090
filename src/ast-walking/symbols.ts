import type { TypeName } from "../ast.ts";
import { InternalError, NameError, SemanticError } from "../errors.ts";
import { err, type Writer } from "../utils.ts";
import { visit, type Visitor } from "../visitor.ts";

export type SymbolEntry =
  | { kind: "builtin"; name: TypeName }
  | { kind: "variable"; name: string; typeName: TypeName };

export const showSymbol = (sym: SymbolEntry): string =>
  sym.kind === "builtin" ? sym.name : `<${sym.name}:${sym.typeName}>`;

/** Declared names of a program, looked up case-insensitively */
export class SymbolTable {
  private symbols = new Map<string, SymbolEntry>();

  constructor(private verbose = false, private writer: Writer = console.log) {
    this.define({ kind: "builtin", name: "INTEGER" });
    this.define({ kind: "builtin", name: "REAL" });
  }

  public define = (sym: SymbolEntry): void => {
    if (this.verbose) this.writer(`Define: ${showSymbol(sym)}`);
    const key = sym.name.toLowerCase();
    if (this.symbols.has(key)) {
      return err(SemanticError, `Duplicate identifier '${sym.name}'`);
    }
    this.symbols.set(key, sym);
  };

  public lookup = (name: string): SymbolEntry | undefined => {
    if (this.verbose) this.writer(`Lookup: ${name}`);
    return this.symbols.get(name.toLowerCase());
  };

  public entries = (): SymbolEntry[] => [...this.symbols.values()];
}

/**
 * Checks declarations before a program runs: every variable is declared
 * once, with a known type, before it is assigned or read.
 */
export class SemanticAnalyzer implements Visitor<void> {
  public readonly table: SymbolTable;

  constructor(verbose = false, writer: Writer = console.log) {
    this.table = new SymbolTable(verbose, writer);
  }

  public Program: Visitor<void>["Program"] = (node) =>
    visit(this, node.block);

  public Block: Visitor<void>["Block"] = (node) => {
    for (const decl of node.declarations) visit(this, decl);
    for (const stmt of node.statements) visit(this, stmt);
  };

  public VarDecl: Visitor<void>["VarDecl"] = (node) => {
    const typeName = node.typeSpec.name;
    // the parser only builds INTEGER and REAL, both seeded as built-ins
    if (this.table.lookup(typeName)?.kind !== "builtin") {
      return err(InternalError, `Type '${typeName}' is not a built-in`);
    }
    this.table.define({
      kind: "variable",
      name: node.variable.name,
      typeName,
    });
  };

  public Type: Visitor<void>["Type"] = () => {};

  public Compound: Visitor<void>["Compound"] = (node) => {
    for (const stmt of node.body) visit(this, stmt);
  };

  public Assign: Visitor<void>["Assign"] = (node) => {
    visit(this, node.right);
    visit(this, node.left);
  };

  public NoOp: Visitor<void>["NoOp"] = () => {};

  public BinOp: Visitor<void>["BinOp"] = (node) => {
    visit(this, node.left);
    visit(this, node.right);
  };

  public UnaryOp: Visitor<void>["UnaryOp"] = (node) =>
    visit(this, node.argument);

  public Num: Visitor<void>["Num"] = () => {};

  public Var: Visitor<void>["Var"] = (node) => {
    if (this.table.lookup(node.name)?.kind !== "variable") {
      throw new NameError(
        `Undeclared variable '${node.name}'`,
        "SemanticAnalyzer",
      );
    }
  };
}
