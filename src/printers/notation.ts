import type { Num } from "../ast.ts";
import { type Token, TokenType } from "../token.ts";

/** operator spelling shared by the printers; DIV is always lowercase */
export const opSymbol = (op: Token): string =>
  op.type === TokenType.INTEGER_DIVIDE ? "div" : String(op.value);

// a real constant keeps its decimal point: 3.0 prints as "3.0", not "3"
export const literal = (node: Num): string =>
  node.token.type === TokenType.REAL_CONST && Number.isInteger(node.value)
    ? node.value.toFixed(1)
    : String(node.value);

export const join = (parts: string[], sep: string): string =>
  parts.filter((part) => part !== "").join(sep);
