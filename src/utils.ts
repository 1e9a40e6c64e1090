import type { ErrorClass } from "./errors.ts";

export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

export const isalpha = (ch: string): boolean =>
  ch.length === 1 &&
  ((ch >= "A" && ch <= "Z") || (ch >= "a" && ch <= "z") || ch === "_");

export const isalnum = (ch: string): boolean => isalpha(ch) || isdigit(ch);

export const isspace = (ch: string): boolean =>
  ch === " " || ch === "\t" || ch === "\n" || ch === "\r";

export const err = (kind: ErrorClass, msg: string): never => {
  throw new kind(msg);
};

/** sink for trace and diagnostic lines */
export type Writer = (line: string) => void;
