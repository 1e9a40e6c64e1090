import { ArithmeticError } from "../errors.ts";
import { err } from "../utils.ts";

export type NumericValue =
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "real"; readonly value: number };

// `+ 0` folds -0 into 0
export const integer = (value: number): NumericValue => {
  const whole = Math.trunc(value) + 0;
  if (!Number.isSafeInteger(whole)) {
    return err(ArithmeticError, "Integer out of range");
  }
  return { kind: "integer", value: whole };
};

export const real = (value: number): NumericValue => {
  if (!Number.isFinite(value)) return err(ArithmeticError, "Real out of range");
  return { kind: "real", value };
};

const bothIntegers = (a: NumericValue, b: NumericValue): boolean =>
  a.kind === "integer" && b.kind === "integer";

// the result is real as soon as one operand is
export const add = (a: NumericValue, b: NumericValue): NumericValue =>
  bothIntegers(a, b) ? integer(a.value + b.value) : real(a.value + b.value);

export const sub = (a: NumericValue, b: NumericValue): NumericValue =>
  bothIntegers(a, b) ? integer(a.value - b.value) : real(a.value - b.value);

export const mul = (a: NumericValue, b: NumericValue): NumericValue =>
  bothIntegers(a, b) ? integer(a.value * b.value) : real(a.value * b.value);

export const neg = (a: NumericValue): NumericValue =>
  a.kind === "integer" ? integer(-a.value) : real(-a.value);

/** DIV: operands truncated to integers, quotient truncated toward zero */
export const intDiv = (a: NumericValue, b: NumericValue): NumericValue => {
  const divisor = Math.trunc(b.value);
  if (divisor === 0) return err(ArithmeticError, "Division by zero");
  return integer(Math.trunc(a.value) / divisor);
};

export const realDiv = (a: NumericValue, b: NumericValue): NumericValue => {
  if (b.value === 0) return err(ArithmeticError, "Division by zero");
  return real(a.value / b.value);
};

export const show = (v: NumericValue): string =>
  v.kind === "real" && Number.isInteger(v.value)
    ? v.value.toFixed(1)
    : String(v.value);
