import { NameError } from "../errors.ts";
import { err } from "../utils.ts";
import type { NumericValue } from "./value.ts";

type Binding = { name: string; value: NumericValue };

/** Runtime container for variables. Names are case-insensitive. */
export class Context {
  private vars = new Map<string, Binding>();

  // keeps the spelling of the first assignment
  public setVar = (name: string, value: NumericValue): void => {
    const key = name.toLowerCase();
    const binding = this.vars.get(key);
    if (binding) binding.value = value;
    else this.vars.set(key, { name, value });
  };

  public getVar = (name: string): NumericValue => {
    const binding = this.vars.get(name.toLowerCase());
    if (binding) return binding.value;
    return err(NameError, `Variable '${name}' has not been assigned`);
  };

  /** bindings in first-assignment order */
  public entries = (): [string, NumericValue][] =>
    [...this.vars.values()].map(
      ({ name, value }): [string, NumericValue] => [name, value],
    );
}
