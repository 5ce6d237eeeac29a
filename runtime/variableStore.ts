import { EMPTY, cloneValues } from "../dsl/values.ts";
import type { Value, ValueMap } from "../dsl/types.ts";

export type ChangeListener = (
  name: string,
  oldValue: Value | undefined,
  newValue: Value,
) => void;

export class VariableStore {
  private variables: ValueMap;
  private onChange?: ChangeListener;

  constructor(initialVariables?: ValueMap, onChange?: ChangeListener) {
    this.variables = cloneValues(initialVariables ?? new Map());
    if (onChange) {
      this.onChange = onChange;
    }
  }

  get(name: string): Value {
    // Loose mode: unknown names read as Empty
    return this.variables.get(name) ?? EMPTY;
  }

  set(name: string, value: Value): void {
    const oldValue = this.variables.get(name);
    this.variables.set(name, value);

    // Trigger callback only if value changed
    if (this.onChange && oldValue !== value) {
      this.onChange(name, oldValue, value);
    }
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  getAll(): ValueMap {
    return cloneValues(this.variables);
  }

  /** Replaces every value; defaults are copied so callers keep theirs. */
  reset(values: ValueMap): void {
    this.variables = cloneValues(values);
  }
}
