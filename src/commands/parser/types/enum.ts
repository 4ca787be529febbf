import { ArgumentValueError } from "../../errors";
import type { ArgumentType } from "../argument-type";

/**
 * Case-insensitive choice between fixed names. Parses to the value as declared,
 * suggests the lowercase names in declaration order.
 */
export function enumType<T extends string>(
  name: string,
  values: readonly T[],
): ArgumentType<T> {
  const byLowerName = new Map<string, T>();
  for (const value of values) {
    byLowerName.set(value.toLowerCase(), value);
  }
  const names = [...byLowerName.keys()];

  return {
    name: name.toLowerCase(),
    parse(_context, input) {
      const value = byLowerName.get(input.toLowerCase());
      if (value === undefined) {
        throw new ArgumentValueError(input, "invalid-enum", { values: names.join(", ") });
      }
      return value;
    },
    suggest(_context, partial) {
      const lower = partial.toLowerCase();
      return names.filter((candidate) => candidate.startsWith(lower));
    },
  };
}
