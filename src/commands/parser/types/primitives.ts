import { ArgumentValueError } from "../../errors";
import type { ArgumentType } from "../argument-type";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const COMMON_INTEGERS = ["1", "5", "10", "25", "50", "100"];

const TRUE_VALUES = new Set(["true", "yes", "on", "1", "enable", "enabled"]);
const FALSE_VALUES = new Set(["false", "no", "off", "0", "disable", "disabled"]);

export const stringType: ArgumentType<string> = {
  name: "string",
  parse: (_context, input) => input,
  suggest: () => [],
};

export const greedyStringType: ArgumentType<string> = {
  name: "greedyString",
  greedy: true,
  parse: (_context, input) => input,
  suggest: () => [],
};

export type NumberBounds = {
  min?: number;
  max?: number;
};

function boundedName(base: string, { min, max }: NumberBounds): string {
  if (min !== undefined && max !== undefined) {
    return `${base}(${min}-${max})`;
  }
  if (min !== undefined) {
    return `${base}(>=${min})`;
  }
  if (max !== undefined) {
    return `${base}(<=${max})`;
  }
  return base;
}

function checkBounds(input: string, value: number, bounds: NumberBounds): void {
  const min = bounds.min ?? Number.NEGATIVE_INFINITY;
  const max = bounds.max ?? Number.POSITIVE_INFINITY;
  if (value < min || value > max) {
    throw new ArgumentValueError(input, "number-out-of-range", { min, max });
  }
}

export function integerType(bounds: NumberBounds = {}): ArgumentType<number> {
  const min = bounds.min ?? Number.MIN_SAFE_INTEGER;
  const max = bounds.max ?? Number.MAX_SAFE_INTEGER;
  return {
    name: boundedName("integer", bounds),
    parse(_context, input) {
      const value = Number(input);
      if (!INTEGER_PATTERN.test(input) || !Number.isSafeInteger(value)) {
        throw new ArgumentValueError(input, "invalid-number");
      }
      checkBounds(input, value, bounds);
      return value;
    },
    suggest(_context, partial) {
      if (min < 0 || max > 100) {
        return [];
      }
      return COMMON_INTEGERS.filter((candidate) => {
        const value = Number(candidate);
        return candidate.startsWith(partial) && value >= min && value <= max;
      });
    },
  };
}

export function doubleType(bounds: NumberBounds = {}): ArgumentType<number> {
  return {
    name: boundedName("double", bounds),
    parse(_context, input) {
      const value = Number(input);
      if (!DECIMAL_PATTERN.test(input) || Number.isNaN(value)) {
        throw new ArgumentValueError(input, "invalid-number");
      }
      checkBounds(input, value, bounds);
      return value;
    },
    suggest: () => [],
  };
}

export const booleanType: ArgumentType<boolean> = {
  name: "boolean",
  parse(_context, input) {
    const normalized = input.toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    throw new ArgumentValueError(input, "invalid-boolean");
  },
  suggest(_context, partial) {
    const lower = partial.toLowerCase();
    return ["true", "false"].filter((value) => value.startsWith(lower));
  },
};

export function parseBooleanLiteral(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return undefined;
}
