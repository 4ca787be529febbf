import { ParsedFlags, type FlagValue } from "../execution/parsed-flags";
import type { FlagSpec } from "../spec";

export type FlagParseResult = {
  flags: ParsedFlags;
  remaining: string[];
};

type KnownFlag = {
  name: string;
  hasValue: boolean;
};

const HELP_FLAG: KnownFlag = { name: "help", hasValue: false };
const SIGNED_NUMBER = /^-(\d+\.?\d*|\.\d+)$/;

export function isNegativeNumber(token: string): boolean {
  return SIGNED_NUMBER.test(token);
}

/**
 * Splits flags from positional tokens. Unknown flags are kept as boolean flags
 * under their literal name; `--` ends flag parsing.
 */
export class FlagParser {
  private readonly longFlags = new Map<string, KnownFlag>();
  private readonly shortFlags = new Map<string, KnownFlag>();
  private readonly specs: readonly FlagSpec[];

  constructor(specs: readonly FlagSpec[] = []) {
    this.specs = specs;
    for (const spec of specs) {
      const known = { name: spec.name.toLowerCase(), hasValue: spec.hasValue };
      this.longFlags.set(known.name, known);
      if (spec.short) {
        this.shortFlags.set(spec.short.toLowerCase(), known);
      }
    }
    if (!this.longFlags.has("help")) {
      this.longFlags.set("help", HELP_FLAG);
    }
    if (!this.shortFlags.has("h")) {
      this.shortFlags.set("h", HELP_FLAG);
    }
  }

  parse(args: readonly string[]): FlagParseResult {
    const values = new Map<string, FlagValue>();
    const remaining: string[] = [];
    let flagsEnded = false;

    for (let index = 0; index < args.length; index += 1) {
      const arg = args[index];
      if (!flagsEnded && arg === "--") {
        flagsEnded = true;
        continue;
      }
      if (flagsEnded) {
        remaining.push(arg);
        continue;
      }
      if (arg.startsWith("--")) {
        index = this.parseLong(arg, args, index, values);
        continue;
      }
      if (arg.startsWith("-") && arg.length > 1 && !isNegativeNumber(arg)) {
        index = this.parseShort(arg, args, index, values);
        continue;
      }
      remaining.push(arg);
    }

    return { flags: new ParsedFlags(values, this.specs), remaining };
  }

  private parseLong(
    arg: string,
    args: readonly string[],
    index: number,
    values: Map<string, FlagValue>,
  ): number {
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq > 0) {
      values.set(body.slice(0, eq).toLowerCase(), body.slice(eq + 1));
      return index;
    }

    const name = body.toLowerCase();
    const spec = this.longFlags.get(name);
    if (!spec) {
      values.set(name, true);
      return index;
    }
    if (spec.hasValue && index + 1 < args.length) {
      values.set(spec.name, args[index + 1]);
      return index + 1;
    }
    values.set(spec.name, true);
    return index;
  }

  private parseShort(
    arg: string,
    args: readonly string[],
    index: number,
    values: Map<string, FlagValue>,
  ): number {
    const chars = arg.slice(1);
    for (let i = 0; i < chars.length; i += 1) {
      const char = chars.charAt(i).toLowerCase();
      const spec = this.shortFlags.get(char);
      if (!spec) {
        values.set(char, true);
        continue;
      }
      if (!spec.hasValue) {
        values.set(spec.name, true);
        continue;
      }
      if (i + 1 < chars.length) {
        values.set(spec.name, chars.slice(i + 1));
        return index;
      }
      if (index + 1 < args.length) {
        values.set(spec.name, args[index + 1]);
        return index + 1;
      }
      values.set(spec.name, true);
      return index;
    }
    return index;
  }
}
