import { parseBooleanLiteral } from "../parser/types/primitives";
import type { FlagSpec } from "../spec";

export type FlagValue = string | true;

/** Flags collected from one invocation. Boolean flags are stored as `true`. */
export class ParsedFlags {
  private readonly values: ReadonlyMap<string, FlagValue>;
  private readonly defaults: ReadonlyMap<string, string>;

  constructor(values: ReadonlyMap<string, FlagValue>, specs: readonly FlagSpec[] = []) {
    this.values = new Map(values);
    const defaults = new Map<string, string>();
    for (const spec of specs) {
      if (spec.defaultValue !== undefined) {
        defaults.set(spec.name.toLowerCase(), spec.defaultValue);
      }
    }
    this.defaults = defaults;
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  raw(name: string): FlagValue | undefined {
    return this.values.get(name.toLowerCase());
  }

  /** Explicit string value, else the declared default. A bare boolean flag has no value. */
  value(name: string, fallback?: string): string | undefined {
    const key = name.toLowerCase();
    const explicit = this.values.get(key);
    if (typeof explicit === "string") {
      return explicit;
    }
    return this.defaults.get(key) ?? fallback;
  }

  isTruthy(name: string): boolean {
    const key = name.toLowerCase();
    const explicit = this.values.get(key);
    if (explicit === true) {
      return true;
    }
    const candidate = explicit ?? this.defaults.get(key);
    return candidate !== undefined && parseBooleanLiteral(candidate) === true;
  }

  getInt(name: string, fallback?: number): number | undefined {
    const raw = this.value(name);
    if (raw === undefined || !/^[+-]?\d+$/.test(raw)) {
      return fallback;
    }
    const value = Number(raw);
    return Number.isSafeInteger(value) ? value : fallback;
  }

  getNumber(name: string, fallback?: number): number | undefined {
    const raw = this.value(name);
    if (raw === undefined || raw.trim() === "") {
      return fallback;
    }
    const value = Number(raw);
    return Number.isNaN(value) ? fallback : value;
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  toRecord(): Record<string, FlagValue> {
    return Object.fromEntries(this.values);
  }
}
