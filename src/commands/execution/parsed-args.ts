/** Typed argument values keyed by argument name, plus the positional tokens they came from. */
export class ParsedArgs {
  private readonly values: ReadonlyMap<string, unknown>;
  private readonly tokens: readonly string[];

  constructor(values: ReadonlyMap<string, unknown>, positional: readonly string[]) {
    this.values = new Map(values);
    this.tokens = [...positional];
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  getAs<T>(name: string, guard: (value: unknown) => value is T): T | undefined {
    const value = this.values.get(name);
    return guard(value) ? value : undefined;
  }

  getString(name: string, fallback?: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === "string" ? value : fallback;
  }

  getInt(name: string, fallback?: number): number | undefined {
    const value = this.values.get(name);
    return typeof value === "number" && Number.isInteger(value) ? value : fallback;
  }

  getNumber(name: string, fallback?: number): number | undefined {
    const value = this.values.get(name);
    return typeof value === "number" ? value : fallback;
  }

  getBoolean(name: string, fallback?: boolean): boolean | undefined {
    const value = this.values.get(name);
    return typeof value === "boolean" ? value : fallback;
  }

  positional(index: number): string | undefined {
    return this.tokens[index];
  }

  get positionalCount(): number {
    return this.tokens.length;
  }

  remaining(from: number): string[] {
    return this.tokens.slice(from);
  }

  remainingJoined(from: number): string {
    return this.remaining(from).join(" ");
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
