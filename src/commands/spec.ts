export type CommandOwner = {
  readonly name: string;
};

export type ArgumentSpec = {
  readonly name: string;
  readonly type: string;
  readonly optional: boolean;
  /** Raw default, parsed through the argument's type when the token is absent. */
  readonly defaultValue?: string;
  readonly description?: string;
};

export type FlagSpec = {
  readonly name: string;
  readonly short?: string;
  readonly hasValue: boolean;
  readonly defaultValue?: string;
  readonly description?: string;
};

export const RESERVED_FLAG_NAMES: readonly string[] = ["help", "h"];

export function argumentSpec(
  name: string,
  type: string,
  options: { optional?: boolean; defaultValue?: string; description?: string } = {},
): ArgumentSpec {
  return {
    name,
    type,
    optional: options.optional ?? options.defaultValue !== undefined,
    defaultValue: options.defaultValue,
    description: options.description,
  };
}

export function flagSpec(
  name: string,
  options: { short?: string; hasValue?: boolean; defaultValue?: string; description?: string } = {},
): FlagSpec {
  return {
    name: name.toLowerCase(),
    short: options.short,
    hasValue: options.hasValue ?? false,
    defaultValue: options.defaultValue,
    description: options.description,
  };
}

export function isRequired(spec: ArgumentSpec): boolean {
  return !spec.optional && spec.defaultValue === undefined;
}
