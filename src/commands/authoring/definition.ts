import { ProcessingError } from "../errors";
import type { CompiledExecutor } from "../registry/nodes";
import type { ArgumentSpec, FlagSpec } from "../spec";

export type CooldownDeclaration = {
  /** Milliseconds, or a duration string such as `5s`, `2m` or `1h30m`. */
  duration: number | string;
  bypassPermission?: string;
  messageKey?: string;
};

/** Plain, mutable description of a command tree, compiled into nodes at registration. */
export type CommandDefinition = {
  name: string;
  aliases: string[];
  description?: string;
  usage?: string;
  permission?: string;
  playerOnly?: boolean;
  hidden?: boolean;
  arguments: ArgumentSpec[];
  flags: FlagSpec[];
  cooldown?: CooldownDeclaration;
  executor?: CompiledExecutor;
  subcommands: CommandDefinition[];
};

export function emptyDefinition(name: string): CommandDefinition {
  return { name, aliases: [], arguments: [], flags: [], subcommands: [] };
}

export function splitPath(path: string): string[] {
  return path
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Finds or creates the definition at `words` below `parent`. Intermediate
 * definitions are created without an executor.
 */
export function definitionAt(
  parent: CommandDefinition,
  words: readonly string[],
): CommandDefinition {
  let current = parent;
  for (const word of words) {
    const key = word.toLowerCase();
    let next = current.subcommands.find((child) => child.name.toLowerCase() === key);
    if (!next) {
      next = emptyDefinition(key);
      current.subcommands.push(next);
    }
    current = next;
  }
  return current;
}

export function assignExecutor(
  root: CommandDefinition,
  target: CommandDefinition,
  executor: CompiledExecutor,
  path: string,
): void {
  if (target.executor) {
    throw new ProcessingError(
      root.name,
      `more than one handler declared for '${path || "default"}'`,
    );
  }
  target.executor = executor;
}
