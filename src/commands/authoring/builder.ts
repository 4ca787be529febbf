import { ProcessingError } from "../errors";
import type { CompiledExecutor } from "../registry/nodes";
import { argumentSpec, flagSpec } from "../spec";
import {
  definitionAt,
  emptyDefinition,
  splitPath,
  type CommandDefinition,
  type CooldownDeclaration,
} from "./definition";

export type ArgumentOptions = {
  optional?: boolean;
  defaultValue?: string;
  description?: string;
};

export type FlagOptions = {
  short?: string;
  hasValue?: boolean;
  defaultValue?: string;
  description?: string;
};

/**
 * Fluent command declaration.
 *
 * ```ts
 * command("eco")
 *   .permission("eco.use")
 *   .sub("give", (give) =>
 *     give.argument("target", "actor").argument("amount", "integer").executes(handleGive),
 *   )
 *   .build();
 * ```
 */
export class CommandBuilder {
  private constructor(
    private readonly definition: CommandDefinition,
    private readonly rootName: string,
  ) {}

  static create(name: string): CommandBuilder {
    const words = splitPath(name);
    if (words.length !== 1) {
      throw new ProcessingError(name, "root command names must be a single word");
    }
    return new CommandBuilder(emptyDefinition(words[0].toLowerCase()), words[0].toLowerCase());
  }

  aliases(...aliases: string[]): this {
    this.definition.aliases.push(...aliases);
    return this;
  }

  description(description: string): this {
    this.definition.description = description;
    return this;
  }

  usage(usage: string): this {
    this.definition.usage = usage;
    return this;
  }

  permission(permission: string): this {
    this.definition.permission = permission;
    return this;
  }

  playerOnly(playerOnly = true): this {
    this.definition.playerOnly = playerOnly;
    return this;
  }

  hidden(hidden = true): this {
    this.definition.hidden = hidden;
    return this;
  }

  argument(name: string, type: string, options: ArgumentOptions = {}): this {
    this.definition.arguments.push(argumentSpec(name, type, options));
    return this;
  }

  flag(name: string, options: FlagOptions = {}): this {
    this.definition.flags.push(flagSpec(name, options));
    return this;
  }

  cooldown(
    duration: CooldownDeclaration["duration"],
    options: Omit<CooldownDeclaration, "duration"> = {},
  ): this {
    this.definition.cooldown = { duration, ...options };
    return this;
  }

  executes(executor: CompiledExecutor): this {
    if (this.definition.executor) {
      throw new ProcessingError(this.rootName, `'${this.definition.name}' already has a handler`);
    }
    this.definition.executor = executor;
    return this;
  }

  /** Declares a subcommand; a multi-word path creates the intermediate levels. */
  sub(path: string, configure: (sub: CommandBuilder) => unknown): this {
    const words = splitPath(path);
    if (words.length === 0) {
      throw new ProcessingError(this.rootName, "subcommand path must not be empty");
    }
    configure(new CommandBuilder(definitionAt(this.definition, words), this.rootName));
    return this;
  }

  build(): CommandDefinition {
    return cloneDefinition(this.definition);
  }
}

function cloneDefinition(definition: CommandDefinition): CommandDefinition {
  return {
    ...definition,
    aliases: [...definition.aliases],
    arguments: definition.arguments.map((spec) => ({ ...spec })),
    flags: definition.flags.map((spec) => ({ ...spec })),
    cooldown: definition.cooldown ? { ...definition.cooldown } : undefined,
    subcommands: definition.subcommands.map(cloneDefinition),
  };
}

export function command(name: string): CommandBuilder {
  return CommandBuilder.create(name);
}
