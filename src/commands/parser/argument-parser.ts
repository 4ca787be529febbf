import type { CommandSender, HostDirectory } from "../../host/types";
import { componentLogger, type Logger } from "../../logger";
import {
  ArgumentValueError,
  InvalidArgumentValueError,
  MissingArgumentError,
  TooManyArgumentsError,
  UnknownArgumentTypeError,
} from "../errors";
import { ParsedArgs } from "../execution/parsed-args";
import type { ArgumentSpec, CommandOwner } from "../spec";
import type { ArgumentType } from "./argument-type";
import type { ArgumentTypeRegistry } from "./type-registry";

export type ArgumentParseContext = {
  sender: CommandSender;
  directory: HostDirectory;
  owner?: CommandOwner;
};

export class ArgumentParser {
  constructor(
    private readonly types: ArgumentTypeRegistry,
    private readonly log: Logger = componentLogger("arguments"),
  ) {}

  resolveType(owner: CommandOwner | undefined, typeName: string): ArgumentType | undefined {
    return this.types.getForOwner(owner, typeName);
  }

  /** Binds positional tokens to `specs` in order, applying defaults and greedy joins. */
  parse(
    context: ArgumentParseContext,
    tokens: readonly string[],
    specs: readonly ArgumentSpec[],
  ): ParsedArgs {
    const values = new Map<string, unknown>();
    let cursor = 0;

    for (const spec of specs) {
      const type = this.resolveType(context.owner, spec.type);
      if (!type) {
        throw new UnknownArgumentTypeError(spec.name, spec.type);
      }

      if (cursor >= tokens.length) {
        if (spec.defaultValue !== undefined) {
          values.set(spec.name, this.parseValue(context, type, spec, spec.defaultValue));
        } else if (!spec.optional) {
          throw new MissingArgumentError(spec.name);
        }
        continue;
      }

      if (type.greedy) {
        values.set(spec.name, this.parseValue(context, type, spec, tokens.slice(cursor).join(" ")));
        cursor = tokens.length;
        continue;
      }

      values.set(spec.name, this.parseValue(context, type, spec, tokens[cursor]));
      cursor += 1;
    }

    if (cursor < tokens.length) {
      throw new TooManyArgumentsError(specs.length, tokens.length);
    }

    return new ParsedArgs(values, tokens);
  }

  /**
   * Suggestions for the argument under the cursor, which is the last token.
   * Never throws.
   */
  suggest(
    context: ArgumentParseContext,
    tokens: readonly string[],
    specs: readonly ArgumentSpec[],
  ): readonly string[] {
    const position = Math.max(0, tokens.length - 1);
    const spec = specs[position];
    if (!spec) {
      return [];
    }
    const type = this.resolveType(context.owner, spec.type);
    if (!type) {
      return [];
    }
    try {
      return type.suggest(context, tokens.at(-1) ?? "");
    } catch (err) {
      this.log.debug({ err, argument: spec.name, type: spec.type }, "Argument suggestion failed");
      return [];
    }
  }

  private parseValue(
    context: ArgumentParseContext,
    type: ArgumentType,
    spec: ArgumentSpec,
    input: string,
  ): unknown {
    try {
      return type.parse({ ...context, argument: spec.name }, input);
    } catch (error) {
      if (error instanceof ArgumentValueError) {
        throw new InvalidArgumentValueError(spec.name, input, error.reason, error.details, {
          cause: error,
        });
      }
      throw new InvalidArgumentValueError(spec.name, input, "invalid-value", {}, { cause: error });
    }
  }
}
