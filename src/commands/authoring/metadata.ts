import type { SenderRequirement } from "../errors";
import type { CooldownDeclaration } from "./definition";

export type ArgumentValueType = "string" | "integer" | "number" | "boolean" | "enum";
export type FlagValueType = "boolean" | "string" | "integer" | "number";

export type ParameterDeclaration =
  | { kind: "context" }
  | { kind: "sender"; require?: "any" | SenderRequirement }
  | {
      kind: "arg";
      name: string;
      /** Declared value type, used to infer the argument type. */
      valueType?: ArgumentValueType;
      /** Explicit argument type name; overrides inference. */
      type?: string;
      optional?: boolean;
      defaultValue?: string;
      greedy?: boolean;
      enumValues?: readonly string[];
      description?: string;
    }
  | {
      kind: "flag";
      name: string;
      short?: string;
      valueType?: FlagValueType;
      defaultValue?: string;
      description?: string;
    };

export type HandlerDeclaration = {
  /**
   * Subcommand path below the root, defaulting to the method name.
   * `""` and `"default"` mean the root itself.
   */
  path?: string;
  aliases?: readonly string[];
  description?: string;
  usage?: string;
  permission?: string;
  playerOnly?: boolean;
  hidden?: boolean;
  cooldown?: CooldownDeclaration;
  params?: readonly ParameterDeclaration[];
};

export type CommandDeclaration = {
  name: string;
  aliases?: readonly string[];
  description?: string;
  usage?: string;
  permission?: string;
  playerOnly?: boolean;
  hidden?: boolean;
  /** Handler declarations keyed by method name. */
  handlers: Readonly<Record<string, HandlerDeclaration>>;
  /** Messages registered for the owner alongside the command. */
  messages?: Readonly<Record<string, string>>;
};

const declarations = new WeakMap<object, CommandDeclaration>();

/**
 * Attaches a command declaration to a handler class or instance. The processor
 * reads it once at registration.
 */
export function describeCommand<T extends object>(target: T, declaration: CommandDeclaration): T {
  declarations.set(target, declaration);
  return target;
}

/** Declaration attached to `handler`, or to its class. */
export function getCommandMetadata(handler: object): CommandDeclaration | undefined {
  return declarations.get(handler) ?? declarations.get(handler.constructor);
}
