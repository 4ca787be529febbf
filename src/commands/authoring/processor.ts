import { componentLogger, type Logger } from "../../logger";
import { parseDurationMs } from "../cooldown/duration";
import { ProcessingError } from "../errors";
import type { ArgumentType } from "../parser/argument-type";
import type { ArgumentTypeRegistry } from "../parser/type-registry";
import { enumType } from "../parser/types/enum";
import {
  assertArgumentTypes,
  rootNode,
  subNode,
  type CooldownSpec,
  type RootNode,
  type RootNodeBuilder,
  type SubNode,
  type SubNodeBuilder,
} from "../registry/nodes";
import { argumentSpec, flagSpec, type CommandOwner } from "../spec";
import {
  assignExecutor,
  definitionAt,
  emptyDefinition,
  splitPath,
  type CommandDefinition,
  type CooldownDeclaration,
} from "./definition";
import { compileInvocation } from "./injector";
import { getCommandMetadata, type ParameterDeclaration } from "./metadata";

const ROOT_PATHS = new Set(["", "default"]);

function inferArgumentType(parameter: Extract<ParameterDeclaration, { kind: "arg" }>): string {
  if (parameter.type) {
    return parameter.type;
  }
  if (parameter.greedy) {
    return "greedyString";
  }
  switch (parameter.valueType) {
    case "integer":
      return "integer";
    case "number":
      return "double";
    case "boolean":
      return "boolean";
    default:
      return "string";
  }
}

/**
 * Compiles command declarations into node trees. Declarations are validated here,
 * once; a malformed declaration raises a {@link ProcessingError}.
 */
export class CommandProcessor {
  constructor(
    private readonly types: ArgumentTypeRegistry,
    private readonly log: Logger = componentLogger("command-processor"),
  ) {}

  /**
   * Reads the declaration attached to `handler` and compiles it. Enum parameters
   * become owner-scoped types once the whole tree has compiled.
   */
  process(owner: CommandOwner, handler: object): RootNode {
    const enumTypes = new Map<string, ArgumentType>();
    const root = this.guard(owner, getCommandMetadata(handler)?.name ?? "<unknown>", () =>
      this.build(owner, this.describe(handler, enumTypes), enumTypes),
    );
    for (const [name, type] of enumTypes) {
      this.types.registerForOwner(owner, name, type);
    }
    return root;
  }

  /** Compiles a fluent or hand-written definition. */
  compile(owner: CommandOwner, definition: CommandDefinition): RootNode {
    return this.guard(owner, definition.name, () => this.build(owner, definition));
  }

  /** Turns reflective metadata into a definition with pre-bound executors. */
  private describe(handler: object, enumTypes: Map<string, ArgumentType>): CommandDefinition {
    const declaration = getCommandMetadata(handler);
    if (!declaration) {
      throw new ProcessingError(
        handler.constructor.name || "<anonymous>",
        "handler has no command declaration",
      );
    }

    const root = emptyDefinition(declaration.name.trim().toLowerCase());
    root.aliases.push(...(declaration.aliases ?? []));
    root.description = declaration.description;
    root.usage = declaration.usage;
    root.permission = declaration.permission;
    root.playerOnly = declaration.playerOnly;
    root.hidden = declaration.hidden;

    for (const [methodName, handlerDeclaration] of Object.entries(declaration.handlers)) {
      const method: unknown = Reflect.get(handler, methodName);
      if (typeof method !== "function") {
        throw new ProcessingError(root.name, `handler method '${methodName}' does not exist`);
      }
      const params = handlerDeclaration.params ?? [];
      if (method.length > params.length) {
        throw new ProcessingError(
          root.name,
          `method '${methodName}' takes ${method.length} parameters but declares ${params.length}`,
        );
      }

      const path = (handlerDeclaration.path ?? methodName).trim().toLowerCase();
      const target = ROOT_PATHS.has(path) ? root : definitionAt(root, splitPath(path));
      if (target !== root) {
        target.aliases.push(...(handlerDeclaration.aliases ?? []));
        target.permission = handlerDeclaration.permission ?? target.permission;
        target.hidden = handlerDeclaration.hidden ?? target.hidden;
      }
      target.description = handlerDeclaration.description ?? target.description;
      target.usage = handlerDeclaration.usage ?? target.usage;
      target.playerOnly = handlerDeclaration.playerOnly ?? target.playerOnly;
      target.cooldown = handlerDeclaration.cooldown ?? target.cooldown;

      for (const [index, parameter] of params.entries()) {
        this.declareParameter(root.name, path, methodName, index, parameter, target, enumTypes);
      }
      assignExecutor(root, target, compileInvocation(method, handler, params), path);
    }
    return root;
  }

  private declareParameter(
    command: string,
    path: string,
    methodName: string,
    index: number,
    parameter: ParameterDeclaration,
    target: CommandDefinition,
    enumTypes: Map<string, ArgumentType>,
  ): void {
    if (parameter.kind === "context" || parameter.kind === "sender") {
      return;
    }
    if (!parameter.name?.trim()) {
      throw new ProcessingError(
        command,
        `parameter ${index} of '${methodName}' is missing its ${parameter.kind} name`,
      );
    }
    if (parameter.kind === "flag") {
      target.flags.push(
        flagSpec(parameter.name, {
          short: parameter.short,
          hasValue: (parameter.valueType ?? "boolean") !== "boolean",
          defaultValue: parameter.defaultValue,
          description: parameter.description,
        }),
      );
      return;
    }

    let type = inferArgumentType(parameter);
    if (!parameter.type && (parameter.valueType === "enum" || parameter.enumValues)) {
      const values = parameter.enumValues ?? [];
      if (values.length === 0) {
        throw new ProcessingError(
          command,
          `enum parameter '${parameter.name}' of '${methodName}' declares no values`,
        );
      }
      type = [command, ...splitPath(path), parameter.name].join(".").toLowerCase();
      enumTypes.set(type, enumType(type, values));
    }
    target.arguments.push(
      argumentSpec(parameter.name, type, {
        optional: parameter.optional,
        defaultValue: parameter.defaultValue,
        description: parameter.description,
      }),
    );
  }

  private guard(owner: CommandOwner, command: string, work: () => RootNode): RootNode {
    try {
      const root = work();
      this.log.debug({ command: root.name, owner: owner.name }, "Command compiled");
      return root;
    } catch (error) {
      const failure =
        error instanceof ProcessingError
          ? error
          : new ProcessingError(command, error instanceof Error ? error.message : String(error), {
              cause: error,
            });
      this.log.error({ err: failure, command, owner: owner.name }, "Command processing failed");
      throw failure;
    }
  }

  private build(
    owner: CommandOwner,
    definition: CommandDefinition,
    enumTypes: ReadonlyMap<string, ArgumentType> = new Map(),
  ): RootNode {
    const builder = rootNode(definition.name, owner);
    this.fill(owner, definition.name, definition, builder);
    const root = builder.build();
    assertArgumentTypes(
      root,
      (name) => enumTypes.get(name.trim().toLowerCase()) ?? this.types.getForOwner(owner, name),
    );
    return root;
  }

  private buildSub(owner: CommandOwner, command: string, definition: CommandDefinition): SubNode {
    const builder = subNode(definition.name);
    this.fill(owner, command, definition, builder);
    return builder.build();
  }

  private fill(
    owner: CommandOwner,
    command: string,
    definition: CommandDefinition,
    builder: RootNodeBuilder | SubNodeBuilder,
  ): void {
    if (!definition.executor && definition.subcommands.length === 0) {
      throw new ProcessingError(command, `'${definition.name}' has no handler and no subcommands`);
    }

    builder
      .aliases(...definition.aliases)
      .description(definition.description)
      .usage(definition.usage)
      .permission(definition.permission)
      .playerOnly(definition.playerOnly ?? false)
      .hidden(definition.hidden ?? false)
      .executor(definition.executor)
      .cooldown(this.cooldown(command, definition.cooldown));
    for (const spec of definition.arguments) {
      builder.argument(spec);
    }
    for (const spec of definition.flags) {
      builder.flag(spec);
    }
    for (const child of definition.subcommands) {
      builder.child(this.buildSub(owner, command, child));
    }
  }

  private cooldown(
    command: string,
    declaration: CooldownDeclaration | undefined,
  ): CooldownSpec | undefined {
    if (!declaration) {
      return undefined;
    }
    const durationMs = parseDurationMs(declaration.duration);
    if (durationMs === null) {
      throw new ProcessingError(command, `invalid cooldown duration '${declaration.duration}'`);
    }
    return {
      durationMs,
      bypassPermission: declaration.bypassPermission,
      messageKey: declaration.messageKey,
    };
  }
}
