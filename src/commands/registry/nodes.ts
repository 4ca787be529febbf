import type { CommandSender } from "../../host/types";
import { ProcessingError } from "../errors";
import type { CommandContext } from "../execution/context";
import type { ArgumentType } from "../parser/argument-type";
import {
  RESERVED_FLAG_NAMES,
  isRequired,
  type ArgumentSpec,
  type CommandOwner,
  type FlagSpec,
} from "../spec";

/**
 * Pre-bound invocation target produced at registration. Returning `false`
 * reports the node's usage to the sender.
 */
export type CompiledExecutor = (
  context: CommandContext,
) => boolean | void | Promise<boolean | void>;

export type CooldownSpec = {
  durationMs: number;
  bypassPermission?: string;
  /** Message key sent while the cooldown is active. */
  messageKey?: string;
};

type NodeData = {
  name: string;
  aliases: readonly string[];
  description?: string;
  usage?: string;
  permission?: string;
  playerOnly: boolean;
  hidden: boolean;
  arguments: readonly ArgumentSpec[];
  flags: readonly FlagSpec[];
  children: readonly SubNode[];
  executor?: CompiledExecutor;
  cooldown?: CooldownSpec;
};

let nextNodeId = 1;

function canonical(value: string): string {
  return value.trim().toLowerCase();
}

function validateArguments(command: string, specs: readonly ArgumentSpec[]): void {
  const seen = new Set<string>();
  let optionalSeen = false;
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new ProcessingError(command, `argument '${spec.name}' is declared twice`);
    }
    seen.add(spec.name);
    if (!isRequired(spec)) {
      optionalSeen = true;
    } else if (optionalSeen) {
      throw new ProcessingError(
        command,
        `required argument '${spec.name}' follows an optional argument`,
      );
    }
  }
}

function validateFlags(command: string, specs: readonly FlagSpec[]): void {
  const names = new Set<string>();
  const shorts = new Set<string>();
  for (const spec of specs) {
    const name = spec.name.toLowerCase();
    if (RESERVED_FLAG_NAMES.includes(name) || names.has(name)) {
      throw new ProcessingError(command, `flag '--${name}' is reserved or declared twice`);
    }
    names.add(name);
    if (spec.short === undefined) {
      continue;
    }
    const short = spec.short.toLowerCase();
    if (short.length !== 1 || short === "h" || shorts.has(short)) {
      throw new ProcessingError(
        command,
        `short flag '-${spec.short}' must be one character, unique and not 'h'`,
      );
    }
    shorts.add(short);
  }
}

export abstract class CommandNode {
  /** Process-unique identity, used to key cached suggestions. */
  readonly id = nextNodeId++;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description?: string;
  readonly permission?: string;
  readonly playerOnly: boolean;
  readonly hidden: boolean;
  readonly argumentSpecs: readonly ArgumentSpec[];
  readonly flagSpecs: readonly FlagSpec[];
  readonly executor?: CompiledExecutor;
  readonly cooldown?: CooldownSpec;
  protected readonly explicitUsage?: string;
  private readonly childrenByName: ReadonlyMap<string, SubNode>;
  private readonly childAliases: ReadonlyMap<string, string>;

  protected constructor(data: NodeData) {
    validateArguments(data.name, data.arguments);
    validateFlags(data.name, data.flags);
    this.name = data.name;
    this.aliases = Object.freeze([...data.aliases]);
    this.description = data.description;
    this.permission = data.permission;
    this.playerOnly = data.playerOnly;
    this.hidden = data.hidden;
    this.argumentSpecs = Object.freeze([...data.arguments]);
    this.flagSpecs = Object.freeze([...data.flags]);
    this.executor = data.executor;
    this.cooldown = data.cooldown ? Object.freeze({ ...data.cooldown }) : undefined;
    this.explicitUsage = data.usage;

    const children = new Map<string, SubNode>();
    const childAliases = new Map<string, string>();
    for (const child of data.children) {
      for (const key of [child.name, ...child.aliases]) {
        if (children.has(key) || childAliases.has(key)) {
          throw new ProcessingError(
            data.name,
            `subcommand name or alias '${key}' is used more than once`,
          );
        }
        if (key === child.name) {
          children.set(key, child);
        } else {
          childAliases.set(key, child.name);
        }
      }
    }
    this.childrenByName = children;
    this.childAliases = childAliases;
  }

  get isExecutable(): boolean {
    return this.executor !== undefined;
  }

  get hasChildren(): boolean {
    return this.childrenByName.size > 0;
  }

  get children(): readonly SubNode[] {
    return [...this.childrenByName.values()];
  }

  child(nameOrAlias: string): SubNode | undefined {
    const key = canonical(nameOrAlias);
    const direct = this.childrenByName.get(key);
    if (direct) {
      return direct;
    }
    const target = this.childAliases.get(key);
    return target ? this.childrenByName.get(target) : undefined;
  }

  canUse(sender: CommandSender): boolean {
    return !this.permission || sender.hasPermission(this.permission);
  }

  /** Children the sender may see, in declaration order. */
  visibleChildren(sender: CommandSender): SubNode[] {
    return this.children.filter((child) => !child.hidden && child.canUse(sender));
  }

  /** `/label <required> [optional] [optional=default] [flags]`, unless a usage was declared. */
  usage(label: string): string {
    if (this.explicitUsage) {
      return this.explicitUsage.replaceAll("{label}", label);
    }
    const parts = [`/${label}`];
    for (const spec of this.argumentSpecs) {
      if (isRequired(spec)) {
        parts.push(`<${spec.name}>`);
      } else if (spec.defaultValue !== undefined) {
        parts.push(`[${spec.name}=${spec.defaultValue}]`);
      } else {
        parts.push(`[${spec.name}]`);
      }
    }
    if (this.flagSpecs.length > 0) {
      parts.push("[flags]");
    }
    if (this.argumentSpecs.length === 0 && !this.isExecutable && this.hasChildren) {
      parts.push("<subcommand>");
    }
    return parts.join(" ");
  }
}

export class SubNode extends CommandNode {
  constructor(data: NodeData) {
    super(data);
  }
}

export class RootNode extends CommandNode {
  readonly owner: CommandOwner;

  constructor(data: NodeData & { owner: CommandOwner }) {
    super(data);
    this.owner = data.owner;
  }

  /** Same tree under a different alias set. */
  withAliases(aliases: readonly string[]): RootNode {
    return new RootNode({
      ...this.toData(),
      aliases: normalizeAliases(this.name, aliases),
      owner: this.owner,
    });
  }

  private toData(): NodeData {
    return {
      name: this.name,
      aliases: this.aliases,
      description: this.description,
      usage: this.explicitUsage,
      permission: this.permission,
      playerOnly: this.playerOnly,
      hidden: this.hidden,
      arguments: this.argumentSpecs,
      flags: this.flagSpecs,
      children: this.children,
      executor: this.executor,
      cooldown: this.cooldown,
    };
  }
}

/**
 * Checks that every argument type in the tree resolves and that a greedy
 * argument is the last of its node.
 */
export function assertArgumentTypes(
  root: RootNode,
  resolve: (typeName: string) => ArgumentType | undefined,
): void {
  const pending: CommandNode[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    const specs = node.argumentSpecs;
    specs.forEach((spec, index) => {
      const type = resolve(spec.type);
      if (!type) {
        throw new ProcessingError(
          root.name,
          `argument '${spec.name}' has unknown type '${spec.type}'`,
        );
      }
      if (type.greedy && index !== specs.length - 1) {
        throw new ProcessingError(
          root.name,
          `greedy argument '${spec.name}' must be the last argument`,
        );
      }
    });
    pending.push(...node.children);
  }
}

function normalizeAliases(name: string, aliases: readonly string[]): string[] {
  const result: string[] = [];
  for (const alias of aliases) {
    const key = canonical(alias);
    if (key && key !== name && !result.includes(key)) {
      result.push(key);
    }
  }
  return result;
}

abstract class NodeBuilder<Self extends NodeBuilder<Self>> {
  protected readonly nodeName: string;
  protected readonly nodeAliases: string[] = [];
  protected nodeDescription?: string;
  protected nodeUsage?: string;
  protected nodePermission?: string;
  protected nodePlayerOnly = false;
  protected nodeHidden = false;
  protected readonly nodeArguments: ArgumentSpec[] = [];
  protected readonly nodeFlags: FlagSpec[] = [];
  protected readonly nodeChildren: SubNode[] = [];
  protected nodeExecutor?: CompiledExecutor;
  protected nodeCooldown?: CooldownSpec;

  constructor(name: string) {
    const key = canonical(name);
    if (!key || /\s/.test(key)) {
      throw new ProcessingError(name, "command names must be a single non-empty word");
    }
    this.nodeName = key;
  }

  protected abstract self(): Self;

  aliases(...aliases: string[]): Self {
    this.nodeAliases.push(...aliases);
    return this.self();
  }

  description(description: string | undefined): Self {
    this.nodeDescription = description;
    return this.self();
  }

  usage(usage: string | undefined): Self {
    this.nodeUsage = usage;
    return this.self();
  }

  permission(permission: string | undefined): Self {
    this.nodePermission = permission || undefined;
    return this.self();
  }

  playerOnly(playerOnly = true): Self {
    this.nodePlayerOnly = playerOnly;
    return this.self();
  }

  hidden(hidden = true): Self {
    this.nodeHidden = hidden;
    return this.self();
  }

  argument(spec: ArgumentSpec): Self {
    this.nodeArguments.push({ ...spec });
    return this.self();
  }

  flag(spec: FlagSpec): Self {
    this.nodeFlags.push({ ...spec, name: canonical(spec.name) });
    return this.self();
  }

  child(child: SubNode): Self {
    this.nodeChildren.push(child);
    return this.self();
  }

  executor(executor: CompiledExecutor | undefined): Self {
    this.nodeExecutor = executor;
    return this.self();
  }

  cooldown(cooldown: CooldownSpec | undefined): Self {
    this.nodeCooldown = cooldown;
    return this.self();
  }

  protected data(): NodeData {
    return {
      name: this.nodeName,
      aliases: normalizeAliases(this.nodeName, this.nodeAliases),
      description: this.nodeDescription,
      usage: this.nodeUsage,
      permission: this.nodePermission,
      playerOnly: this.nodePlayerOnly,
      hidden: this.nodeHidden,
      arguments: this.nodeArguments,
      flags: this.nodeFlags,
      children: this.nodeChildren,
      executor: this.nodeExecutor,
      cooldown: this.nodeCooldown,
    };
  }
}

export class SubNodeBuilder extends NodeBuilder<SubNodeBuilder> {
  protected self(): SubNodeBuilder {
    return this;
  }

  build(): SubNode {
    return new SubNode(this.data());
  }
}

export class RootNodeBuilder extends NodeBuilder<RootNodeBuilder> {
  constructor(
    name: string,
    private readonly owner: CommandOwner,
  ) {
    super(name);
  }

  protected self(): RootNodeBuilder {
    return this;
  }

  build(): RootNode {
    return new RootNode({ ...this.data(), owner: this.owner });
  }
}

export function rootNode(name: string, owner: CommandOwner): RootNodeBuilder {
  return new RootNodeBuilder(name, owner);
}

export function subNode(name: string): SubNodeBuilder {
  return new SubNodeBuilder(name);
}
