import { componentLogger, type Logger } from "../../logger";
import type { CommandOwner } from "../spec";
import type { CommandNode, RootNode } from "./nodes";

type GraphSnapshot = {
  readonly roots: ReadonlyMap<string, RootNode>;
  readonly aliases: ReadonlyMap<string, string>;
  readonly owners: ReadonlyMap<string, ReadonlySet<string>>;
};

export type ResolvedCommand = {
  root: RootNode;
  node: CommandNode;
  /** Nodes from the root to `node`, inclusive. */
  nodes: CommandNode[];
  /** Canonical names from the root to `node`. */
  path: string[];
  /** Tokens after the deepest matched node. */
  remaining: string[];
};

const EMPTY_SNAPSHOT: GraphSnapshot = {
  roots: new Map(),
  aliases: new Map(),
  owners: new Map(),
};

function canonical(value: string): string {
  return value.trim().toLowerCase();
}

type MutableSnapshot = {
  roots: Map<string, RootNode>;
  aliases: Map<string, string>;
  owners: Map<string, Set<string>>;
};

function copy(snapshot: GraphSnapshot): MutableSnapshot {
  const owners = new Map<string, Set<string>>();
  for (const [owner, names] of snapshot.owners) {
    owners.set(owner, new Set(names));
  }
  return {
    roots: new Map(snapshot.roots),
    aliases: new Map(snapshot.aliases),
    owners,
  };
}

function detach(state: MutableSnapshot, name: string): RootNode | undefined {
  const root = state.roots.get(name);
  if (!root) {
    return undefined;
  }
  state.roots.delete(name);
  for (const [alias, target] of state.aliases) {
    if (target === name) {
      state.aliases.delete(alias);
    }
  }
  const owned = state.owners.get(root.owner.name);
  if (owned) {
    owned.delete(name);
    if (owned.size === 0) {
      state.owners.delete(root.owner.name);
    }
  }
  return root;
}

/**
 * Registry of root commands with alias and owner indices.
 *
 * Writers build a new snapshot and swap it in one step, so readers never observe a
 * half-applied registration and never wait on a writer.
 */
export class CommandGraph {
  private snapshot: GraphSnapshot = EMPTY_SNAPSHOT;

  constructor(private readonly log: Logger = componentLogger("command-graph")) {}

  register(root: RootNode): void {
    const state = copy(this.snapshot);
    const previous = detach(state, root.name);
    if (previous && previous.owner.name !== root.owner.name) {
      this.log.warn(
        { command: root.name, owner: root.owner.name, previousOwner: previous.owner.name },
        "Command registered by another owner; replacing it",
      );
    }

    state.roots.set(root.name, root);
    for (const alias of root.aliases) {
      if (state.roots.has(alias)) {
        this.log.warn(
          { command: root.name, alias },
          "Alias shadows a registered command name; ignoring alias",
        );
        continue;
      }
      const existing = state.aliases.get(alias);
      if (existing && existing !== root.name) {
        this.log.warn(
          { command: root.name, alias, previousCommand: existing },
          "Alias already points at another command; reassigning",
        );
      }
      state.aliases.set(alias, root.name);
    }
    // A primary name always wins over an alias of the same spelling.
    state.aliases.delete(root.name);

    let owned = state.owners.get(root.owner.name);
    if (!owned) {
      owned = new Set();
      state.owners.set(root.owner.name, owned);
    }
    owned.add(root.name);

    this.snapshot = state;
    this.log.debug({ command: root.name, owner: root.owner.name }, "Command registered");
  }

  /** Removes a root by primary name or alias. */
  unregister(nameOrAlias: string): RootNode | undefined {
    const name = this.primaryName(nameOrAlias);
    if (!name) {
      return undefined;
    }
    const state = copy(this.snapshot);
    const removed = detach(state, name);
    this.snapshot = state;
    if (removed) {
      this.log.debug({ command: name, owner: removed.owner.name }, "Command unregistered");
    }
    return removed;
  }

  unregisterAll(owner: CommandOwner): RootNode[] {
    const names = this.snapshot.owners.get(owner.name);
    if (!names || names.size === 0) {
      return [];
    }
    const state = copy(this.snapshot);
    const removed: RootNode[] = [];
    for (const name of names) {
      const root = detach(state, name);
      if (root) {
        removed.push(root);
      }
    }
    this.snapshot = state;
    this.log.debug({ owner: owner.name, count: removed.length }, "Owner commands unregistered");
    return removed;
  }

  getRoot(nameOrAlias: string): RootNode | undefined {
    const { roots, aliases } = this.snapshot;
    const key = canonical(nameOrAlias);
    const direct = roots.get(key);
    if (direct) {
      return direct;
    }
    const target = aliases.get(key);
    return target ? roots.get(target) : undefined;
  }

  contains(nameOrAlias: string): boolean {
    return this.getRoot(nameOrAlias) !== undefined;
  }

  /**
   * Longest-prefix walk: the first token names the root, each following token that
   * names a child descends one level. Stops at the first token that is not a child.
   */
  resolve(tokens: readonly string[]): ResolvedCommand | undefined {
    const [label, ...rest] = tokens;
    if (label === undefined) {
      return undefined;
    }
    const root = this.getRoot(label);
    if (!root) {
      return undefined;
    }
    let node: CommandNode = root;
    const nodes: CommandNode[] = [root];
    const path = [root.name];
    let index = 0;
    while (index < rest.length) {
      const child = node.child(rest[index]);
      if (!child) {
        break;
      }
      node = child;
      nodes.push(child);
      path.push(child.name);
      index += 1;
    }
    return { root, node, nodes, path, remaining: rest.slice(index) };
  }

  /** Current aliases indexed for a root, which may differ from the node's own list. */
  aliasesOf(nameOrAlias: string): string[] {
    const name = this.primaryName(nameOrAlias);
    if (!name) {
      return [];
    }
    const result: string[] = [];
    for (const [alias, target] of this.snapshot.aliases) {
      if (target === name) {
        result.push(alias);
      }
    }
    return result.toSorted();
  }

  roots(): RootNode[] {
    return [...this.snapshot.roots.values()];
  }

  rootsOf(owner: CommandOwner): RootNode[] {
    const names = this.snapshot.owners.get(owner.name) ?? new Set<string>();
    const result: RootNode[] = [];
    for (const name of names) {
      const root = this.snapshot.roots.get(name);
      if (root) {
        result.push(root);
      }
    }
    return result;
  }

  /** Names of every registered root and alias. */
  labels(): string[] {
    return [...this.snapshot.roots.keys(), ...this.snapshot.aliases.keys()];
  }

  get size(): number {
    return this.snapshot.roots.size;
  }

  clear(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  private primaryName(nameOrAlias: string): string | undefined {
    const key = canonical(nameOrAlias);
    if (this.snapshot.roots.has(key)) {
      return key;
    }
    return this.snapshot.aliases.get(key);
  }
}
