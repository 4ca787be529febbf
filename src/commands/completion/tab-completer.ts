import type { CommandSender, HostDirectory } from "../../host/types";
import { componentLogger, type Logger } from "../../logger";
import { FlagParser, isNegativeNumber } from "../parser/flag-parser";
import type { ArgumentTypeRegistry } from "../parser/type-registry";
import type { CommandGraph } from "../registry/graph";
import type { CommandNode, RootNode } from "../registry/nodes";
import type { CompletionCache } from "./cache";

export type TabCompleterOptions = {
  directory: HostDirectory;
  limit?: number;
  debug?: boolean;
  slowCompletionMs?: number;
  logger?: Logger;
};

export const DEFAULT_COMPLETION_LIMIT = 50;

function compareIgnoreCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/** True when the last completed token is a value-carrying flag with no value yet. */
function awaitsFlagValue(node: CommandNode, typed: readonly string[]): boolean {
  const previous = typed.at(-1);
  if (!previous || !previous.startsWith("-") || isNegativeNumber(previous)) {
    return false;
  }
  if (typed.slice(0, -1).includes("--")) {
    return false;
  }
  if (previous.startsWith("--")) {
    const name = previous.slice(2).toLowerCase();
    return node.flagSpecs.some((flag) => flag.hasValue && flag.name.toLowerCase() === name);
  }
  const chars = previous.slice(1).toLowerCase();
  for (let i = 0; i < chars.length; i += 1) {
    const flag = node.flagSpecs.find((spec) => spec.short?.toLowerCase() === chars.charAt(i));
    if (flag?.hasValue) {
      return i === chars.length - 1;
    }
  }
  return false;
}

export class TabCompleter {
  private readonly directory: HostDirectory;
  private readonly limit: number;
  private readonly debug: boolean;
  private readonly slowCompletionMs: number;
  private readonly log: Logger;

  constructor(
    private readonly graph: CommandGraph,
    private readonly types: ArgumentTypeRegistry,
    private readonly cache: CompletionCache,
    options: TabCompleterOptions,
  ) {
    this.directory = options.directory;
    this.limit = options.limit ?? DEFAULT_COMPLETION_LIMIT;
    this.debug = options.debug ?? false;
    this.slowCompletionMs = options.slowCompletionMs ?? 5;
    this.log = options.logger ?? componentLogger("completion");
  }

  /**
   * Suggestions for the last entry of `args`, which is the token being typed.
   * Deduplicated, prefix-filtered, sorted case-insensitively and capped.
   */
  complete(sender: CommandSender, label: string, args: readonly string[]): string[] {
    if (args.length === 0) {
      return [];
    }
    const startedAt = performance.now();
    const resolved = this.graph.resolve([label, ...args.slice(0, -1)]);
    if (!resolved || !resolved.nodes.every((node) => node.canUse(sender))) {
      return [];
    }

    const node = resolved.node;
    if (awaitsFlagValue(node, resolved.remaining)) {
      return [];
    }
    const partial = (args.at(-1) ?? "").toLowerCase();
    const candidates: string[] = [];

    if (partial.startsWith("--")) {
      candidates.push(...this.longFlags(node));
    } else if (partial.startsWith("-") && !isNegativeNumber(partial)) {
      candidates.push(...this.shortFlags(node));
    } else {
      candidates.push(...this.subcommands(sender, node));
      if (node.isExecutable && node.argumentSpecs.length > 0) {
        candidates.push(
          ...this.argumentSuggestions(sender, resolved.root, node, resolved.remaining, partial),
        );
      }
      if (node.hasChildren) {
        candidates.push("help");
      }
    }

    const result = this.finish(candidates, partial);
    this.reportSlow(startedAt, label, args);
    return result;
  }

  /** Root names and aliases visible to the sender. */
  completeLabel(sender: CommandSender, partial: string): string[] {
    const candidates: string[] = [];
    for (const root of this.graph.roots()) {
      if (root.hidden || !root.canUse(sender)) {
        continue;
      }
      candidates.push(root.name, ...this.graph.aliasesOf(root.name));
    }
    return this.finish(candidates, partial.toLowerCase());
  }

  private finish(candidates: readonly string[], partial: string): string[] {
    return [...new Set(candidates)]
      .filter((candidate) => candidate.toLowerCase().startsWith(partial))
      .toSorted(compareIgnoreCase)
      .slice(0, this.limit);
  }

  private subcommands(sender: CommandSender, node: CommandNode): string[] {
    const result: string[] = [];
    for (const child of node.visibleChildren(sender)) {
      result.push(child.name, ...child.aliases);
    }
    return result;
  }

  private argumentSuggestions(
    sender: CommandSender,
    root: RootNode,
    node: CommandNode,
    typed: readonly string[],
    partial: string,
  ): readonly string[] {
    const { remaining } = new FlagParser(node.flagSpecs).parse(typed);
    const position = remaining.length;
    const spec = node.argumentSpecs[position];
    if (!spec) {
      return [];
    }
    const type = this.types.getForOwner(root.owner, spec.type);
    if (!type) {
      return [];
    }
    return this.cache.getOrCompute(node.id, position, spec.type, partial, (truncated) => {
      try {
        return type.suggest({ sender, directory: this.directory }, truncated);
      } catch (err) {
        this.log.debug({ err, argument: spec.name, type: spec.type }, "Argument suggestion failed");
        return [];
      }
    });
  }

  private longFlags(node: CommandNode): string[] {
    return ["--help", ...node.flagSpecs.map((flag) => `--${flag.name.toLowerCase()}`)];
  }

  private shortFlags(node: CommandNode): string[] {
    const result = ["-h"];
    for (const flag of node.flagSpecs) {
      if (flag.short) {
        result.push(`-${flag.short.toLowerCase()}`);
      }
    }
    return result;
  }

  private reportSlow(startedAt: number, label: string, args: readonly string[]): void {
    if (!this.debug) {
      return;
    }
    const elapsedMs = performance.now() - startedAt;
    if (elapsedMs > this.slowCompletionMs) {
      this.log.warn({ command: label, args, elapsedMs }, "Slow tab completion");
    }
  }
}
