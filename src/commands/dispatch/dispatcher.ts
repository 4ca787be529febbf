import type { CommandSender, HostDirectory } from "../../host/types";
import { componentLogger, type Logger } from "../../logger";
import { formatRemaining } from "../cooldown/duration";
import { cooldownKey, type CooldownStore } from "../cooldown/cooldown-store";
import {
  ArgumentParseError,
  CooldownActiveError,
  HandlerInvocationError,
  InvalidArgumentValueError,
  InvalidSenderError,
  MissingArgumentError,
  PermissionDeniedError,
  TooManyArgumentsError,
  UnknownArgumentTypeError,
} from "../errors";
import { createCommandContext } from "../execution/context";
import type { ParsedArgs } from "../execution/parsed-args";
import type { ArgumentParser } from "../parser/argument-parser";
import { FlagParser } from "../parser/flag-parser";
import type { CommandGraph, ResolvedCommand } from "../registry/graph";
import type { CommandNode, RootNode } from "../registry/nodes";
import { DEFAULT_HELP_PAGE_SIZE, parseHelpPage, renderHelp } from "./help";
import type { MessageFacade, MessagePlaceholders } from "./messages";

export type DispatchResult =
  | { status: "success"; path: string[] }
  | { status: "failed"; path: string[] }
  | { status: "not_found"; label: string }
  | { status: "unknown_subcommand"; path: string[]; subcommand: string }
  | { status: "help"; path: string[]; page: number }
  | { status: "usage"; path: string[] }
  | { status: "denied"; path: string[]; error: PermissionDeniedError }
  | { status: "invalid_sender"; path: string[]; error: InvalidSenderError }
  | { status: "cooldown"; path: string[]; error: CooldownActiveError }
  | { status: "parse_error"; path: string[]; error: ArgumentParseError }
  | { status: "error"; path: string[]; error: HandlerInvocationError };

export type DispatchStatus = DispatchResult["status"];

export type CommandDispatcherOptions = {
  directory: HostDirectory;
  helpPageSize?: number;
  debug?: boolean;
  slowDispatchMs?: number;
  logger?: Logger;
};

const HELP_FLAGS = new Set(["--help", "-h", "-?"]);

function hasHelpFlag(tokens: readonly string[]): boolean {
  for (const token of tokens) {
    if (token === "--") {
      return false;
    }
    if (HELP_FLAGS.has(token.toLowerCase())) {
      return true;
    }
  }
  return false;
}

/** Display path using the label the sender typed for the root. */
function displayPath(label: string, path: readonly string[]): string {
  return [label.toLowerCase(), ...path.slice(1)].join(" ");
}

/**
 * Runs one invocation: resolve, authorize, rate-limit, parse, invoke, report.
 * Every outcome is reported to the sender and returned; the promise never rejects.
 */
export class CommandDispatcher {
  private readonly directory: HostDirectory;
  private readonly helpPageSize: number;
  private readonly debug: boolean;
  private readonly slowDispatchMs: number;
  private readonly log: Logger;

  constructor(
    private readonly graph: CommandGraph,
    private readonly parser: ArgumentParser,
    private readonly cooldowns: CooldownStore,
    private readonly messages: MessageFacade,
    options: CommandDispatcherOptions,
  ) {
    this.directory = options.directory;
    this.helpPageSize = options.helpPageSize ?? DEFAULT_HELP_PAGE_SIZE;
    this.debug = options.debug ?? false;
    this.slowDispatchMs = options.slowDispatchMs ?? 50;
    this.log = options.logger ?? componentLogger("dispatcher");
  }

  async dispatch(
    sender: CommandSender,
    label: string,
    args: readonly string[],
  ): Promise<DispatchResult> {
    const startedAt = performance.now();
    try {
      return await this.run(sender, label, args);
    } finally {
      const elapsedMs = performance.now() - startedAt;
      if (this.debug && elapsedMs > this.slowDispatchMs) {
        this.log.warn({ command: label, elapsedMs }, "Slow command dispatch");
      }
    }
  }

  private async run(
    sender: CommandSender,
    label: string,
    args: readonly string[],
  ): Promise<DispatchResult> {
    const resolved = this.graph.resolve([label, ...args]);
    if (!resolved) {
      this.messages.send(sender, "commands.not-found", { command: label });
      return { status: "not_found", label };
    }

    const { root, node, path, remaining } = resolved;
    const shownPath = displayPath(label, path);
    const send = (key: string, placeholders?: MessagePlaceholders) =>
      this.messages.send(sender, key, placeholders, root.owner);

    const denied = resolved.nodes.find((entry) => !entry.canUse(sender));
    if (denied?.permission) {
      send("errors.no-permission", { permission: denied.permission });
      return { status: "denied", path, error: new PermissionDeniedError(denied.permission) };
    }

    if (resolved.nodes.some((entry) => entry.playerOnly) && sender.kind !== "player") {
      send("errors.player-only");
      return { status: "invalid_sender", path, error: new InvalidSenderError("player") };
    }

    if (node.hasChildren && remaining[0]?.toLowerCase() === "help") {
      return this.sendHelp(sender, root, node, path, shownPath, parseHelpPage(remaining[1]));
    }
    if (hasHelpFlag(remaining)) {
      return this.sendHelp(sender, root, node, path, shownPath, 1);
    }

    if (!node.isExecutable) {
      const [subcommand] = remaining;
      if (subcommand !== undefined && node.hasChildren) {
        send("commands.unknown-subcommand", { subcommand, command: shownPath });
        send("commands.help-hint", { command: shownPath });
        return { status: "unknown_subcommand", path, subcommand };
      }
      if (node.hasChildren) {
        return this.sendHelp(sender, root, node, path, shownPath, 1);
      }
      send("commands.usage", { usage: node.usage(shownPath) });
      return { status: "usage", path };
    }

    const cooldown = this.checkCooldown(sender, node, path);
    if (cooldown) {
      send(node.cooldown?.messageKey || "errors.cooldown", {
        remaining: formatRemaining(cooldown.remainingMs),
        command: shownPath,
      });
      return { status: "cooldown", path, error: cooldown };
    }

    return this.invoke(sender, label, resolved, shownPath);
  }

  private checkCooldown(
    sender: CommandSender,
    node: CommandNode,
    path: readonly string[],
  ): CooldownActiveError | undefined {
    const cooldown = node.cooldown;
    if (!cooldown || cooldown.durationMs <= 0 || sender.kind === "console") {
      return undefined;
    }
    if (cooldown.bypassPermission && sender.hasPermission(cooldown.bypassPermission)) {
      return undefined;
    }
    const key = cooldownKey(sender.id, path);
    const result = this.cooldowns.tryAcquire(key, cooldown.durationMs);
    return result.acquired ? undefined : new CooldownActiveError(key, result.remainingMs);
  }

  private async invoke(
    sender: CommandSender,
    label: string,
    resolved: ResolvedCommand,
    shownPath: string,
  ): Promise<DispatchResult> {
    const { root, node, path, remaining } = resolved;
    const executor = node.executor;
    if (!executor) {
      return { status: "usage", path };
    }

    const { flags, remaining: positional } = new FlagParser(node.flagSpecs).parse(remaining);
    let args: ParsedArgs;
    try {
      args = this.parser.parse(
        { sender, directory: this.directory, owner: root.owner },
        positional,
        node.argumentSpecs,
      );
    } catch (error) {
      if (error instanceof ArgumentParseError) {
        this.reportParseError(sender, root, node, shownPath, error);
        return { status: "parse_error", path, error };
      }
      return this.fail(sender, root, path, error);
    }

    const context = createCommandContext({
      sender,
      label,
      path,
      root,
      node,
      args,
      flags,
      services: { directory: this.directory, messages: this.messages },
    });

    try {
      const outcome = await executor(context);
      if (outcome === false) {
        this.messages.send(sender, "commands.usage", { usage: node.usage(shownPath) }, root.owner);
        return { status: "failed", path };
      }
      return { status: "success", path };
    } catch (error) {
      if (error instanceof InvalidSenderError) {
        this.messages.send(sender, `errors.${error.required}-only`, undefined, root.owner);
        return { status: "invalid_sender", path, error };
      }
      if (error instanceof PermissionDeniedError) {
        const placeholders = { permission: error.permission };
        this.messages.send(sender, "errors.no-permission", placeholders, root.owner);
        return { status: "denied", path, error };
      }
      return this.fail(sender, root, path, error);
    }
  }

  private fail(
    sender: CommandSender,
    root: RootNode,
    path: string[],
    error: unknown,
  ): DispatchResult {
    const command = path.join(" ");
    this.log.error(
      { err: error, command, owner: root.owner.name, sender: sender.name },
      "Command handler failed",
    );
    this.messages.send(sender, "errors.internal", undefined, root.owner);
    return { status: "error", path, error: new HandlerInvocationError(command, error) };
  }

  private reportParseError(
    sender: CommandSender,
    root: RootNode,
    node: CommandNode,
    shownPath: string,
    error: ArgumentParseError,
  ): void {
    const send = (key: string, placeholders?: MessagePlaceholders) =>
      this.messages.send(sender, key, placeholders, root.owner);

    if (error instanceof UnknownArgumentTypeError) {
      this.log.warn(
        { command: shownPath, argument: error.argument, type: error.typeName },
        "Unknown argument type",
      );
      send("errors.internal");
      return;
    }
    if (error instanceof MissingArgumentError) {
      send("errors.missing-argument", { argument: error.argument });
    } else if (error instanceof InvalidArgumentValueError) {
      send(`errors.${error.reason}`, {
        ...error.details,
        input: error.input,
        argument: error.argument,
      });
    } else if (error instanceof TooManyArgumentsError) {
      send("errors.too-many-arguments", { expected: error.expected, got: error.got });
    }
    send("commands.usage", { usage: node.usage(shownPath) });
  }

  private sendHelp(
    sender: CommandSender,
    root: RootNode,
    node: CommandNode,
    path: string[],
    shownPath: string,
    requestedPage: number,
  ): DispatchResult {
    const help = renderHelp(
      this.messages,
      root,
      node,
      sender,
      shownPath,
      requestedPage,
      this.helpPageSize,
    );
    for (const line of help.lines) {
      sender.sendMessage(line);
    }
    return { status: "help", path, page: help.page };
  }
}
