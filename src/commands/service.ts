import type { CommandSender, HostDirectory } from "../host/types";
import { EMPTY_DIRECTORY } from "../host/types";
import { componentLogger, type Logger } from "../logger";
import { resolveCommandsSettings, type CommandsSettings } from "../config/settings";
import { CommandBuilder } from "./authoring/builder";
import type { CommandDefinition } from "./authoring/definition";
import { getCommandMetadata } from "./authoring/metadata";
import { CommandProcessor } from "./authoring/processor";
import type { CommandBinder, CommandHandle } from "./binding/types";
import { CompletionCache } from "./completion/cache";
import { TabCompleter } from "./completion/tab-completer";
import { CooldownStore } from "./cooldown/cooldown-store";
import { CommandDispatcher, type DispatchResult } from "./dispatch/dispatcher";
import { MessageFacade } from "./dispatch/messages";
import { ProcessingError } from "./errors";
import { ArgumentParser } from "./parser/argument-parser";
import { tokenize, tokenizeForCompletion } from "./parser/tokenizer";
import { ArgumentTypeRegistry } from "./parser/type-registry";
import { CommandGraph } from "./registry/graph";
import { assertArgumentTypes, type RootNode } from "./registry/nodes";
import type { CommandOwner } from "./spec";

export type CommandRegistration = {
  owner: CommandOwner;
  rootName: string;
  aliases: readonly string[];
};

export type CommandSource = CommandBuilder | CommandDefinition | object;

export type CommandServiceOptions = {
  directory?: HostDirectory;
  settings?: CommandsSettings;
  binder?: CommandBinder;
  types?: ArgumentTypeRegistry;
  now?: () => number;
  logger?: Logger;
};

function isCommandDefinition(value: object): value is CommandDefinition {
  return (
    typeof Reflect.get(value, "name") === "string" &&
    Array.isArray(Reflect.get(value, "subcommands")) &&
    Array.isArray(Reflect.get(value, "arguments")) &&
    Array.isArray(Reflect.get(value, "flags"))
  );
}

function stripSlash(label: string): string {
  return label.startsWith("/") ? label.slice(1) : label;
}

/**
 * Owns the command subsystem: type registry, graph, processor, cooldowns,
 * completion cache, dispatcher and completer.
 */
export class CommandService {
  readonly types: ArgumentTypeRegistry;
  readonly graph: CommandGraph;
  readonly processor: CommandProcessor;
  readonly parser: ArgumentParser;
  readonly messages: MessageFacade;
  readonly cooldowns: CooldownStore;
  readonly completionCache: CompletionCache;
  readonly dispatcher: CommandDispatcher;
  readonly completer: TabCompleter;
  readonly settings: CommandsSettings;
  private readonly binder?: CommandBinder;
  private readonly handle: CommandHandle;
  private readonly log: Logger;

  constructor(options: CommandServiceOptions = {}) {
    const directory = options.directory ?? EMPTY_DIRECTORY;
    this.settings = options.settings ?? resolveCommandsSettings();
    const scoped = (component: string): Logger =>
      options.logger ? options.logger.child({ component }) : componentLogger(component);
    this.log = scoped("commands");
    this.binder = options.binder;

    this.types = options.types ?? ArgumentTypeRegistry.withBuiltins();
    this.graph = new CommandGraph(scoped("command-graph"));
    this.processor = new CommandProcessor(this.types, scoped("command-processor"));
    this.parser = new ArgumentParser(this.types, scoped("arguments"));
    this.messages = new MessageFacade(this.settings.messages, scoped("messages"));
    this.cooldowns = new CooldownStore({
      now: options.now,
      sweepIntervalMs: this.settings.cooldowns.sweepIntervalMs,
      logger: scoped("cooldowns"),
    });
    this.completionCache = new CompletionCache(this.settings.completion);
    this.dispatcher = new CommandDispatcher(
      this.graph,
      this.parser,
      this.cooldowns,
      this.messages,
      {
        directory,
        helpPageSize: this.settings.help.pageSize,
        debug: this.settings.debug,
        slowDispatchMs: this.settings.slowDispatchMs,
        logger: scoped("dispatcher"),
      },
    );
    this.completer = new TabCompleter(this.graph, this.types, this.completionCache, {
      directory,
      limit: this.settings.completion.limit,
      debug: this.settings.debug,
      slowCompletionMs: this.settings.slowCompletionMs,
      logger: scoped("completion"),
    });
    this.handle = {
      dispatch: (sender, label, args) => this.dispatch(sender, label, args),
      complete: (sender, label, args) => this.complete(sender, label, args),
    };
  }

  /** Compiles and registers a fluent builder, a definition or an annotated handler. */
  register(owner: CommandOwner, source: CommandSource): CommandRegistration {
    if (source instanceof CommandBuilder) {
      return this.registerRoot(this.processor.compile(owner, source.build()));
    }
    const declaration = getCommandMetadata(source);
    if (declaration) {
      const root = this.processor.process(owner, source);
      if (declaration.messages) {
        this.messages.registerMessages(owner, declaration.messages);
      }
      return this.registerRoot(root);
    }
    if (isCommandDefinition(source)) {
      return this.registerRoot(this.processor.compile(owner, source));
    }
    const error = new ProcessingError(
      source.constructor.name || "<anonymous>",
      "expected a command builder, a command definition or a described handler",
    );
    this.log.error({ err: error, owner: owner.name }, "Command processing failed");
    throw error;
  }

  /** Registers a prebuilt tree. Its argument types must resolve for the root's owner. */
  registerRoot(root: RootNode): CommandRegistration {
    try {
      assertArgumentTypes(root, (name) => this.types.getForOwner(root.owner, name));
    } catch (err) {
      this.log.error(
        { err, command: root.name, owner: root.owner.name },
        "Command processing failed",
      );
      throw err;
    }
    this.graph.register(root);
    this.completionCache.invalidate();
    const aliases = this.graph.aliasesOf(root.name);
    this.binder?.bind(root, aliases, this.handle);
    return { owner: root.owner, rootName: root.name, aliases };
  }

  unregister(nameOrAlias: string): boolean {
    const removed = this.graph.unregister(nameOrAlias);
    if (!removed) {
      return false;
    }
    this.binder?.unbind(removed);
    this.completionCache.invalidate();
    return true;
  }

  /** Removes every command of `owner`, or every command when no owner is given. */
  unregisterAll(owner?: CommandOwner): number {
    const removed = owner ? this.graph.unregisterAll(owner) : this.graph.roots();
    if (!owner) {
      this.graph.clear();
    } else {
      this.types.unregisterAllForOwner(owner);
      this.messages.unregisterMessages(owner);
    }
    for (const root of removed) {
      this.binder?.unbind(root);
    }
    this.completionCache.invalidate();
    return removed.length;
  }

  isRegistered(nameOrAlias: string): boolean {
    return this.graph.contains(nameOrAlias);
  }

  getAliases(commandName: string): string[] {
    return this.graph.aliasesOf(commandName);
  }

  /** Adds an alias to a registered root. Fails when the alias already names a command. */
  addAlias(commandName: string, alias: string): boolean {
    const root = this.graph.getRoot(commandName);
    const key = alias.trim().toLowerCase();
    if (!root || !key || /\s/.test(key) || this.graph.contains(key)) {
      return false;
    }
    this.registerRoot(root.withAliases([...this.graph.aliasesOf(root.name), key]));
    return true;
  }

  /** Removes an alias; primary names cannot be removed this way. */
  removeAlias(alias: string): boolean {
    const key = alias.trim().toLowerCase();
    const root = this.graph.getRoot(key);
    if (!root || root.name === key) {
      return false;
    }
    const remaining = this.graph.aliasesOf(root.name).filter((entry) => entry !== key);
    this.registerRoot(root.withAliases(remaining));
    return true;
  }

  dispatch(sender: CommandSender, label: string, args: readonly string[]): Promise<DispatchResult> {
    return this.dispatcher.dispatch(sender, stripSlash(label), args);
  }

  dispatchLine(sender: CommandSender, line: string): Promise<DispatchResult> {
    const [label = "", ...args] = tokenize(stripSlash(line.trim()));
    return this.dispatch(sender, label, args);
  }

  complete(sender: CommandSender, label: string, args: readonly string[]): string[] {
    return this.completer.complete(sender, stripSlash(label), args);
  }

  /** Completes a whole line; a single token completes the command label. */
  completeLine(sender: CommandSender, line: string): string[] {
    const [label = "", ...args] = tokenizeForCompletion(stripSlash(line.trimStart()));
    if (args.length === 0) {
      return this.completer.completeLabel(sender, label);
    }
    return this.complete(sender, label, args);
  }

  shutdown(): void {
    this.cooldowns.stop();
    this.cooldowns.clear();
    this.unregisterAll();
  }
}
