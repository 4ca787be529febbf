export { command, CommandBuilder } from "./commands/authoring/builder";
export type { ArgumentOptions, FlagOptions } from "./commands/authoring/builder";
export type { CommandDefinition, CooldownDeclaration } from "./commands/authoring/definition";
export { describeCommand, getCommandMetadata } from "./commands/authoring/metadata";
export type {
  ArgumentValueType,
  CommandDeclaration,
  FlagValueType,
  HandlerDeclaration,
  ParameterDeclaration,
} from "./commands/authoring/metadata";
export { CommandProcessor } from "./commands/authoring/processor";
export { MemoryCommandBinder } from "./commands/binding/memory-binder";
export type { CommandBinder, CommandHandle } from "./commands/binding/types";
export { CompletionCache } from "./commands/completion/cache";
export { TabCompleter } from "./commands/completion/tab-completer";
export { CooldownStore, cooldownKey } from "./commands/cooldown/cooldown-store";
export { formatRemaining, parseDurationMs } from "./commands/cooldown/duration";
export { CommandDispatcher } from "./commands/dispatch/dispatcher";
export type { DispatchResult, DispatchStatus } from "./commands/dispatch/dispatcher";
export { renderHelp } from "./commands/dispatch/help";
export { DEFAULT_MESSAGES, MessageFacade } from "./commands/dispatch/messages";
export * from "./commands/errors";
export type { CommandContext, CommandServices } from "./commands/execution/context";
export { ParsedArgs } from "./commands/execution/parsed-args";
export { ParsedFlags } from "./commands/execution/parsed-flags";
export { ArgumentParser } from "./commands/parser/argument-parser";
export type {
  ArgumentContext,
  ArgumentType,
  SuggestionContext,
} from "./commands/parser/argument-type";
export { FlagParser } from "./commands/parser/flag-parser";
export { tokenize, tokenizeForCompletion } from "./commands/parser/tokenizer";
export { ArgumentTypeRegistry } from "./commands/parser/type-registry";
export { enumType } from "./commands/parser/types/enum";
export { actorType, worldType } from "./commands/parser/types/host";
export {
  booleanType,
  doubleType,
  greedyStringType,
  integerType,
  stringType,
} from "./commands/parser/types/primitives";
export { CommandGraph } from "./commands/registry/graph";
export type { ResolvedCommand } from "./commands/registry/graph";
export { RootNode, SubNode, rootNode, subNode } from "./commands/registry/nodes";
export type { CommandNode, CompiledExecutor, CooldownSpec } from "./commands/registry/nodes";
export { CommandService } from "./commands/service";
export type { CommandRegistration, CommandServiceOptions } from "./commands/service";
export { argumentSpec, flagSpec } from "./commands/spec";
export type { ArgumentSpec, CommandOwner, FlagSpec } from "./commands/spec";
export * from "./config";
export { consoleSender, RecordingSender } from "./host/senders";
export type { CommandSender, HostActor, HostDirectory, HostWorld, SenderKind } from "./host/types";
export { configureLogger, logger } from "./logger";
export { APP_VERSION } from "./version";
