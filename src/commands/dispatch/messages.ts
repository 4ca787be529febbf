import type { CommandSender } from "../../host/types";
import { componentLogger, type Logger } from "../../logger";
import type { CommandOwner } from "../spec";

export type MessagePlaceholders = Readonly<Record<string, string | number>>;

export const DEFAULT_MESSAGES: Readonly<Record<string, string>> = {
  "errors.no-permission": "You don't have permission to do this.",
  "errors.player-only": "This command can only be used by players.",
  "errors.console-only": "This command can only be used from the console.",
  "errors.internal": "An internal error occurred. Please contact an administrator.",
  "errors.cooldown": "You must wait {remaining} before using this command again.",
  "errors.missing-argument": "Missing required argument: {argument}",
  "errors.too-many-arguments": "Too many arguments (expected {expected}, got {got}).",
  "errors.unknown-type": "Argument {argument} has an unknown type: {type}",
  "errors.invalid-number": "'{input}' is not a valid number.",
  "errors.number-out-of-range": "{input} must be between {min} and {max}.",
  "errors.invalid-boolean": "'{input}' is not a valid true/false value.",
  "errors.invalid-enum": "'{input}' must be one of: {values}",
  "errors.actor-not-online": "Player '{input}' is not online.",
  "errors.world-not-found": "World '{input}' was not found.",
  "errors.invalid-value": "Invalid value '{input}' for {argument}.",
  "commands.not-found": "Unknown command: {command}",
  "commands.unknown-subcommand": "Unknown subcommand: {subcommand}",
  "commands.help-hint": "Use /{command} help to list subcommands.",
  "commands.usage": "Usage: {usage}",
  "commands.help.header": "=== Help: {command} ({page}/{pages}) ===",
  "commands.help.line": " {usage} - {description}",
  "commands.help.line-bare": " {usage}",
  "commands.help.empty": "No subcommands available.",
};

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function applyPlaceholders(
  template: string,
  placeholders: MessagePlaceholders = {},
): string {
  return template.replace(PLACEHOLDER, (match, key: string) =>
    Object.hasOwn(placeholders, key) ? String(placeholders[key]) : match,
  );
}

/**
 * Resolves message keys to text. Lookup order: the owner's registered messages,
 * configured overrides, built-in defaults. An unknown key renders as itself.
 */
export class MessageFacade {
  private readonly overrides: Map<string, string>;
  private readonly ownerMessages = new Map<string, Map<string, string>>();
  private readonly warnedKeys = new Set<string>();
  private readonly log: Logger;

  constructor(overrides: Readonly<Record<string, string>> = {}, logger?: Logger) {
    this.overrides = new Map(Object.entries(overrides));
    this.log = logger ?? componentLogger("messages");
  }

  registerMessages(owner: CommandOwner, messages: Readonly<Record<string, string>>): void {
    const existing = this.ownerMessages.get(owner.name) ?? new Map<string, string>();
    for (const [key, value] of Object.entries(messages)) {
      existing.set(key, value);
    }
    this.ownerMessages.set(owner.name, existing);
  }

  unregisterMessages(owner: CommandOwner): void {
    this.ownerMessages.delete(owner.name);
  }

  template(key: string, owner?: CommandOwner): string | undefined {
    const scoped = owner ? this.ownerMessages.get(owner.name)?.get(key) : undefined;
    return scoped ?? this.overrides.get(key) ?? DEFAULT_MESSAGES[key];
  }

  format(key: string, placeholders?: MessagePlaceholders, owner?: CommandOwner): string {
    const template = this.template(key, owner);
    if (template === undefined) {
      if (!this.warnedKeys.has(key)) {
        this.warnedKeys.add(key);
        this.log.warn({ key, owner: owner?.name }, "No message found for key");
      }
      return key;
    }
    return applyPlaceholders(template, placeholders);
  }

  send(
    sender: CommandSender,
    key: string,
    placeholders?: MessagePlaceholders,
    owner?: CommandOwner,
  ): void {
    sender.sendMessage(this.format(key, placeholders, owner));
  }
}
