import type { CommandSender, HostDirectory } from "../../host/types";
import type { MessageFacade, MessagePlaceholders } from "../dispatch/messages";
import type { CommandNode, RootNode } from "../registry/nodes";
import type { ParsedArgs } from "./parsed-args";
import type { ParsedFlags } from "./parsed-flags";

export type CommandServices = {
  directory: HostDirectory;
  messages: MessageFacade;
};

/** Everything a compiled executor receives for one invocation. */
export type CommandContext = {
  sender: CommandSender;
  /** Label the sender typed, which may be an alias. */
  label: string;
  /** Canonical names from the root to the executing node. */
  path: readonly string[];
  root: RootNode;
  node: CommandNode;
  args: ParsedArgs;
  flags: ParsedFlags;
  services: CommandServices;
  reply(message: string): void;
  send(key: string, placeholders?: MessagePlaceholders): void;
};

export type CommandContextInit = Omit<CommandContext, "reply" | "send">;

export function createCommandContext(init: CommandContextInit): CommandContext {
  return {
    ...init,
    reply(message) {
      init.sender.sendMessage(message);
    },
    send(key, placeholders) {
      init.sender.sendMessage(init.services.messages.format(key, placeholders, init.root.owner));
    },
  };
}
