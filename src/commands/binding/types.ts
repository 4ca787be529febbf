import type { CommandSender } from "../../host/types";
import type { DispatchResult } from "../dispatch/dispatcher";
import type { RootNode } from "../registry/nodes";

/** Entry points the host calls for a bound root command. */
export type CommandHandle = {
  dispatch(sender: CommandSender, label: string, args: readonly string[]): Promise<DispatchResult>;
  complete(sender: CommandSender, label: string, args: readonly string[]): string[];
};

/** Wires root commands into the host's own command table. */
export interface CommandBinder {
  bind(root: RootNode, aliases: readonly string[], handle: CommandHandle): void;
  unbind(root: RootNode): void;
}
