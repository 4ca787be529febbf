import type { CommandSender } from "../../host/types";
import type { CommandNode, RootNode } from "../registry/nodes";
import type { MessageFacade } from "./messages";

export type HelpPage = {
  page: number;
  pages: number;
  lines: string[];
};

export const DEFAULT_HELP_PAGE_SIZE = 8;

/** Parses the optional page token after `help`; anything but a positive integer is page 1. */
export function parseHelpPage(token: string | undefined): number {
  if (token === undefined || !/^\d+$/.test(token)) {
    return 1;
  }
  return Math.max(1, Number(token));
}

/**
 * Paginated help for a node: the node itself when it is executable, then each
 * subcommand the sender may use. `label` is the invoked path, e.g. `eco give`.
 */
export function renderHelp(
  messages: MessageFacade,
  root: RootNode,
  node: CommandNode,
  sender: CommandSender,
  label: string,
  requestedPage: number,
  pageSize = DEFAULT_HELP_PAGE_SIZE,
): HelpPage {
  const entries: Array<{ usage: string; description: string }> = [];
  if (node.isExecutable) {
    entries.push({ usage: node.usage(label), description: node.description ?? "" });
  }
  for (const child of node.visibleChildren(sender)) {
    entries.push({
      usage: child.usage(`${label} ${child.name}`),
      description: child.description ?? "",
    });
  }

  const size = Math.max(1, pageSize);
  const pages = Math.max(1, Math.ceil(entries.length / size));
  const page = Math.min(Math.max(1, requestedPage), pages);
  const header = { command: label, page, pages };
  const lines = [messages.format("commands.help.header", header, root.owner)];
  if (entries.length === 0) {
    lines.push(messages.format("commands.help.empty", { command: label }, root.owner));
  }
  for (const entry of entries.slice((page - 1) * size, page * size)) {
    const key = entry.description ? "commands.help.line" : "commands.help.line-bare";
    lines.push(messages.format(key, entry, root.owner));
  }
  return { page, pages, lines };
}
