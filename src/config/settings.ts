import { DEFAULT_COMPLETION_LIMIT } from "../commands/completion/tab-completer";
import {
  DEFAULT_COMPLETION_MAX_ENTRIES,
  DEFAULT_COMPLETION_TTL_MS,
  DEFAULT_PARTIAL_KEY_LENGTH,
} from "../commands/completion/cache";
import { DEFAULT_HELP_PAGE_SIZE } from "../commands/dispatch/help";
import type { CmdtreeConfig } from "./schema";

export type CommandsSettings = {
  debug: boolean;
  slowDispatchMs: number;
  slowCompletionMs: number;
  completion: {
    ttlMs: number;
    maxEntries: number;
    limit: number;
    partialKeyLength: number;
  };
  help: {
    pageSize: number;
  };
  cooldowns: {
    sweepIntervalMs: number;
  };
  messages: Record<string, string>;
};

export const DEFAULT_SLOW_DISPATCH_MS = 50;
export const DEFAULT_SLOW_COMPLETION_MS = 5;
export const DEFAULT_COOLDOWN_SWEEP_MS = 60_000;

export function resolveCommandsSettings(config?: CmdtreeConfig): CommandsSettings {
  const commands = config?.commands;
  return {
    debug: commands?.debug ?? false,
    slowDispatchMs: commands?.slowDispatchMs ?? DEFAULT_SLOW_DISPATCH_MS,
    slowCompletionMs: commands?.slowCompletionMs ?? DEFAULT_SLOW_COMPLETION_MS,
    completion: {
      ttlMs: commands?.completion?.ttlMs ?? DEFAULT_COMPLETION_TTL_MS,
      maxEntries: commands?.completion?.maxEntries ?? DEFAULT_COMPLETION_MAX_ENTRIES,
      limit: commands?.completion?.limit ?? DEFAULT_COMPLETION_LIMIT,
      partialKeyLength: commands?.completion?.partialKeyLength ?? DEFAULT_PARTIAL_KEY_LENGTH,
    },
    help: {
      pageSize: commands?.help?.pageSize ?? DEFAULT_HELP_PAGE_SIZE,
    },
    cooldowns: {
      sweepIntervalMs: commands?.cooldowns?.sweepIntervalMs ?? DEFAULT_COOLDOWN_SWEEP_MS,
    },
    messages: { ...commands?.messages },
  };
}
