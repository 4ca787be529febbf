import pc from "picocolors";
import fs from "node:fs";
import { CommandService } from "../commands/service";
import { loadConfig, resolveConfigPath } from "../config/loader";
import { resolveCommandsSettings } from "../config/settings";
import type { CmdtreeConfig } from "../config/schema";
import { consoleSender, RecordingSender } from "../host/senders";
import { configureLogger } from "../logger";
import { registerDemoCommands } from "./demo/commands";
import { DemoDirectory } from "./demo/directory";

export type SessionOptions = {
  config?: string;
  as?: string;
  perm?: string[];
};

export type DemoSession = {
  service: CommandService;
  directory: DemoDirectory;
  sender: RecordingSender;
};

function print(message: string): void {
  console.log(message);
}

function readConfig(configPath?: string): CmdtreeConfig | undefined {
  if (!configPath && !fs.existsSync(resolveConfigPath())) {
    return undefined;
  }
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    console.error(pc.red(`Invalid config ${result.path}:`));
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }
  return result.config;
}

/** Builds a command service with the demo command set and the requested sender. */
export function openSession(options: SessionOptions): DemoSession {
  const config = readConfig(options.config);
  configureLogger(config?.logging?.level);
  const directory = new DemoDirectory();
  const service = new CommandService({ directory, settings: resolveCommandsSettings(config) });
  registerDemoCommands(service, directory);

  const sender = options.as
    ? new RecordingSender({ name: options.as, permissions: options.perm ?? [], output: print })
    : consoleSender(print);
  return { service, directory, sender };
}

export function describeSender(sender: RecordingSender): string {
  return sender.kind === "console" ? pc.dim("console") : pc.cyan(sender.name);
}
