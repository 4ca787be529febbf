import { Command } from "commander";
import pc from "picocolors";
import readline from "node:readline";
import { APP_VERSION } from "../version";
import { describeSender, openSession, type SessionOptions } from "./session";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Builds the `cmdtree` program. Options of `run` go before the command line;
 * everything from the first word of the line on reaches the dispatcher as typed.
 */
export function createProgram(): Command {
  const program = new Command()
    .name("cmdtree")
    .description("Command tree dispatcher and tab completer")
    .version(APP_VERSION)
    .enablePositionalOptions();

  program
    .command("run <line...>")
    .description("Run one command line against the demo command set")
    .option("-c, --config <path>", "Config file path")
    .option("--as <player>", "Run as the named player instead of the console")
    .option("--perm <permission>", "Grant a permission to the player (repeatable)", collect)
    .passThroughOptions()
    .action(async (line: string[], options: SessionOptions) => {
      const { service, sender } = openSession(options);
      const result = await service.dispatchLine(sender, line.join(" "));
      service.shutdown();
      if (result.status !== "success" && result.status !== "help") {
        process.exitCode = 1;
      }
    });

  program
    .command("complete <line>")
    .description("Print tab-completion suggestions for a partial line")
    .option("-c, --config <path>", "Config file path")
    .option("--as <player>", "Complete as the named player")
    .option("--perm <permission>", "Grant a permission to the player (repeatable)", collect)
    .action((line: string, options: SessionOptions) => {
      const { service, sender } = openSession(options);
      for (const suggestion of service.completeLine(sender, line)) {
        console.log(suggestion);
      }
      service.shutdown();
    });

  program
    .command("shell")
    .description("Interactive shell with tab completion")
    .option("-c, --config <path>", "Config file path")
    .option("--as <player>", "Act as the named player")
    .option("--perm <permission>", "Grant a permission to the player (repeatable)", collect)
    .action(async (options: SessionOptions) => {
      const { service, sender } = openSession(options);
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: `${describeSender(sender)} ${pc.bold(">")} `,
        completer: (line: string): [string[], string] => {
          const suggestions = service.completeLine(sender, line);
          const current = /\s$/.test(line) ? "" : (line.split(/\s+/).at(-1) ?? "");
          return [suggestions, current.replace(/^\//, "")];
        },
      });

      rl.prompt();
      for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed === "exit" || trimmed === "quit") {
          break;
        }
        if (trimmed) {
          await service.dispatchLine(sender, trimmed);
        }
        rl.prompt();
      }
      rl.close();
      service.shutdown();
    });

  const configCmd = program.command("config").description("Inspect configuration");

  configCmd
    .command("validate")
    .description("Validate a config file")
    .option("-c, --config <path>", "Config file path")
    .action(async (options: { config?: string }) => {
      const { validateConfigFile } = await import("./commands/config");
      validateConfigFile(options.config);
    });

  return program;
}
