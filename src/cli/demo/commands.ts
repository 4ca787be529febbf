import { command } from "../../commands/authoring/builder";
import { describeCommand } from "../../commands/authoring/metadata";
import type { CommandContext } from "../../commands/execution/context";
import { enumType } from "../../commands/parser/types/enum";
import { integerType } from "../../commands/parser/types/primitives";
import type { CommandService } from "../../commands/service";
import type { CommandOwner } from "../../commands/spec";
import type { HostActor, HostWorld } from "../../host/types";
import type { DemoDirectory } from "./directory";

export const DEMO_OWNER: CommandOwner = { name: "demo" };

const GAME_MODES = ["survival", "creative", "adventure", "spectator"] as const;

const DEMO_MESSAGES: Record<string, string> = {
  "eco.balance": "{player} has {amount} coins.",
  "eco.given": "Gave {amount} coins to {player}. New balance: {balance}.",
  "eco.taken": "Took {amount} coins from {player}. New balance: {balance}.",
  "eco.insufficient": "{player} only has {balance} coins.",
  "eco.top.line": "#{rank} {player}: {amount}",
  "eco.reloaded": "Economy settings reloaded.",
  "tp.done": "Teleported {player} to {world}.",
  "gamemode.set": "Set {player}'s game mode to {mode}.",
};

export class EconomyCommands {
  reloads = 0;

  constructor(private readonly directory: DemoDirectory) {}

  balance(context: CommandContext, player: HostActor | undefined): void {
    const name = player?.name ?? context.sender.name;
    context.send("eco.balance", { player: name, amount: this.directory.balance(name) });
  }

  give(context: CommandContext, target: HostActor, amount: number, silent: boolean): void {
    const balance = this.directory.deposit(target.name, amount);
    if (!silent) {
      context.send("eco.given", { player: target.name, amount, balance });
    }
  }

  take(context: CommandContext, target: HostActor, amount: number): boolean {
    const balance = this.directory.withdraw(target.name, amount);
    if (balance === null) {
      context.send("eco.insufficient", {
        player: target.name,
        balance: this.directory.balance(target.name),
      });
      return false;
    }
    context.send("eco.taken", { player: target.name, amount, balance });
    return true;
  }

  top(context: CommandContext, limit: number): void {
    this.directory
      .richest()
      .slice(0, limit)
      .forEach(([player, amount], index) => {
        context.send("eco.top.line", { rank: index + 1, player, amount });
      });
  }

  reload(context: CommandContext): void {
    this.reloads += 1;
    context.send("eco.reloaded");
  }
}

describeCommand(EconomyCommands, {
  name: "eco",
  aliases: ["economy", "money"],
  description: "Coin balances",
  permission: "eco.use",
  handlers: {
    balance: {
      path: "default",
      description: "Show a balance",
      params: [{ kind: "context" }, { kind: "arg", name: "player", type: "actor", optional: true }],
    },
    give: {
      description: "Give coins to a player",
      permission: "eco.give",
      cooldown: { duration: "3s", bypassPermission: "eco.bypass" },
      params: [
        { kind: "context" },
        { kind: "arg", name: "target", type: "actor" },
        { kind: "arg", name: "amount", type: "amount" },
        { kind: "flag", name: "silent", short: "s" },
      ],
    },
    take: {
      description: "Take coins from a player",
      permission: "eco.take",
      params: [
        { kind: "context" },
        { kind: "arg", name: "target", type: "actor" },
        { kind: "arg", name: "amount", type: "amount" },
      ],
    },
    top: {
      description: "Richest players",
      aliases: ["baltop"],
      params: [
        { kind: "context" },
        { kind: "arg", name: "limit", valueType: "integer", defaultValue: "3" },
      ],
    },
    reload: {
      path: "admin reload",
      description: "Reload economy settings",
      permission: "eco.admin",
      params: [{ kind: "context" }],
    },
  },
  messages: DEMO_MESSAGES,
});

function actorArg(context: CommandContext, name: string): HostActor | undefined {
  return context.args.getAs(name, (value): value is HostActor =>
    typeof value === "object" && value !== null && "name" in value && "id" in value,
  );
}

function worldArg(context: CommandContext, name: string): HostWorld | undefined {
  return context.args.getAs(name, (value): value is HostWorld =>
    typeof value === "object" && value !== null && "name" in value && !("id" in value),
  );
}

function isGameMode(value: unknown): value is (typeof GAME_MODES)[number] {
  return GAME_MODES.some((mode) => mode === value);
}

/** Registers the demo command set used by the CLI. */
export function registerDemoCommands(service: CommandService, directory: DemoDirectory): void {
  service.types.registerForOwner(DEMO_OWNER, "amount", integerType({ min: 1, max: 100 }));
  service.types.registerForOwner(DEMO_OWNER, "gamemode", enumType("gamemode", GAME_MODES));

  service.register(DEMO_OWNER, new EconomyCommands(directory));

  service.register(
    DEMO_OWNER,
    command("tp")
      .aliases("teleport")
      .description("Teleport a player to a world")
      .permission("demo.tp")
      .argument("target", "actor")
      .argument("world", "world", { defaultValue: "overworld" })
      .flag("quiet", { short: "q" })
      .cooldown("5s", { bypassPermission: "demo.tp.bypass" })
      .executes((context) => {
        const target = actorArg(context, "target");
        const world = worldArg(context, "world");
        if (!target || !world) {
          return false;
        }
        directory.moveActor(target.name, world.name);
        if (!context.flags.isTruthy("quiet")) {
          context.send("tp.done", { player: target.name, world: world.name });
        }
        return true;
      }),
  );

  service.register(
    DEMO_OWNER,
    command("say")
      .description("Broadcast a message")
      .argument("message", "greedyString")
      .flag("prefix", { short: "p", hasValue: true, defaultValue: "Broadcast" })
      .executes((context) => {
        context.reply(`[${context.flags.value("prefix")}] ${context.args.getString("message")}`);
      }),
  );

  service.register(
    DEMO_OWNER,
    command("gamemode")
      .aliases("gm")
      .description("Change a player's game mode")
      .permission("demo.gamemode")
      .argument("mode", "gamemode")
      .argument("target", "actor", { optional: true })
      .executes((context) => {
        const mode = context.args.getAs("mode", isGameMode);
        const player = actorArg(context, "target")?.name ?? context.sender.name;
        context.send("gamemode.set", { player, mode: mode ?? "unknown" });
      }),
  );

  service.register(
    DEMO_OWNER,
    command("spawn")
      .description("Return to spawn")
      .playerOnly()
      .executes((context) => {
        directory.moveActor(context.sender.name, "overworld");
        context.send("tp.done", { player: context.sender.name, world: "overworld" });
      }),
  );
}
