import pino from "pino";
import { describe, expect, it } from "vitest";
import { consoleSender } from "../../host/senders";
import { EMPTY_DIRECTORY, type CommandSender } from "../../host/types";
import type { CommandContext } from "../execution/context";
import { ProcessingError } from "../errors";
import { ArgumentTypeRegistry } from "../parser/type-registry";
import { command, type CommandBuilder } from "./builder";
import { describeCommand, type CommandDeclaration } from "./metadata";
import { CommandProcessor } from "./processor";

const owner = { name: "economy" };

function setup() {
  const types = ArgumentTypeRegistry.withBuiltins();
  return { types, processor: new CommandProcessor(types, pino({ level: "silent" })) };
}

class BankCommands {
  balance(_sender: CommandSender, _target: unknown) {
    return true;
  }

  give(_context: CommandContext, _target: unknown, _amount: unknown, _silent: boolean) {
    return true;
  }

  reload() {
    return true;
  }

  mode(_mode: unknown) {
    return true;
  }
}

describeCommand(BankCommands, {
  name: "Eco",
  aliases: ["money"],
  permission: "eco.use",
  handlers: {
    balance: {
      path: "default",
      description: "Show a balance",
      params: [
        { kind: "sender" },
        { kind: "arg", name: "target", type: "actor", optional: true },
      ],
    },
    give: {
      permission: "eco.give",
      aliases: ["pay"],
      cooldown: { duration: "3s", bypassPermission: "eco.bypass" },
      params: [
        { kind: "context" },
        { kind: "arg", name: "target", type: "actor" },
        { kind: "arg", name: "amount", valueType: "integer" },
        { kind: "flag", name: "silent", short: "s" },
      ],
    },
    reload: { path: "admin reload", permission: "eco.admin" },
    mode: {
      path: "admin mode",
      params: [{ kind: "arg", name: "mode", valueType: "enum", enumValues: ["Strict", "Lenient"] }],
    },
  },
});

function declared(declaration: CommandDeclaration, handler: object = new BankCommands()): object {
  return describeCommand(handler, declaration);
}

describe("CommandProcessor", () => {
  it("compiles a described handler into a node tree", () => {
    const { processor } = setup();

    const root = processor.process(owner, new BankCommands());

    expect(root.name).toBe("eco");
    expect(root.aliases).toEqual(["money"]);
    expect(root.permission).toBe("eco.use");
    expect(root.isExecutable).toBe(true);
    expect(root.description).toBe("Show a balance");
    expect(root.usage("eco")).toBe("/eco [target]");
    expect(root.children.map((child) => child.name)).toEqual(["give", "admin"]);

    const give = root.child("pay");
    expect(give?.permission).toBe("eco.give");
    expect(give?.cooldown).toEqual({
      durationMs: 3_000,
      bypassPermission: "eco.bypass",
      messageKey: undefined,
    });
    expect(give?.argumentSpecs.map((spec) => spec.type)).toEqual(["actor", "integer"]);
    expect(give?.flagSpecs).toMatchObject([{ name: "silent", short: "s", hasValue: false }]);
    expect(give?.usage("eco give")).toBe("/eco give <target> <amount> [flags]");

    const admin = root.child("admin");
    expect(admin?.isExecutable).toBe(false);
    expect(admin?.child("reload")?.permission).toBe("eco.admin");
  });

  it("registers enum parameters as owner-scoped types", () => {
    const { processor, types } = setup();

    const root = processor.process(owner, new BankCommands());
    const spec = root.child("admin")?.child("mode")?.argumentSpecs[0];

    expect(spec?.type).toBe("eco.admin.mode.mode");
    const type = types.getForOwner(owner, "eco.admin.mode.mode");
    const context = { sender: consoleSender(), directory: EMPTY_DIRECTORY };
    expect(type?.suggest(context, "")).toEqual(["strict", "lenient"]);
    expect(types.get("eco.admin.mode.mode")).toBeUndefined();
  });

  it("registers no enum types when a later declaration fails", () => {
    const { processor, types } = setup();
    const handler = declared({
      name: "shop",
      handlers: {
        mode: {
          params: [
            { kind: "arg", name: "mode", enumValues: ["buy", "sell"] },
            { kind: "arg", name: "item", type: "widget" },
          ],
        },
      },
    });

    expect(() => processor.process(owner, handler)).toThrowError(
      "argument 'item' has unknown type 'widget'",
    );
    expect(types.getForOwner(owner, "shop.mode.mode")).toBeUndefined();
  });

  it("rejects handlers without a declaration", () => {
    const { processor } = setup();

    const attempt = () => processor.process(owner, {});

    expect(attempt).toThrowError(ProcessingError);
    expect(attempt).toThrowError(
      "Failed to process command 'Object': handler has no command declaration",
    );
  });

  it("rejects declarations that do not match the handler", () => {
    const { processor } = setup();

    expect(() =>
      processor.process(owner, declared({ name: "eco", handlers: { missing: {} } })),
    ).toThrowError("handler method 'missing' does not exist");
    expect(() =>
      processor.process(owner, declared({ name: "eco", handlers: { give: { params: [] } } })),
    ).toThrowError("method 'give' takes 4 parameters but declares 0");
    expect(() =>
      processor.process(
        owner,
        declared({ name: "eco", handlers: { mode: { params: [{ kind: "arg", name: " " }] } } }),
      ),
    ).toThrowError("parameter 0 of 'mode' is missing its arg name");
    expect(() =>
      processor.process(
        owner,
        declared({
          name: "eco",
          handlers: { mode: { params: [{ kind: "arg", name: "mode", valueType: "enum" }] } },
        }),
      ),
    ).toThrowError("enum parameter 'mode' of 'mode' declares no values");
  });

  it("rejects two handlers for the same path", () => {
    const { processor } = setup();

    const handler = declared({
      name: "eco",
      handlers: {
        reload: { path: "" },
        mode: { path: "default", params: [{ kind: "arg", name: "mode" }] },
      },
    });

    expect(() => processor.process(owner, handler)).toThrowError(
      "more than one handler declared for 'default'",
    );
  });

  it("validates argument and flag declarations", () => {
    const { processor } = setup();
    const run = () => true;
    const optionalFirst = command("a").argument("x", "string", { optional: true });
    const cases: Array<[CommandBuilder, string]> = [
      [command("a"), "'a' has no handler and no subcommands"],
      [
        command("a").argument("x", "string").argument("x", "string").executes(run),
        "argument 'x' is declared twice",
      ],
      [command("a").argument("x", "widget").executes(run), "unknown type 'widget'"],
      [
        command("a").argument("x", "text").argument("y", "string").executes(run),
        "greedy argument 'x' must be the last argument",
      ],
      [
        optionalFirst.argument("y", "string").executes(run),
        "required argument 'y' follows an optional argument",
      ],
      [command("a").flag("help").executes(run), "flag '--help' is reserved or declared twice"],
      [command("a").flag("x", { short: "h" }).executes(run), "short flag '-h'"],
      [command("a").flag("x", { short: "xy" }).executes(run), "short flag '-xy'"],
      [command("a").cooldown("soon").executes(run), "invalid cooldown duration 'soon'"],
    ];

    for (const [builder, message] of cases) {
      expect(() => processor.compile(owner, builder.build())).toThrowError(message);
    }
  });

  it("compiles fluent definitions", () => {
    const { processor } = setup();
    const definition = command("tp")
      .argument("target", "player")
      .argument("world", "world", { defaultValue: "overworld" })
      .flag("quiet", { short: "q" })
      .cooldown("1m")
      .executes(() => true)
      .sub("here", (sub) => sub.playerOnly().executes(() => true))
      .build();

    const root = processor.compile(owner, definition);

    expect(root.cooldown?.durationMs).toBe(60_000);
    expect(root.usage("tp")).toBe("/tp <target> [world=overworld] [flags]");
    expect(root.child("here")?.playerOnly).toBe(true);
  });
});
