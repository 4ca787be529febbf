import { describe, expect, it } from "vitest";
import { ProcessingError } from "../errors";
import { command, CommandBuilder } from "./builder";

const executes = () => true;

describe("CommandBuilder", () => {
  it("creates intermediate levels for multi-word subcommand paths", () => {
    const reload = () => true;
    const definition = command("Eco")
      .sub("admin reload", (sub) => sub.permission("eco.admin.reload").executes(reload))
      .sub("admin", (admin) => admin.description("Admin tools"))
      .build();

    expect(definition.name).toBe("eco");
    expect(definition.subcommands).toHaveLength(1);
    const [admin] = definition.subcommands;
    expect(admin?.description).toBe("Admin tools");
    expect(admin?.executor).toBeUndefined();
    expect(admin?.subcommands[0]?.name).toBe("reload");
    expect(admin?.subcommands[0]?.permission).toBe("eco.admin.reload");
    expect(admin?.subcommands[0]?.executor).toBe(reload);
  });

  it("records arguments, flags and cooldowns", () => {
    const definition = command("tp")
      .aliases("teleport")
      .argument("target", "actor")
      .argument("world", "world", { defaultValue: "overworld" })
      .flag("Quiet", { short: "q" })
      .cooldown("5s", { bypassPermission: "tp.bypass" })
      .executes(executes)
      .build();

    expect(definition.aliases).toEqual(["teleport"]);
    expect(definition.arguments).toEqual([
      { name: "target", type: "actor", optional: false },
      { name: "world", type: "world", optional: true, defaultValue: "overworld" },
    ]);
    expect(definition.flags[0]).toMatchObject({ name: "quiet", short: "q", hasValue: false });
    expect(definition.cooldown).toEqual({ duration: "5s", bypassPermission: "tp.bypass" });
  });

  it("returns an independent copy from build", () => {
    const builder = command("say").argument("message", "text").executes(executes);
    const first = builder.build();

    builder.argument("extra", "string");

    expect(first.arguments).toHaveLength(1);
    expect(builder.build().arguments).toHaveLength(2);
  });

  it("rejects a second handler for the same node", () => {
    const builder = command("eco").executes(executes);

    expect(() => builder.executes(executes)).toThrowError(
      "Failed to process command 'eco': 'eco' already has a handler",
    );
  });

  it("rejects invalid names", () => {
    expect(() => CommandBuilder.create("two words")).toThrowError(ProcessingError);
    expect(() => command("eco").sub("  ", (sub) => sub)).toThrowError(ProcessingError);
  });
});
