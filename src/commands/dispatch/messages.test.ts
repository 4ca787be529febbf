import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { RecordingSender } from "../../host/senders";
import { applyPlaceholders, MessageFacade } from "./messages";

describe("applyPlaceholders", () => {
  it("replaces known placeholders and leaves unknown ones", () => {
    const template = "{input} must be between {min} and {max}.";

    expect(applyPlaceholders(template, { input: "99", min: 1 })).toBe(
      "99 must be between 1 and {max}.",
    );
  });
});

describe("MessageFacade", () => {
  const shop = { name: "shop" };

  it("prefers owner messages, then overrides, then defaults", () => {
    const messages = new MessageFacade(
      { "commands.not-found": "No such command '{command}'" },
      pino({ level: "silent" }),
    );
    messages.registerMessages(shop, { "commands.not-found": "The shop has no {command}" });

    expect(messages.format("commands.not-found", { command: "buy" }, shop)).toBe(
      "The shop has no buy",
    );
    expect(messages.format("commands.not-found", { command: "buy" })).toBe(
      "No such command 'buy'",
    );
    expect(messages.format("errors.player-only")).toBe(
      "This command can only be used by players.",
    );

    messages.unregisterMessages(shop);
    expect(messages.format("commands.not-found", { command: "buy" }, shop)).toBe(
      "No such command 'buy'",
    );
  });

  it("renders an unknown key as itself and warns once", () => {
    const log = pino({ level: "silent" });
    const warn = vi.spyOn(log, "warn");
    const messages = new MessageFacade({}, log);

    expect(messages.format("shop.closed")).toBe("shop.closed");
    expect(messages.format("shop.closed")).toBe("shop.closed");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("sends formatted text to the sender", () => {
    const messages = new MessageFacade({}, pino({ level: "silent" }));
    const sender = new RecordingSender({ name: "Steve" });

    messages.send(sender, "commands.usage", { usage: "/eco give <target>" });

    expect(sender.messages).toEqual(["Usage: /eco give <target>"]);
  });
});
