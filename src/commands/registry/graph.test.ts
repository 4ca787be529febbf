import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { CommandGraph } from "./graph";
import { rootNode, subNode } from "./nodes";

const economy = { name: "economy" };
const teleports = { name: "teleports" };

function createGraph() {
  const log = pino({ level: "silent" });
  const warn = vi.spyOn(log, "warn");
  return { graph: new CommandGraph(log), warn };
}

function ecoRoot(owner = economy) {
  return rootNode("eco", owner)
    .aliases("money", "Economy")
    .child(subNode("give").executor(() => true).build())
    .child(
      subNode("admin")
        .child(subNode("reload").aliases("rl").executor(() => true).build())
        .build(),
    )
    .build();
}

describe("CommandGraph", () => {
  it("resolves the longest matching path and keeps the remaining tokens", () => {
    const { graph } = createGraph();
    graph.register(ecoRoot());

    const resolved = graph.resolve(["ECO", "admin", "RL", "now", "please"]);

    expect(resolved?.path).toEqual(["eco", "admin", "reload"]);
    expect(resolved?.nodes.map((node) => node.name)).toEqual(["eco", "admin", "reload"]);
    expect(resolved?.remaining).toEqual(["now", "please"]);
  });

  it("stops at the first token that is not a child", () => {
    const { graph } = createGraph();
    graph.register(ecoRoot());

    const resolved = graph.resolve(["money", "pay", "give"]);

    expect(resolved?.node.name).toBe("eco");
    expect(resolved?.remaining).toEqual(["pay", "give"]);
    expect(graph.resolve(["unknown"])).toBeUndefined();
    expect(graph.resolve([])).toBeUndefined();
  });

  it("indexes aliases and removes them with their root", () => {
    const { graph } = createGraph();
    graph.register(ecoRoot());

    expect(graph.aliasesOf("eco")).toEqual(["economy", "money"]);
    expect(graph.getRoot("MONEY")?.name).toBe("eco");

    expect(graph.unregister("money")?.name).toBe("eco");
    expect(graph.contains("eco")).toBe(false);
    expect(graph.contains("economy")).toBe(false);
    expect(graph.labels()).toEqual([]);
  });

  it("replaces a root registered by another owner and warns", () => {
    const { graph, warn } = createGraph();
    graph.register(ecoRoot());
    graph.register(ecoRoot(teleports));

    expect(graph.getRoot("eco")?.owner).toBe(teleports);
    expect(graph.rootsOf(economy)).toEqual([]);
    expect(graph.size).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      { command: "eco", owner: "teleports", previousOwner: "economy" },
      "Command registered by another owner; replacing it",
    );
  });

  it("ignores an alias that matches a registered name", () => {
    const { graph, warn } = createGraph();
    graph.register(rootNode("tp", teleports).build());
    graph.register(rootNode("teleport", teleports).aliases("tp").build());

    expect(graph.getRoot("tp")?.name).toBe("tp");
    expect(graph.aliasesOf("teleport")).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      { command: "teleport", alias: "tp" },
      "Alias shadows a registered command name; ignoring alias",
    );
  });

  it("keeps a reassigned alias when its previous root is removed", () => {
    const { graph, warn } = createGraph();
    graph.register(rootNode("spawn", teleports).aliases("home").build());
    graph.register(rootNode("warp", teleports).aliases("home").build());

    expect(warn).toHaveBeenCalledTimes(1);
    expect(graph.getRoot("home")?.name).toBe("warp");

    graph.unregister("spawn");
    expect(graph.getRoot("home")?.name).toBe("warp");
  });

  it("unregisters every root of one owner", () => {
    const { graph } = createGraph();
    graph.register(ecoRoot());
    graph.register(rootNode("tp", teleports).aliases("teleport").build());
    graph.register(rootNode("spawn", teleports).build());

    const removed = graph.unregisterAll(teleports);

    expect(removed.map((root) => root.name).toSorted()).toEqual(["spawn", "tp"]);
    expect(graph.roots().map((root) => root.name)).toEqual(["eco"]);
    expect(graph.contains("teleport")).toBe(false);
    expect(graph.unregisterAll(teleports)).toEqual([]);
  });

  it("leaves earlier resolutions intact after a write", () => {
    const { graph } = createGraph();
    graph.register(ecoRoot());
    const before = graph.resolve(["eco", "give"]);

    graph.clear();

    expect(before?.node.name).toBe("give");
    expect(graph.resolve(["eco"])).toBeUndefined();
  });
});
