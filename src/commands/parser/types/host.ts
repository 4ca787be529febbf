import type { HostActor, HostWorld } from "../../../host/types";
import { ArgumentValueError } from "../../errors";
import { startsWithIgnoreCase, type ArgumentType } from "../argument-type";

function findByName<T extends { name: string }>(items: readonly T[], input: string): T | undefined {
  const exact = items.find((item) => item.name === input);
  if (exact) {
    return exact;
  }
  const lower = input.toLowerCase();
  return items.find((item) => item.name.toLowerCase() === lower);
}

/** Online actor looked up by exact name, then case-insensitively. */
export const actorType: ArgumentType<HostActor> = {
  name: "actor",
  parse({ directory }, input) {
    const actor = findByName(directory.onlineActors(), input);
    if (!actor) {
      throw new ArgumentValueError(input, "actor-not-online");
    }
    return actor;
  },
  suggest({ directory }, partial) {
    return directory
      .onlineActors()
      .map((actor) => actor.name)
      .filter((name) => startsWithIgnoreCase(name, partial));
  },
};

export const worldType: ArgumentType<HostWorld> = {
  name: "world",
  parse({ directory }, input) {
    const world = findByName(directory.worlds(), input);
    if (!world) {
      throw new ArgumentValueError(input, "world-not-found");
    }
    return world;
  },
  suggest({ directory }, partial) {
    return directory
      .worlds()
      .map((world) => world.name)
      .filter((name) => startsWithIgnoreCase(name, partial));
  },
};
