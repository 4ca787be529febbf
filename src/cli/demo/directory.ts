import { z } from "zod";
import type { HostActor, HostDirectory, HostWorld } from "../../host/types";
import data from "./directory.json";

const DemoDataSchema = z.object({
  actors: z.array(z.object({ id: z.string(), name: z.string(), world: z.string().optional() })),
  worlds: z.array(z.object({ name: z.string(), environment: z.string().optional() })),
  balances: z.record(z.string(), z.number()),
});

export type DemoData = z.infer<typeof DemoDataSchema>;

/** Mutable in-memory world for the demo commands. */
export class DemoDirectory implements HostDirectory {
  private readonly actors: HostActor[];
  private readonly worldList: HostWorld[];
  private readonly balances: Map<string, number>;

  constructor(source: DemoData = DemoDataSchema.parse(data)) {
    this.actors = source.actors.map((actor) => ({ ...actor }));
    this.worldList = source.worlds.map((world) => ({ ...world }));
    this.balances = new Map(Object.entries(source.balances));
  }

  onlineActors(): readonly HostActor[] {
    return this.actors;
  }

  worlds(): readonly HostWorld[] {
    return this.worldList;
  }

  balance(name: string): number {
    return this.balances.get(name) ?? 0;
  }

  deposit(name: string, amount: number): number {
    const next = this.balance(name) + amount;
    this.balances.set(name, next);
    return next;
  }

  withdraw(name: string, amount: number): number | null {
    const current = this.balance(name);
    if (current < amount) {
      return null;
    }
    this.balances.set(name, current - amount);
    return current - amount;
  }

  richest(): Array<[string, number]> {
    return [...this.balances.entries()].toSorted((a, b) => b[1] - a[1]);
  }

  moveActor(name: string, world: string): void {
    const actor = this.actors.find((entry) => entry.name === name);
    if (actor) {
      actor.world = world;
    }
  }
}
