import type { CommandSender } from "../../host/types";
import type { DispatchResult } from "../dispatch/dispatcher";
import type { RootNode } from "../registry/nodes";
import type { CommandBinder, CommandHandle } from "./types";

type Binding = {
  root: RootNode;
  labels: string[];
  handle: CommandHandle;
};

/** In-process command table keyed by label and alias. */
export class MemoryCommandBinder implements CommandBinder {
  private readonly bindings = new Map<string, Binding>();
  private readonly labels = new Map<string, string>();

  bind(root: RootNode, aliases: readonly string[], handle: CommandHandle): void {
    this.unbind(root);
    const labels = [root.name, ...aliases.filter((alias) => alias !== root.name)];
    this.bindings.set(root.name, { root, labels, handle });
    for (const label of labels) {
      this.labels.set(label, root.name);
    }
  }

  unbind(root: RootNode): void {
    const binding = this.bindings.get(root.name);
    if (!binding) {
      return;
    }
    this.bindings.delete(root.name);
    for (const label of binding.labels) {
      if (this.labels.get(label) === root.name) {
        this.labels.delete(label);
      }
    }
  }

  isBound(label: string): boolean {
    return this.labels.has(label.toLowerCase());
  }

  boundLabels(): string[] {
    return [...this.labels.keys()].toSorted();
  }

  async execute(
    sender: CommandSender,
    label: string,
    args: readonly string[],
  ): Promise<DispatchResult | undefined> {
    const binding = this.lookup(label);
    return binding ? binding.handle.dispatch(sender, label, args) : undefined;
  }

  complete(sender: CommandSender, label: string, args: readonly string[]): string[] {
    const binding = this.lookup(label);
    return binding ? binding.handle.complete(sender, label, args) : [];
  }

  private lookup(label: string): Binding | undefined {
    const name = this.labels.get(label.toLowerCase());
    return name ? this.bindings.get(name) : undefined;
  }
}
