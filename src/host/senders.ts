import type { CommandSender, SenderKind } from "./types";

export type SenderInit = {
  id?: string;
  name: string;
  kind?: SenderKind;
  /** Granted permissions; `*` grants everything. */
  permissions?: Iterable<string>;
  output?: (message: string) => void;
};

/** Sender backed by a permission set, collecting every message it receives. */
export class RecordingSender implements CommandSender {
  readonly id: string;
  readonly name: string;
  readonly kind: SenderKind;
  readonly messages: string[] = [];
  private readonly permissions: Set<string>;
  private readonly output?: (message: string) => void;

  constructor(init: SenderInit) {
    this.name = init.name;
    this.kind = init.kind ?? "player";
    this.id = init.id ?? `${this.kind}:${init.name.toLowerCase()}`;
    this.permissions = new Set(init.permissions ?? []);
    this.output = init.output;
  }

  hasPermission(permission: string): boolean {
    if (this.kind === "console" || this.permissions.has("*")) {
      return true;
    }
    if (this.permissions.has(permission)) {
      return true;
    }
    // `eco.*` grants `eco.give` and `eco.admin.reload`.
    const parts = permission.split(".");
    for (let i = parts.length - 1; i > 0; i -= 1) {
      if (this.permissions.has(`${parts.slice(0, i).join(".")}.*`)) {
        return true;
      }
    }
    return false;
  }

  grant(permission: string): void {
    this.permissions.add(permission);
  }

  sendMessage(message: string): void {
    this.messages.push(message);
    this.output?.(message);
  }

  lastMessage(): string | undefined {
    return this.messages.at(-1);
  }

  clear(): void {
    this.messages.length = 0;
  }
}

export function consoleSender(output?: (message: string) => void): RecordingSender {
  return new RecordingSender({ id: "console", name: "CONSOLE", kind: "console", output });
}
