import type { CommandOwner } from "../spec";
import type { ArgumentType } from "./argument-type";
import { actorType, worldType } from "./types/host";
import {
  booleanType,
  doubleType,
  greedyStringType,
  integerType,
  stringType,
} from "./types/primitives";

const BUILTIN_ALIASES: ReadonlyArray<[ArgumentType, readonly string[]]> = [
  [stringType, ["string", "str"]],
  [greedyStringType, ["greedyString", "text", "message", "string[]"]],
  [integerType(), ["integer", "int"]],
  [doubleType(), ["double", "number", "decimal", "float"]],
  [booleanType, ["boolean", "bool"]],
  [actorType, ["actor", "player", "playerOnline", "onlinePlayer"]],
  [worldType, ["world"]],
];

function normalize(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Named argument types. Owner-scoped registrations shadow global ones for that owner.
 * Names are matched case-insensitively.
 */
export class ArgumentTypeRegistry {
  private readonly globalTypes = new Map<string, ArgumentType>();
  private readonly ownerTypes = new Map<string, Map<string, ArgumentType>>();

  static withBuiltins(): ArgumentTypeRegistry {
    const registry = new ArgumentTypeRegistry();
    for (const [type, names] of BUILTIN_ALIASES) {
      for (const name of names) {
        registry.register(name, type);
      }
    }
    return registry;
  }

  register(name: string, type: ArgumentType): void {
    this.globalTypes.set(normalize(name), type);
  }

  get(name: string): ArgumentType | undefined {
    return this.globalTypes.get(normalize(name));
  }

  has(name: string): boolean {
    return this.globalTypes.has(normalize(name));
  }

  registerForOwner(owner: CommandOwner, name: string, type: ArgumentType): void {
    let scoped = this.ownerTypes.get(owner.name);
    if (!scoped) {
      scoped = new Map();
      this.ownerTypes.set(owner.name, scoped);
    }
    scoped.set(normalize(name), type);
  }

  getForOwner(owner: CommandOwner | undefined, name: string): ArgumentType | undefined {
    const key = normalize(name);
    if (owner) {
      const scoped = this.ownerTypes.get(owner.name)?.get(key);
      if (scoped) {
        return scoped;
      }
    }
    return this.globalTypes.get(key);
  }

  unregisterAllForOwner(owner: CommandOwner): void {
    this.ownerTypes.delete(owner.name);
  }

  names(): string[] {
    return [...this.globalTypes.keys()].toSorted();
  }
}
