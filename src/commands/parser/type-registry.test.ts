import { describe, expect, it } from "vitest";
import { RecordingSender } from "../../host/senders";
import { EMPTY_DIRECTORY } from "../../host/types";
import { ArgumentValueError } from "../errors";
import type { ArgumentType } from "./argument-type";
import { ArgumentTypeRegistry } from "./type-registry";
import { enumType } from "./types/enum";
import { booleanType, doubleType, integerType } from "./types/primitives";

const context = {
  sender: new RecordingSender({ name: "Tester" }),
  directory: EMPTY_DIRECTORY,
  argument: "value",
};

function reasonOf(type: ArgumentType, input: string): string | undefined {
  try {
    type.parse(context, input);
    return undefined;
  } catch (error) {
    return error instanceof ArgumentValueError ? error.reason : "unexpected";
  }
}

describe("ArgumentTypeRegistry", () => {
  it("registers built-ins under their aliases, case-insensitively", () => {
    const registry = ArgumentTypeRegistry.withBuiltins();

    expect(registry.get("Text")).toBe(registry.get("greedyString"));
    expect(registry.get("FLOAT")).toBe(registry.get("double"));
    expect(registry.get("onlinePlayer")).toBe(registry.get("actor"));
    expect(registry.get("int")?.name).toBe("integer");
    expect(registry.get("nope")).toBeUndefined();
  });

  it("lets owner-scoped types shadow global ones for that owner only", () => {
    const registry = ArgumentTypeRegistry.withBuiltins();
    const owner = { name: "shop" };
    const price = doubleType({ min: 0 });
    registry.registerForOwner(owner, "integer", price);

    expect(registry.getForOwner(owner, "integer")).toBe(price);
    expect(registry.getForOwner({ name: "other" }, "integer")?.name).toBe("integer");

    registry.unregisterAllForOwner(owner);
    expect(registry.getForOwner(owner, "integer")?.name).toBe("integer");
  });
});

describe("built-in argument types", () => {
  it("parses bounded integers", () => {
    const type = integerType({ min: 1, max: 64 });

    expect(type.parse(context, "+12")).toBe(12);
    expect(type.name).toBe("integer(1-64)");
    expect(reasonOf(type, "0")).toBe("number-out-of-range");
    expect(reasonOf(type, "1.5")).toBe("invalid-number");
    expect(reasonOf(type, "ten")).toBe("invalid-number");
  });

  it("suggests common integers only for small ranges", () => {
    expect(integerType({ min: 0, max: 30 }).suggest(context, "")).toEqual(["1", "5", "10", "25"]);
    expect(integerType().suggest(context, "")).toEqual([]);
  });

  it("parses doubles and rejects NaN", () => {
    const type = doubleType({ max: 1 });

    expect(type.parse(context, "-0.25")).toBe(-0.25);
    expect(type.parse(context, ".5")).toBe(0.5);
    expect(reasonOf(type, "NaN")).toBe("invalid-number");
    expect(reasonOf(type, "1.01")).toBe("number-out-of-range");
  });

  it("accepts the boolean word families", () => {
    const parsed = ["yes", "On", "1", "enabled"].map((value) => booleanType.parse(context, value));

    expect(parsed).toEqual([true, true, true, true]);
    expect(booleanType.parse(context, "disable")).toBe(false);
    expect(reasonOf(booleanType, "maybe")).toBe("invalid-boolean");
    expect(booleanType.suggest(context, "T")).toEqual(["true"]);
  });

  it("matches enum names case-insensitively and returns the declared value", () => {
    const type = enumType("Mode", ["Survival", "Creative"]);

    expect(type.name).toBe("mode");
    expect(type.parse(context, "CREATIVE")).toBe("Creative");
    expect(reasonOf(type, "hardcore")).toBe("invalid-enum");
    expect(type.suggest(context, "s")).toEqual(["survival"]);
  });
});
