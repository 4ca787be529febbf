import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "./program";

const tempDirs: string[] = [];
let output: string[] = [];

function writeQuietConfig(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cmdtree-cli-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, `{ "logging": { "level": "silent" } }`, "utf-8");
  return configPath;
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(["run", "-c", writeQuietConfig(), ...args], { from: "user" });
}

beforeEach(() => {
  output = [];
  vi.spyOn(console, "log").mockImplementation((...data: unknown[]) => {
    output.push(data.join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("cmdtree run", () => {
  it("passes short flags with values through to the command", async () => {
    await run("say", "-p", "Hi", "hello", "world");

    expect(output).toEqual(["[Hi] hello world"]);
  });

  it("passes long boolean flags through to the command", async () => {
    await run("tp", "Steve", "nether");
    await run("tp", "Steve", "nether", "--quiet");

    expect(output).toEqual(["Teleported Steve to nether."]);
  });

  it("still reads its own options before the command line", async () => {
    await run("--as", "Alex", "say", "--prefix=Shout", "hi");

    expect(output).toEqual(["[Shout] hi"]);
  });
});
