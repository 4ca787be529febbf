import { describe, expect, it } from "vitest";
import { tokenize, tokenizeForCompletion } from "./tokenizer";

describe("tokenize", () => {
  it("splits on runs of whitespace", () => {
    expect(tokenize("  eco   give\tSteve 10 ")).toEqual(["eco", "give", "Steve", "10"]);
  });

  it("groups quoted words and keeps empty quotes", () => {
    expect(tokenize(`say "hello there" '' done`)).toEqual(["say", "hello there", "", "done"]);
  });

  it("joins quoted segments with adjacent text", () => {
    expect(tokenize(`--name="Big Steve"`)).toEqual(["--name=Big Steve"]);
  });

  it("honours backslash escapes inside quotes", () => {
    expect(tokenize(`say "a \\"quoted\\" word"`)).toEqual(["say", 'a "quoted" word']);
  });

  it("runs an unterminated quote to the end of the line", () => {
    expect(tokenize(`say "open ended`)).toEqual(["say", "open ended"]);
  });
});

describe("tokenizeForCompletion", () => {
  it("adds an empty token after trailing whitespace", () => {
    expect(tokenizeForCompletion("eco give ")).toEqual(["eco", "give", ""]);
  });

  it("keeps the partial token being typed", () => {
    expect(tokenizeForCompletion("eco gi")).toEqual(["eco", "gi"]);
  });

  it("returns a single empty token for an empty line", () => {
    expect(tokenizeForCompletion("")).toEqual([""]);
  });
});
