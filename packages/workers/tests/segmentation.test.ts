import { describe, expect, it } from "vitest";
import { cleanText, splitSentences, tokenize } from "../src/index";

describe("cleanText", () => {
  it("collapses whitespace runs and trims", () => {
    expect(cleanText("  Hello\n\tworld.   Bye  ")).toBe("Hello world. Bye");
    expect(cleanText(" \n ")).toBe("");
  });
});

describe("splitSentences", () => {
  it.each([
    ["Cats purr. Dogs bark!", ["Cats purr.", "Dogs bark!"]],
    ["Is it? Yes. And more", ["Is it?", "Yes.", "And more"]],
    ["no terminator", ["no terminator"]],
    ["Wait...", ["Wait.", ".", "."]],
    ["", []],
  ])("splits %j", (text, expected) => {
    expect(splitSentences(text)).toEqual(expected);
  });
});

describe("tokenize", () => {
  it("returns the space-separated words of cleaned text", () => {
    expect(tokenize("Cats purr. Dogs bark!")).toEqual(["Cats", "purr.", "Dogs", "bark!"]);
    expect(tokenize("")).toEqual([]);
  });
});
