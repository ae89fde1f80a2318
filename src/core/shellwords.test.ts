import { describe, it, expect } from "vitest";
import { MismatchedQuotesError, splitWords } from "./shellwords.js";

describe("splitWords", () => {
  it("splits on whitespace", () => {
    expect(splitWords("  one two\tthree\n")).toEqual(["one", "two", "three"]);
  });

  it("returns no words for blank input", () => {
    expect(splitWords("")).toEqual([]);
    expect(splitWords("   ")).toEqual([]);
  });

  it("keeps single-quoted text literal", () => {
    expect(splitWords(" 'a b' c")).toEqual(["a b", "c"]);
    expect(splitWords("'a\\b'")).toEqual(["a\\b"]);
  });

  it("honours escapes inside double quotes", () => {
    expect(splitWords('a "b \\" c" d')).toEqual(["a", 'b " c', "d"]);
  });

  it("escapes the next character outside quotes", () => {
    expect(splitWords("one\\ two")).toEqual(["one two"]);
  });

  it("joins adjacent quoted and bare pieces", () => {
    expect(splitWords("a'b c'd")).toEqual(["ab cd"]);
  });

  it("keeps empty quoted words", () => {
    expect(splitWords("x ''")).toEqual(["x", ""]);
  });

  it("drops a trailing backslash", () => {
    expect(splitWords("abc\\")).toEqual(["abc"]);
  });

  it("fails on unterminated quotes", () => {
    expect(() => splitWords("'open")).toThrow(MismatchedQuotesError);
    expect(() => splitWords('ok "open')).toThrow("mismatched quotes at position 3");
  });
});
