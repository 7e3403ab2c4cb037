import { describe, expect, it } from "vitest";
import { ParsingError } from "../src/errors.js";
import { lexer } from "../src/lexer.js";
import { scanner, splitLines } from "../src/scanner.js";

describe("scanner", () => {
  it("trims lines and keeps blank ones", () => {
    const lines = Array.from(scanner(["  GROUP = A ", "", "\tX = 1"]));
    expect(lines).toEqual(["GROUP = A", "", "X = 1"]);
  });

  it("splits on every line ending", () => {
    expect(splitLines("a\r\nb\nc\rd\n")).toEqual(["a", "b", "c", "d"]);
  });
});

describe("lexer", () => {
  it("emits one group per matched pair", () => {
    const groups = Array.from(
      lexer([
        "GROUP = T1",
        "ATTR1 = 1",
        "END_GROUP = T1",
        "GROUP = T2",
        "ATTR2 = 2",
        "END_GROUP = T2",
        "END",
      ]),
    );
    expect(groups).toEqual([
      ["GROUP = T1", "ATTR1 = 1"],
      ["GROUP = T2", "ATTR2 = 2"],
    ]);
  });

  it("closes nested groups before their parent", () => {
    const groups = Array.from(
      lexer([
        "GROUP = OUTER",
        "A = 1",
        "GROUP = INNER",
        "B = 2",
        "END_GROUP = INNER",
        "C = 3",
        "END_GROUP = OUTER",
      ]),
    );
    expect(groups).toEqual([
      ["GROUP = INNER", "B = 2"],
      ["GROUP = OUTER", "A = 1", "C = 3"],
    ]);
  });

  it("stops at END and drops groups still open", () => {
    const groups = Array.from(
      lexer([
        "GROUP = T1",
        "ATTR1 = 1",
        "END_GROUP = T1",
        "GROUP = T2",
        "ATTR1 = 1",
        "END",
        "END_GROUP = T2",
      ]),
    );
    expect(groups).toEqual([["GROUP = T1", "ATTR1 = 1"]]);
  });

  it("never emits groups left open at end of input", () => {
    const groups = Array.from(
      lexer([
        "GROUP = T1",
        "ATTR1 = 1",
        "END_GROUP = T1",
        "GROUP = T2",
        "ATTR1 = 1",
        "GROUP = T3",
        "ATTR1 = 1",
        "END_GROUP = T3",
      ]),
    );
    expect(groups).toEqual([
      ["GROUP = T1", "ATTR1 = 1"],
      ["GROUP = T3", "ATTR1 = 1"],
    ]);
  });

  it("rejects diverging start and end tags", () => {
    const run = () =>
      Array.from(lexer(["GROUP = A", "X = 1", "END_GROUP = B"]));
    expect(run).toThrow(ParsingError);
    expect(run).toThrow("Diverging start and end tag: A != B");
  });

  it("rejects END_GROUP with no open group", () => {
    expect(() => Array.from(lexer(["END_GROUP = A"]))).toThrow(ParsingError);
  });

  it("rejects statements outside of any group", () => {
    expect(() => Array.from(lexer(["X = 1", "GROUP = A"]))).toThrow(
      "Unexpected line outside of any group: X = 1",
    );
  });

  it("skips blank lines outside of groups", () => {
    const groups = Array.from(
      lexer(["", "GROUP = A", "X = 1", "END_GROUP = A", ""]),
    );
    expect(groups).toEqual([["GROUP = A", "X = 1"]]);
  });

  it("is lazy", () => {
    const groups = lexer([
      "GROUP = A",
      "X = 1",
      "END_GROUP = A",
      "GROUP = B",
      "END_GROUP = C",
    ]);
    expect(groups.next().value).toEqual(["GROUP = A", "X = 1"]);
    expect(() => groups.next()).toThrow(ParsingError);
  });
});
