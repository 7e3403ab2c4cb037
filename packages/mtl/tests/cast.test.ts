import { describe, expect, it } from "vitest";
import { castToBest } from "../src/cast.js";

describe("castToBest", () => {
  it("reads integers first", () => {
    expect(castToBest("1")).toEqual({ type: "int", value: 1 });
    expect(castToBest("-42")).toEqual({ type: "int", value: -42 });
  });

  it("keeps integers beyond the safe range as written", () => {
    expect(castToBest("9007199254740991")).toEqual({
      type: "int",
      value: 9007199254740991,
    });
    expect(castToBest("12345678901234567891")).toEqual({
      type: "string",
      value: "12345678901234567891",
    });
  });

  it("falls back to floats", () => {
    expect(castToBest("1.0")).toEqual({ type: "float", value: 1 });
    expect(castToBest("-0.5")).toEqual({ type: "float", value: -0.5 });
    expect(castToBest("1.5e3")).toEqual({ type: "float", value: 1500 });
    expect(castToBest(".25")).toEqual({ type: "float", value: 0.25 });
  });

  it("reads special float spellings", () => {
    expect(castToBest("inf")).toEqual({ type: "float", value: Infinity });
    expect(castToBest("-Infinity")).toEqual({
      type: "float",
      value: -Infinity,
    });
    const nan = castToBest("NaN");
    expect(nan.type).toBe("float");
    expect(nan.value).toBeNaN();
  });

  it("falls back to strings", () => {
    expect(castToBest("abc")).toEqual({ type: "string", value: "abc" });
    expect(castToBest("2016-01-02T03:04:05Z")).toEqual({
      type: "string",
      value: "2016-01-02T03:04:05Z",
    });
  });

  it("strips exactly one layer of double quotes", () => {
    expect(castToBest('"abc"')).toEqual({ type: "string", value: "abc" });
    expect(castToBest('""abc""')).toEqual({ type: "string", value: '"abc"' });
    expect(castToBest('"1"')).toEqual({ type: "string", value: "1" });
  });

  it("leaves unbalanced quotes alone", () => {
    expect(castToBest('"abc')).toEqual({ type: "string", value: '"abc' });
    expect(castToBest('"')).toEqual({ type: "string", value: '"' });
  });
});
