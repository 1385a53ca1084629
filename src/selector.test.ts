import { describe, expect, it } from "vitest";

import {
  applySelector,
  isEmptySelector,
  parseSelector,
  SelectorError,
  type Selector,
} from "./selector";
import type { Table } from "./tables";

const table = (index: number, id = "", name = ""): Table => ({
  index,
  id,
  name,
  rows: [["x"]],
});

describe("parseSelector", () => {
  it("returns an empty selector for blank input", () => {
    for (const input of ["", "   ", " , ,"]) {
      const selector = parseSelector(input);
      expect(isEmptySelector(selector)).toBe(true);
    }
  });

  it("splits indexes from names", () => {
    const selector = parseSelector(" 1,foo,  2 ,bar,, ");
    expect([...selector.indexes]).toEqual([1, 2]);
    expect([...selector.names]).toEqual(["foo", "bar"]);
  });

  it("accepts a leading plus sign", () => {
    expect([...parseSelector("+3").indexes]).toEqual([3]);
  });

  it("treats non-integer parts as names", () => {
    const selector = parseSelector("1.5,2x,prices");
    expect(selector.indexes.size).toBe(0);
    expect([...selector.names]).toEqual(["1.5", "2x", "prices"]);
  });

  it("treats integers too large for an index as names", () => {
    const selector = parseSelector(
      "99999999999999999999,-99999999999999999999"
    );
    expect(selector.indexes.size).toBe(0);
    expect([...selector.names]).toEqual([
      "99999999999999999999",
      "-99999999999999999999",
    ]);
  });

  it("rejects indexes below one", () => {
    for (const input of ["0", "-1", " 0,foo"]) {
      expect(() => parseSelector(input)).toThrow(SelectorError);
      expect(() => parseSelector(input)).toThrow("table index must be >= 1");
    }
  });
});

describe("applySelector", () => {
  const tables = [
    table(1, "t1", "alpha"),
    table(2, "t2", "beta"),
    table(3, "", "gamma"),
  ];

  it("returns the input unchanged for an empty selector", () => {
    const selector: Selector = { indexes: new Set(), names: new Set() };
    expect(applySelector(tables, selector)).toBe(tables);
  });

  it("matches by index, id or name in document order", () => {
    const selector: Selector = {
      indexes: new Set([2]),
      names: new Set(["t1", "gamma"]),
    };
    expect(applySelector(tables, selector).map((t) => t.index)).toEqual([
      1, 2, 3,
    ]);
  });

  it("includes a table once when several criteria match", () => {
    const selector = parseSelector("1,t1,alpha");
    expect(applySelector(tables, selector)).toEqual([tables[0]]);
  });

  it("returns nothing when no table matches", () => {
    expect(applySelector(tables, parseSelector("9,missing"))).toEqual([]);
  });

  it("matches an id made of many digits", () => {
    const numbered = [table(1), table(2, "99999999999999999999")];
    expect(
      applySelector(numbered, parseSelector("99999999999999999999"))
    ).toEqual([numbered[1]]);
  });

  it("never matches an empty id or name", () => {
    const anonymous = [table(1), table(2, "", "named")];
    expect(applySelector(anonymous, parseSelector("named"))).toEqual([
      anonymous[1],
    ]);
  });
});
