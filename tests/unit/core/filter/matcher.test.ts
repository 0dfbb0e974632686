import { evaluateOperator, filterStores, matchFilter } from "../../../../src/core/filter/matcher";
import { parseFilter } from "../../../../src/core/filter/parser";
import { Operator } from "../../../../src/core/filter/types";
import { Store } from "../../../../src/core/truststore/store";
import { Platform } from "../../../../src/core/truststore/types";

function matches(expression: string, platform: Platform, version: string): boolean {
  return matchFilter(parseFilter(expression), { platform, version });
}

describe("matchFilter", () => {
  it("should match each platform against its own constraint", () => {
    expect(matches("ios>=15,android>=10", "ios", "18")).toBe(true);
    expect(matches("ios>=15,android>=10", "android", "14")).toBe(true);
    expect(matches("ios>=15,android>=10", "ios", "14")).toBe(false);
  });

  it("should reject platforms the filter does not name", () => {
    expect(matches("ios>=15,android>=10", "macos", "18")).toBe(false);
  });

  it("should require every constraint on the same platform", () => {
    expect(matches("android>=10,android<=13", "android", "12")).toBe(true);
    expect(matches("android>=10,android<=13", "android", "14")).toBe(false);
    expect(matches("android>=10,android<=13", "android", "9")).toBe(false);
  });

  it("should match any version for a bare platform", () => {
    expect(matches("chrome", "chrome", "current")).toBe(true);
    expect(matches("ios", "ios", "12.1.3")).toBe(true);
  });

  it("should compare dotted versions numerically", () => {
    expect(matches("ios>=17.4", "ios", "17.10")).toBe(true);
    expect(matches("ios=17", "ios", "17.0")).toBe(true);
    expect(matches("ios<17.4", "ios", "17.3.9")).toBe(true);
  });

  it("should place current above every numeric version", () => {
    expect(matches("chrome<=138", "chrome", "current")).toBe(false);
    expect(matches("chrome<=138", "chrome", "138")).toBe(true);
    expect(matches("chrome>=139", "chrome", "current")).toBe(true);
    expect(matches("chrome>=139", "chrome", "140")).toBe(true);
    expect(matches("chrome>=139", "chrome", "138")).toBe(false);
    expect(matches("windows>10", "windows", "current")).toBe(true);
    expect(matches("windows=10", "windows", "current")).toBe(false);
  });

  it("should handle current on the constraint side", () => {
    expect(matches("windows=current", "windows", "current")).toBe(true);
    expect(matches("windows=current", "windows", "11")).toBe(false);
    expect(matches("chrome<current", "chrome", "138")).toBe(true);
    expect(matches("chrome<current", "chrome", "current")).toBe(false);
  });

  it("should place a pre-release store version below its release", () => {
    expect(matches("ios>=17", "ios", "17.0-beta")).toBe(false);
    expect(matches("ios>=16.4", "ios", "17.0-beta")).toBe(true);
    expect(matches("ios<17", "ios", "17.0-beta")).toBe(true);
    expect(matches("ios=17", "ios", "17.0+build.3")).toBe(true);
  });

  it("should not match store versions that are not numeric", () => {
    expect(matches("ios>=15", "ios", "beta")).toBe(false);
  });
});

describe("evaluateOperator", () => {
  const cases: [Operator, boolean, boolean][] = [
    // operator, test is current, expected when the constraint is current
    ["=", true, true],
    ["=", false, false],
    [">=", true, true],
    [">=", false, false],
    [">", true, false],
    [">", false, false],
    ["<", true, false],
    ["<", false, true],
    ["<=", true, true],
    ["<=", false, true],
  ];

  it.each(cases)(
    "should evaluate %s current (test current: %s) as %s",
    (op, testIsCurrent, expected) => {
      expect(evaluateOperator(op, testIsCurrent, true, 0)).toBe(expected);
    },
  );

  it("should use the comparison result for numeric versions", () => {
    expect(evaluateOperator(">", false, false, 1)).toBe(true);
    expect(evaluateOperator(">", false, false, 0)).toBe(false);
    expect(evaluateOperator("<=", false, false, 0)).toBe(true);
    expect(evaluateOperator("<", false, false, -1)).toBe(true);
    expect(evaluateOperator("=", false, false, -1)).toBe(false);
  });
});

describe("filterStores", () => {
  const stores = [
    new Store("ios", "17", []),
    new Store("ios", "18", []),
    new Store("android", "14", []),
    new Store("chrome", "current", []),
  ];

  it("should return the input unchanged without a filter", () => {
    expect(filterStores(stores)).toBe(stores);
    expect(filterStores(stores, null)).toBe(stores);
  });

  it("should keep matching stores in input order", () => {
    const selected = filterStores(stores, parseFilter("ios>=18,chrome"));
    expect(selected.map((s) => `${s.platform}/${s.version}`)).toEqual([
      "ios/18",
      "chrome/current",
    ]);
  });

  it("should return an empty list when nothing matches", () => {
    expect(filterStores(stores, parseFilter("windows"))).toEqual([]);
  });
});
