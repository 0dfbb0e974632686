// src/core/filter/matcher.ts

import { Store } from "../truststore/store";
import { PlatformVersion } from "../truststore/types";
import { compareParsedVersions, isCurrentVersion, parseVersion } from "../version";
import { Filter, FilterConstraint, Operator } from "./types";

/**
 * Decide one operator against one test version.
 *
 * @param testIsCurrent the version being tested is "current"
 * @param constraintIsCurrent the constraint's version is "current"
 * @param cmp numeric comparison of test vs constraint (-1/0/1); only read when
 *   neither side is "current"
 */
export function evaluateOperator(
  operator: Operator,
  testIsCurrent: boolean,
  constraintIsCurrent: boolean,
  cmp: number,
): boolean {
  if (constraintIsCurrent) {
    switch (operator) {
      case "=":
      case ">=":
        return testIsCurrent;
      case ">":
        return false;
      case "<":
        return !testIsCurrent;
      case "<=":
        return true;
    }
  }

  // "current" is above every numeric version
  if (testIsCurrent) {
    return operator === ">" || operator === ">=";
  }

  switch (operator) {
    case "=":
      return cmp === 0;
    case ">":
      return cmp > 0;
    case "<":
      return cmp < 0;
    case ">=":
      return cmp >= 0;
    case "<=":
      return cmp <= 0;
  }
}

function matchConstraint(constraint: FilterConstraint, version: string): boolean {
  const { operator, version: target } = constraint;

  if (target.kind === "any") {
    return true;
  }

  const testIsCurrent = isCurrentVersion(version);
  if (target.kind === "current" || testIsCurrent) {
    return evaluateOperator(operator, testIsCurrent, target.kind === "current", 0);
  }

  const tested = parseVersion(version);
  if (!tested) {
    return false;
  }
  const cmp = compareParsedVersions(tested, { core: target.value, prerelease: [] });
  return evaluateOperator(operator, false, false, cmp);
}

/**
 * Check a platform version against a filter.
 * The platform must be named in the filter, and every constraint on that
 * platform must hold.
 */
export function matchFilter(filter: Filter, pv: PlatformVersion): boolean {
  const constraints = filter.constraints.filter((c) => c.platform === pv.platform);
  if (constraints.length === 0) {
    return false;
  }
  return constraints.every((c) => matchConstraint(c, pv.version));
}

/**
 * Select the stores matching a filter. Without a filter every store applies and
 * the input array is returned as is.
 */
export function filterStores(stores: readonly Store[], filter?: Filter | null): readonly Store[] {
  if (!filter) {
    return stores;
  }
  return stores.filter((store) => matchFilter(filter, store.platformVersion));
}
