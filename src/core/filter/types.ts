// src/core/filter/types.ts

import { Platform } from "../truststore/types";

/**
 * Version comparison operators, longest first so lexing can match greedily
 */
export const OPERATORS = [">=", "<=", "=", ">", "<"] as const;

export type Operator = (typeof OPERATORS)[number];

/**
 * Version side of a constraint
 */
export type ConstraintVersion =
  /** Bare platform: every version matches */
  | { kind: "any" }
  /** The rolling-release sentinel */
  | { kind: "current" }
  | { kind: "numeric"; raw: string; value: readonly [number, number, number] };

/**
 * A single `platform[op version]` term
 */
export interface FilterConstraint {
  platform: Platform;
  operator: Operator;
  version: ConstraintVersion;
}

/**
 * Parsed filter expression
 */
export interface Filter {
  /** The expression as given, trimmed */
  expression: string;
  constraints: readonly FilterConstraint[];
}

/**
 * Thrown for empty or malformed filter expressions
 */
export class FilterParseError extends Error {
  /** The substring that could not be parsed ("" when the expression ended early) */
  readonly fragment: string;

  constructor(message: string, fragment: string = "") {
    super(message);
    this.name = "FilterParseError";
    this.fragment = fragment;
  }
}
