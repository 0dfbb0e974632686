// src/core/filter/index.ts

export { parseFilter } from "./parser";
export { evaluateOperator, matchFilter, filterStores } from "./matcher";
export {
  Filter,
  FilterConstraint,
  ConstraintVersion,
  Operator,
  OPERATORS,
  FilterParseError,
} from "./types";
