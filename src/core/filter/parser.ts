// src/core/filter/parser.ts

import { parsePlatform } from "../truststore/types";
import { CURRENT_VERSION, parseNumericVersion } from "../version";
import {
  ConstraintVersion,
  Filter,
  FilterConstraint,
  FilterParseError,
  OPERATORS,
  Operator,
} from "./types";

/**
 * Filter grammar:
 *
 *   filter     := constraint ( "," constraint )*
 *   constraint := PLATFORM ( OPERATOR VERSION )?
 *   OPERATOR   := ">=" | "<=" | "=" | ">" | "<"
 *   VERSION    := digits ( "." digits )* | "current"
 *
 * Whitespace between tokens is ignored. Words are lexed whole, so "ios" never
 * matches inside "ipados" or "visionos".
 */

type Token =
  | { type: "platform"; text: string }
  | { type: "operator"; text: Operator }
  | { type: "version"; text: string }
  | { type: "comma"; text: string };

const WORD_PATTERN = /[A-Za-z0-9_.]+/y;
const VERSION_PATTERN = /^\d+(?:\.\d+)*$/;

function invalid(expression: string, detail: string, fragment: string): FilterParseError {
  return new FilterParseError(`invalid filter "${expression}": ${detail}`, fragment);
}

function isOperator(text: string): text is Operator {
  return OPERATORS.some((op) => op === text);
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const ch = expression[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === ",") {
      tokens.push({ type: "comma", text: ch });
      pos++;
      continue;
    }

    if (ch === ">" || ch === "<" || ch === "=") {
      const pair = expression.substring(pos, pos + 2);
      const text = isOperator(pair) ? pair : ch;
      if (!isOperator(text)) {
        throw invalid(expression, `unexpected "${text}"`, text);
      }
      tokens.push({ type: "operator", text });
      pos += text.length;
      continue;
    }

    WORD_PATTERN.lastIndex = pos;
    const match = WORD_PATTERN.exec(expression);
    if (!match) {
      throw invalid(expression, `unexpected "${ch}"`, ch);
    }

    const word = match[0];
    if (VERSION_PATTERN.test(word) || word === CURRENT_VERSION) {
      tokens.push({ type: "version", text: word });
    } else if (/^\d/.test(word)) {
      throw invalid(expression, `invalid version "${word}"`, word);
    } else if (parsePlatform(word)) {
      tokens.push({ type: "platform", text: word });
    } else {
      throw invalid(expression, `unknown platform "${word}"`, word);
    }
    pos += word.length;
  }

  return tokens;
}

function toConstraintVersion(expression: string, text: string): ConstraintVersion {
  if (text === CURRENT_VERSION) {
    return { kind: "current" };
  }
  const value = parseNumericVersion(text);
  if (!value) {
    throw invalid(expression, `invalid version "${text}"`, text);
  }
  return { kind: "numeric", raw: text, value };
}

/**
 * Parse a filter expression such as "ios>=17.4,android>=10" or "chrome".
 * Throws FilterParseError for empty input, unknown platforms and malformed
 * operator/version sequences.
 */
export function parseFilter(input: string): Filter {
  const expression = input.trim();
  if (expression === "") {
    throw new FilterParseError("empty filter expression");
  }

  const tokens = tokenize(expression);
  const constraints: FilterConstraint[] = [];
  let i = 0;

  while (true) {
    const platformToken = tokens[i];
    if (!platformToken) {
      throw invalid(expression, "expected platform at end of expression", "");
    }
    if (platformToken.type !== "platform") {
      const text = platformToken.text;
      throw invalid(expression, `expected platform, got "${text}"`, text);
    }
    const platform = parsePlatform(platformToken.text);
    if (!platform) {
      throw invalid(expression, `unknown platform "${platformToken.text}"`, platformToken.text);
    }
    i++;

    const next = tokens[i];
    if (next && next.type === "operator") {
      const versionToken = tokens[i + 1];
      if (!versionToken || versionToken.type !== "version") {
        const fragment = versionToken ? versionToken.text : "";
        throw invalid(
          expression,
          `missing version for ${platformToken.text}${next.text}`,
          fragment,
        );
      }
      constraints.push({
        platform,
        operator: next.text,
        version: toConstraintVersion(expression, versionToken.text),
      });
      i += 2;
    } else if (next && next.type === "version") {
      throw invalid(expression, `missing operator for ${platformToken.text}`, next.text);
    } else {
      constraints.push({ platform, operator: ">=", version: { kind: "any" } });
    }

    const separator = tokens[i];
    if (!separator) {
      break;
    }
    if (separator.type !== "comma") {
      throw invalid(expression, `expected ",", got "${separator.text}"`, separator.text);
    }
    i++;
  }

  return { expression, constraints };
}
