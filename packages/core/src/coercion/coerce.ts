/**
 * Converts one raw string token into a kind's runtime value.
 */

import {
  isKind,
  MalformedValueError,
  UnsupportedTypeError,
  type Kind,
  type KindValue,
  type Primitive,
} from "@cmdbind/sdk";

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const TRUE_SPELLINGS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_SPELLINGS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

function parseInt53(token: string): number {
  if (!INTEGER.test(token)) throw new MalformedValueError(token, "int");
  const value = Number(token);
  if (!Number.isSafeInteger(value)) throw new MalformedValueError(token, "int");
  // "-0" parses to 0, not -0
  return value === 0 ? 0 : value;
}

function parseInt64(token: string): bigint {
  if (!INTEGER.test(token)) throw new MalformedValueError(token, "int64");
  // BigInt() rejects a leading "+"
  const value = BigInt(token.startsWith("+") ? token.slice(1) : token);
  if (value < INT64_MIN || value > INT64_MAX) throw new MalformedValueError(token, "int64");
  return value;
}

function parseFloat64(token: string): number {
  const special = SPECIAL_FLOAT.exec(token);
  if (special) {
    if (special[2].toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!DECIMAL.test(token)) throw new MalformedValueError(token, "float64");
  const value = Number(token);
  if (!Number.isFinite(value)) throw new MalformedValueError(token, "float64");
  return value;
}

function parseBool(token: string): boolean {
  if (TRUE_SPELLINGS.has(token)) return true;
  if (FALSE_SPELLINGS.has(token)) return false;
  throw new MalformedValueError(token, "bool");
}

const COERCERS: { [K in Kind]: (token: string) => KindValue<K> } = {
  string: (token) => token,
  int: parseInt53,
  int64: parseInt64,
  float64: parseFloat64,
  bool: parseBool,
};

/**
 * Coerce a token into the runtime value of `kind`.
 * Throws MalformedValueError when the token does not parse.
 */
export function coerce<K extends Kind>(token: string, kind: K): KindValue<K> {
  const coercer = COERCERS[kind];
  return coercer(token);
}

/**
 * Coerce a token into a kind named at runtime.
 * Throws UnsupportedTypeError for names outside the supported kinds.
 */
export function coerceTo(token: string, kindName: string): Primitive {
  if (!isKind(kindName)) throw new UnsupportedTypeError(kindName);
  return coerce(token, kindName);
}

/** Help label for a kind name; `<value>` for anything unrecognized. */
export function typeLabel(kindName: string): string {
  return isKind(kindName) ? `<${kindName}>` : "<value>";
}
