/**
 * Primitive kinds a token can be coerced into.
 */

/** Every supported kind, in the order help and validation list them. */
export const KINDS = ["string", "int", "int64", "float64", "bool"] as const;

export type Kind = (typeof KINDS)[number];

/** Runtime representation of each kind. */
export interface KindValueMap {
  string: string;
  int: number;
  int64: bigint;
  float64: number;
  bool: boolean;
}

export type KindValue<K extends Kind> = KindValueMap[K];

/** Any value a single token can coerce into. */
export type Primitive = KindValueMap[Kind];

export function isKind(value: unknown): value is Kind {
  return typeof value === "string" && KINDS.some((kind) => kind === value);
}
