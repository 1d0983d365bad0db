/**
 * Zod schemas for bound runtime values, one per kind.
 */

import { z } from "zod";
import type { Kind } from "@cmdbind/sdk";

const KIND_SCHEMAS: Record<Kind, z.ZodTypeAny> = {
  string: z.string(),
  int: z.number().int(),
  int64: z.bigint(),
  // float64 admits NaN and the infinities
  float64: z.union([z.number(), z.nan()]),
  bool: z.boolean(),
};

export function kindSchema(kind: Kind): z.ZodTypeAny {
  return KIND_SCHEMAS[kind];
}
