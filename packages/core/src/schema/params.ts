/**
 * Handler parameter specs and the value types they bind to.
 */

import type { z } from "zod";
import { isKind, type HandlerResult, type Kind, type KindValue } from "@cmdbind/sdk";
import { RecordSchema, type RecordValue } from "./record.js";
import { kindSchema } from "./values.js";

/** A handler parameter: a single coerced token, or a record of fields. */
export type ParamSpec = Kind | RecordSchema;

export type ParamValue<P> =
  P extends Kind ? KindValue<P> : P extends RecordSchema<infer S> ? RecordValue<S> : never;

export type ParamValues<P extends readonly ParamSpec[]> = { [I in keyof P]: ParamValue<P[I]> };

export type Handler<P extends readonly ParamSpec[]> = (...args: ParamValues<P>) => HandlerResult;

export function isRecordParam(spec: ParamSpec): spec is RecordSchema {
  return spec instanceof RecordSchema;
}

export function isParamSpec(value: unknown): value is ParamSpec {
  return isKind(value) || value instanceof RecordSchema;
}

function valueSchema(spec: ParamSpec): z.ZodTypeAny {
  return isRecordParam(spec) ? spec.valueSchema : kindSchema(spec);
}

/** Check bound values against their declared parameter specs. */
export function matchesParams<P extends readonly ParamSpec[]>(
  params: P,
  values: readonly unknown[],
): values is ParamValues<P> {
  return (
    values.length === params.length &&
    params.every((spec, i) => valueSchema(spec).safeParse(values[i]).success)
  );
}
