/**
 * Record schemas: named fields bound from positional and option tokens.
 */

import { z } from "zod";
import { InvalidRegistrationError, KINDS, type KindValue } from "@cmdbind/sdk";
import { validateInput } from "@cmdbind/shared";
import { FieldDef } from "./field.js";
import { kindSchema } from "./values.js";

const LONG_NAME = /^--[^\s=]+$/;
const SHORT_NAME = /^-[^\s=-][^\s=]*$/;

const FieldDefSchema = z.object({
  kind: z.enum(KINDS),
  isOptional: z.boolean(),
  options: z
    .object({
      position: z.number().int().nonnegative().optional(),
      long: z.string().regex(LONG_NAME, 'long name must look like "--name"').optional(),
      short: z.string().regex(SHORT_NAME, 'short name must look like "-n"').optional(),
      help: z.string().optional(),
    })
    .strict(),
});

const RecordFieldsSchema = z.record(
  z.string().min(1, "field name must not be empty"),
  z.instanceof(FieldDef, { message: "field must be built with field.<kind>()" }).pipe(FieldDefSchema),
);

export type RecordShape = Record<string, FieldDef>;

export type FieldValue<F> =
  F extends FieldDef<infer K, infer O>
    ? O extends true
      ? KindValue<K> | undefined
      : KindValue<K>
    : never;

/** The object a handler receives for a record parameter. */
export type RecordValue<S extends RecordShape> = { [P in keyof S]: FieldValue<S[P]> };

export class RecordSchema<S extends RecordShape = RecordShape> {
  /** Validates a bound record before it reaches a handler. */
  readonly valueSchema: z.ZodTypeAny;

  constructor(readonly fields: S) {
    const result = validateInput(RecordFieldsSchema, fields);
    if (!result.success) {
      throw new InvalidRegistrationError(`invalid record definition: ${result.error}`);
    }
    this.valueSchema = z
      .object(
        Object.fromEntries(
          this.entries().map(([name, def]) => {
            const schema = kindSchema(def.kind);
            return [name, def.isOptional ? schema.optional() : schema];
          }),
        ),
      )
      .strict();
  }

  /** Fields in declaration order. */
  entries(): Array<[string, FieldDef]> {
    const fields: RecordShape = this.fields;
    return Object.entries(fields);
  }
}

export function record<S extends RecordShape>(fields: S): RecordSchema<S> {
  return new RecordSchema(fields);
}
