/**
 * Fills a record from the tokens left after the command path.
 *
 * Positional fields are consumed first, in index order 0..max; an index
 * with no field consumes nothing. Option tokens follow:
 *   --name=value   value for a long option
 *   --name [value] flag, or long option taking the next token
 *   -n [value]     flag, or short option taking the next token
 * The first token that is none of these ends the scan and is left for the
 * caller.
 */

import {
  ArgumentBindingError,
  CliError,
  InsufficientArgsError,
  MissingOptionValueError,
  UnknownOptionError,
  type Kind,
  type Primitive,
} from "@cmdbind/sdk";
import { coerce } from "../coercion/coerce.js";
import { extractFields, type FieldRef } from "../schema/metadata.js";
import type { RecordSchema } from "../schema/record.js";

export type RecordFields = Record<string, Primitive | undefined>;

export interface BoundRecord {
  value: RecordFields;
  /** Tokens used by positionals and options together. */
  consumed: number;
}

const ZERO_VALUES: { [K in Kind]: Primitive } = {
  string: "",
  int: 0,
  int64: 0n,
  float64: 0,
  bool: false,
};

function setField(value: RecordFields, ref: FieldRef, token: string, target: string): void {
  try {
    value[ref.name] = coerce(token, ref.def.kind);
  } catch (err) {
    if (err instanceof CliError) throw new ArgumentBindingError(target, err);
    throw err;
  }
}

export function bindRecord(tokens: readonly string[], schema: RecordSchema): BoundRecord {
  const table = extractFields(schema);
  const value: RecordFields = {};
  for (const [name, def] of schema.entries()) {
    value[name] = def.isOptional ? undefined : ZERO_VALUES[def.kind];
  }

  let cursor = 0;
  for (let position = 0; position <= table.maxPosition; position++) {
    const ref = table.positional.get(position);
    if (!ref) continue;
    if (cursor >= tokens.length) {
      throw new InsufficientArgsError(`not enough positional args for record: need position ${position}`);
    }
    setField(value, ref, tokens[cursor], `positional arg at position ${position}`);
    cursor++;
  }

  while (cursor < tokens.length) {
    const token = tokens[cursor];

    let ref: FieldRef | undefined;
    if (token.startsWith("--")) {
      const eq = token.indexOf("=");
      if (eq !== -1) {
        const name = token.slice(0, eq);
        ref = table.long.get(name);
        if (!ref) throw new UnknownOptionError(name);
        setField(value, ref, token.slice(eq + 1), `value for option ${name}`);
        cursor++;
        continue;
      }
      ref = table.long.get(token);
    } else if (token.startsWith("-") && token.length >= 2) {
      ref = table.short.get(token);
    } else {
      break;
    }

    if (!ref) throw new UnknownOptionError(token);

    if (ref.def.isFlag) {
      value[ref.name] = true;
      cursor++;
      continue;
    }
    if (cursor + 1 >= tokens.length) throw new MissingOptionValueError(token);
    setField(value, ref, tokens[cursor + 1], `value for option ${token}`);
    cursor += 2;
  }

  return { value, consumed: cursor };
}
