/**
 * Classifies each record field as positional,
 * long option or short option.
 *
 * Rules, per field in declaration order:
 *   1. A field with a position is registered under that index. An explicit
 *      long or short name registers it by name as well.
 *   2. Any other field is a named option: its long name is the override or
 *      `--` + kebab-case(field name); its short name is the override, if any.
 *   3. Bool fields are flags (see FieldDef.isFlag).
 *
 * When two fields claim the same index or name, the later one wins.
 */

import { createLogger, toKebab } from "@cmdbind/shared";
import type { FieldDef } from "./field.js";
import type { RecordSchema } from "./record.js";

const logger = createLogger("FieldMetadata");

export interface FieldRef {
  readonly name: string;
  readonly def: FieldDef;
}

export interface FieldTable {
  readonly positional: ReadonlyMap<number, FieldRef>;
  readonly long: ReadonlyMap<string, FieldRef>;
  readonly short: ReadonlyMap<string, FieldRef>;
  /** Highest positional index, or -1 when the record has none. */
  readonly maxPosition: number;
}

/** The long name an option field answers to. */
export function longNameOf(ref: FieldRef): string {
  return ref.def.options.long ?? `--${toKebab(ref.name)}`;
}

function claim<K>(table: Map<K, FieldRef>, key: K, ref: FieldRef): void {
  const previous = table.get(key);
  if (previous && previous.name !== ref.name) {
    logger.warn(`Field "${ref.name}" replaces "${previous.name}" for ${String(key)}`);
  }
  table.set(key, ref);
}

export function extractFields(schema: RecordSchema): FieldTable {
  const positional = new Map<number, FieldRef>();
  const long = new Map<string, FieldRef>();
  const short = new Map<string, FieldRef>();
  let maxPosition = -1;

  for (const [name, def] of schema.entries()) {
    const ref: FieldRef = { name, def };
    const { position } = def.options;

    if (position !== undefined) {
      claim(positional, position, ref);
      maxPosition = Math.max(maxPosition, position);
      if (def.options.long !== undefined) claim(long, def.options.long, ref);
    } else {
      claim(long, longNameOf(ref), ref);
    }

    if (def.options.short !== undefined) claim(short, def.options.short, ref);
  }

  return { positional, long, short, maxPosition };
}
