/**
 * Field builders for record parameters.
 *
 * Each builder returns a new immutable FieldDef, so definitions can be
 * shared between records:
 *
 *   const Args = record({
 *     input: field.string().arg(0).help("input file"),
 *     output: field.string().long("--out").short("-o"),
 *     useMarkdown: field.bool(),
 *     limit: field.int().optional(),
 *   });
 */

import type { Kind } from "@cmdbind/sdk";

export interface FieldOptions {
  /** Positional index, relative to the tokens handed to the record. */
  readonly position?: number;
  /** Long option name including its dashes, e.g. "--out". */
  readonly long?: string;
  /** Short option name including its dash, e.g. "-o". */
  readonly short?: string;
  readonly help?: string;
}

export class FieldDef<K extends Kind = Kind, O extends boolean = boolean> {
  constructor(
    readonly kind: K,
    readonly isOptional: O,
    readonly options: FieldOptions = {},
  ) {}

  /** Bind this field by position instead of by name. */
  arg(position: number): FieldDef<K, O> {
    return new FieldDef(this.kind, this.isOptional, { ...this.options, position });
  }

  long(name: string): FieldDef<K, O> {
    return new FieldDef(this.kind, this.isOptional, { ...this.options, long: name });
  }

  short(name: string): FieldDef<K, O> {
    return new FieldDef(this.kind, this.isOptional, { ...this.options, short: name });
  }

  help(text: string): FieldDef<K, O> {
    return new FieldDef(this.kind, this.isOptional, { ...this.options, help: text });
  }

  /** Leave the field undefined when no value is supplied. */
  optional(): FieldDef<K, true> {
    return new FieldDef(this.kind, true, this.options);
  }

  /** Bool fields never take a value token. */
  get isFlag(): boolean {
    return this.kind === "bool";
  }
}

export const field = {
  string: (): FieldDef<"string", false> => new FieldDef("string", false),
  int: (): FieldDef<"int", false> => new FieldDef("int", false),
  int64: (): FieldDef<"int64", false> => new FieldDef("int64", false),
  float64: (): FieldDef<"float64", false> => new FieldDef("float64", false),
  bool: (): FieldDef<"bool", false> => new FieldDef("bool", false),
};
