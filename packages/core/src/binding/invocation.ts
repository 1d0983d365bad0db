/**
 * Binds the tokens after a command path to the
 * handler's declared parameters.
 *
 * Record mode (some parameter is a record): parameters are bound left to
 * right over one cursor. Primitive parameters take one token each; a record
 * parameter takes what the record binder consumes. Leftover tokens are
 * ignored.
 *
 * Positional mode (no record parameter): long-option tokens are rejected,
 * the token count must equal the parameter count, and each token is
 * coerced in place.
 */

import {
  ArgCountMismatchError,
  ArgumentBindingError,
  CliError,
  InsufficientArgsError,
  UnknownOptionError,
  type Kind,
  type Primitive,
} from "@cmdbind/sdk";
import { coerce } from "../coercion/coerce.js";
import { isRecordParam, type ParamSpec } from "../schema/params.js";
import { bindRecord, type RecordFields } from "./record-binder.js";

export type BoundValue = Primitive | RecordFields;

function coerceParam(command: string, index: number, token: string, kind: Kind): Primitive {
  try {
    return coerce(token, kind);
  } catch (err) {
    if (err instanceof CliError) throw new ArgumentBindingError(`arg ${index + 1}`, err, command);
    throw err;
  }
}

function bindRecordMode(command: string, params: readonly ParamSpec[], tokens: readonly string[]): BoundValue[] {
  let cursor = 0;
  return params.map((spec, i) => {
    if (isRecordParam(spec)) {
      try {
        const bound = bindRecord(tokens.slice(cursor), spec);
        cursor += bound.consumed;
        return bound.value;
      } catch (err) {
        if (err instanceof CliError) throw new ArgumentBindingError(`record arg ${i + 1}`, err, command);
        throw err;
      }
    }
    if (cursor >= tokens.length) {
      throw new InsufficientArgsError(
        `not enough arguments for ${command}: want ${params.length}, got ${tokens.length}`,
      );
    }
    return coerceParam(command, i, tokens[cursor++], spec);
  });
}

function bindPositionalMode(command: string, params: readonly Kind[], tokens: readonly string[]): BoundValue[] {
  const option = tokens.find((token) => token.startsWith("--"));
  if (option !== undefined) throw new UnknownOptionError(option);
  if (tokens.length !== params.length) {
    throw new ArgCountMismatchError(command, params.length, tokens.length);
  }
  return params.map((kind, i) => coerceParam(command, i, tokens[i], kind));
}

/**
 * Bind tokens to parameters, one value per parameter.
 * Throws a CliError describing the first failure.
 */
export function bindArguments(
  command: string,
  params: readonly ParamSpec[],
  tokens: readonly string[],
): BoundValue[] {
  const kinds: Kind[] = [];
  for (const spec of params) {
    if (isRecordParam(spec)) return bindRecordMode(command, params, tokens);
    kinds.push(spec);
  }
  return bindPositionalMode(command, kinds, tokens);
}
