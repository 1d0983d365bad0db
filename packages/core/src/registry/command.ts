/**
 * Command entries: a handler with its parameter specs and path.
 */

import {
  InvalidRegistrationError,
  UnsupportedTypeError,
  type HandlerResult,
} from "@cmdbind/sdk";
import { isParamSpec, matchesParams, type Handler, type ParamSpec } from "../schema/params.js";

export interface CommandEntry {
  /** Normalized path; "" for the root command. */
  readonly path: string;
  readonly tokens: readonly string[];
  readonly help?: string;
  readonly params: readonly ParamSpec[];
  /** Call the handler with values bound from `params`. */
  invoke(values: readonly unknown[]): HandlerResult;
}

function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/** Split a path on whitespace runs. */
export function splitPath(path: string): string[] {
  return path.split(/\s+/).filter((token) => token.length > 0);
}

export function defineCommand<const P extends readonly ParamSpec[]>(
  path: string,
  params: P,
  handler: Handler<P>,
  help?: string,
): CommandEntry {
  if (typeof path !== "string") {
    throw new InvalidRegistrationError("command path must be a string");
  }
  if (help !== undefined && typeof help !== "string") {
    throw new InvalidRegistrationError(`help for "${path}" must be a string`);
  }
  const specs: unknown = params;
  if (!isList(specs)) {
    throw new InvalidRegistrationError(`parameters for "${path}" must be an array`);
  }
  specs.forEach((spec, i) => {
    if (!isParamSpec(spec)) {
      throw new InvalidRegistrationError(`parameter ${i + 1} of "${path}" is not a kind or record`, {
        cause: new UnsupportedTypeError(String(spec)),
      });
    }
  });
  if (typeof handler !== "function") {
    throw new InvalidRegistrationError(`handler for "${path}" must be a function`);
  }

  const tokens = splitPath(path);
  const normalized = tokens.join(" ");

  return {
    path: normalized,
    tokens,
    help,
    params,
    invoke(values: readonly unknown[]): HandlerResult {
      if (!matchesParams(params, values)) {
        throw new Error(`bound values do not match the parameters of "${normalized}"`);
      }
      return handler(...values);
    },
  };
}
