/**
 * App options, validated with zod when the app is created.
 */

import { z } from "zod";
import type { OutputSink } from "@cmdbind/sdk";
import type { Logger } from "@cmdbind/shared";

function hasMethods(value: unknown, ...names: string[]): boolean {
  if (typeof value !== "object" || value === null) return false;
  return names.every((name) => typeof Reflect.get(value, name) === "function");
}

const isFunction = (value: unknown): boolean => typeof value === "function";

export const AppOptionsSchema = z
  .object({
    /** Write the failure message to `err` and call `exit(1)` when a run fails. */
    exitOnFailure: z.boolean().default(false),
    out: z.custom<OutputSink>((value) => hasMethods(value, "write"), "out must have a write method").optional(),
    err: z.custom<OutputSink>((value) => hasMethods(value, "write"), "err must have a write method").optional(),
    exit: z.custom<(code: number) => void>(isFunction, "exit must be a function").optional(),
    /** Supplies the tokens for `run()` when none are passed. */
    argv: z.custom<() => readonly string[]>(isFunction, "argv must be a function").optional(),
    /** Shown in place of the root command's empty path. */
    programName: z.string().min(1, "programName must not be empty").default("command"),
    logger: z
      .custom<Logger>(
        (value) => hasMethods(value, "debug", "warn", "error", "child", "setContext", "time"),
        "logger must be a Logger",
      )
      .optional(),
  })
  .strict();

export type AppOptions = z.input<typeof AppOptionsSchema>;
export type ResolvedAppOptions = z.output<typeof AppOptionsSchema>;
