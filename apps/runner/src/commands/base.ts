/**
 * Shared shape of the demo commands.
 */

import type { App } from "@cmdbind/core";
import type { OutputSink } from "@cmdbind/sdk";

export interface CommandContext {
  /** Where command output goes; the same sink the app prints help to. */
  out: OutputSink;
}

/** Registers one or more commands on the app. */
export type CommandModule = (app: App, ctx: CommandContext) => void;
