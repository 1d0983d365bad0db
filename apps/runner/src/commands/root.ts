/**
 * Root command - runs when no subcommand matches.
 */

import { field, record } from "@cmdbind/core";
import type { CommandModule } from "./base.js";

const RootArgs = record({
  quiet: field.bool().short("-q").help("print nothing"),
});

export const registerRoot: CommandModule = (app, { out }) => {
  app.add("", [RootArgs], ({ quiet }) => {
    if (!quiet) out.write("Nothing to do. Run with --help to list commands.\n");
  });
};
