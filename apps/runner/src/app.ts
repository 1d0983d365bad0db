/**
 * Demo app wiring: every command module registered on one app.
 */

import { createApp, type App, type AppOptions } from "@cmdbind/core";
import type { CommandModule } from "./commands/base.js";
import { registerGreet } from "./commands/greet.js";
import { registerMath } from "./commands/math.js";
import { registerRoot } from "./commands/root.js";
import { registerVersion } from "./commands/version.js";

export const PROGRAM_NAME = "cmdbind-demo";

const COMMANDS: CommandModule[] = [registerRoot, registerMath, registerGreet, registerVersion];

export function createRunnerApp(options: AppOptions = {}): App {
  const out = options.out ?? process.stdout;
  const app = createApp({ programName: PROGRAM_NAME, ...options, out });
  for (const register of COMMANDS) register(app, { out });
  return app;
}

/**
 * Run the demo the way the command line does: failures go to the error sink
 * and end the process with status 1.
 */
export function main(argv: readonly string[], options: AppOptions = {}): Error | undefined {
  return createRunnerApp({ exitOnFailure: true, argv: () => argv, ...options }).run();
}
