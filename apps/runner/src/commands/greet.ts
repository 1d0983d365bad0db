/**
 * Greet command - record parameters with a positional, named options and a flag.
 *
 *   greet Ada --greeting=Hi -s --times 2
 */

import { field, record } from "@cmdbind/core";
import type { CommandModule } from "./base.js";

export const GreetArgs = record({
  name: field.string().arg(0).help("who to greet"),
  greeting: field.string().short("-g").help("greeting word (default Hello)"),
  shout: field.bool().short("-s").help("print in upper case"),
  times: field.int().optional().help("repeat count"),
});

export const registerGreet: CommandModule = (app, { out }) => {
  app.add("greet", "Greet someone", [GreetArgs], (args) => {
    const times = args.times ?? 1;
    if (times < 1) return new Error(`--times must be at least 1, got ${times}`);

    const line = `${args.greeting || "Hello"}, ${args.name}!`;
    const text = args.shout ? line.toUpperCase() : line;
    for (let i = 0; i < times; i++) out.write(`${text}\n`);
  });
};
