/**
 * Arithmetic commands: `add`, `math mul`, `math div`.
 */

import type { CommandModule } from "./base.js";

export const registerMath: CommandModule = (app, { out }) => {
  app.add("add", "Add two integers", ["int", "int"], (a, b) => {
    out.write(`${a + b}\n`);
  });

  app.add("math mul", "Multiply two numbers", ["float64", "float64"], (a, b) => {
    out.write(`${a * b}\n`);
  });

  app.add("math div", "Divide two numbers", ["float64", "float64"], (a, b) => {
    if (b === 0) return new Error("division by zero");
    out.write(`${a / b}\n`);
  });
};
