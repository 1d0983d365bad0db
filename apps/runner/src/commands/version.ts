/**
 * Version command - display version information.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { field, record } from "@cmdbind/core";
import type { CommandModule } from "./base.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

const VersionArgs = record({
  verbose: field.bool().short("-v").help("show runtime details"),
});

export function readVersion(pkgPath = resolve(__dirname, "../../package.json")): string {
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  return PackageJsonSchema.parse(pkg).version;
}

export const registerVersion: CommandModule = (app, { out }) => {
  app.add("version", "Display version information", [VersionArgs], ({ verbose }) => {
    let version: string;
    try {
      version = readVersion();
    } catch (err) {
      return new Error("failed to read version information", { cause: err });
    }

    out.write(`cmdbind-demo v${version}\n`);
    if (verbose) {
      out.write(`Node.js ${process.version}\n`);
      out.write(`Platform: ${process.platform} ${process.arch}\n`);
    }
  });
};
