/**
 * Stores command entries by path and resolves input
 * tokens to the entry with the longest matching path.
 *
 * Paths are compared token by token and a token must match exactly.
 * Normalized paths are unique, so two candidates never tie on length.
 * The entry at the empty path is the root command: it is used when no
 * other path matches.
 */

import { UnknownCommandError } from "@cmdbind/sdk";
import { createLogger } from "@cmdbind/shared";
import { splitPath, type CommandEntry } from "./command.js";

const logger = createLogger("CommandRegistry");

export interface Resolution {
  entry: CommandEntry;
  /** Number of input tokens matched by the entry's path. */
  consumed: number;
}

export interface CommandRegistry {
  /** Add an entry, replacing any entry at the same path in place. */
  register(entry: CommandEntry): void;
  get(path: string): CommandEntry | undefined;
  root(): CommandEntry | undefined;
  /** Non-root entries in registration order. */
  list(): CommandEntry[];
  /** Throws UnknownCommandError when nothing matches and there is no root. */
  resolve(tokens: readonly string[]): Resolution;
}

function matchesPrefix(entry: CommandEntry, tokens: readonly string[]): boolean {
  if (entry.tokens.length > tokens.length) return false;
  return entry.tokens.every((token, i) => tokens[i] === token);
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, CommandEntry>();
  let rootEntry: CommandEntry | undefined;

  return {
    register(entry: CommandEntry): void {
      if (entry.path === "") {
        logger.debug("Registering root command");
        rootEntry = entry;
        return;
      }
      logger.debug(`Registering command: ${entry.path}`);
      commands.set(entry.path, entry);
    },

    get(path: string): CommandEntry | undefined {
      const normalized = splitPath(path).join(" ");
      return normalized === "" ? rootEntry : commands.get(normalized);
    },

    root(): CommandEntry | undefined {
      return rootEntry;
    },

    list(): CommandEntry[] {
      return [...commands.values()];
    },

    resolve(tokens: readonly string[]): Resolution {
      let best: CommandEntry | undefined;
      for (const entry of commands.values()) {
        if (!matchesPrefix(entry, tokens)) continue;
        if (!best || entry.tokens.length > best.tokens.length) best = entry;
      }

      if (best) {
        logger.debug(`Resolved command: ${best.path}`);
        return { entry: best, consumed: best.tokens.length };
      }
      if (rootEntry) {
        logger.debug("Falling back to root command");
        return { entry: rootEntry, consumed: 0 };
      }
      throw new UnknownCommandError(tokens[0] ?? "");
    },
  };
}
