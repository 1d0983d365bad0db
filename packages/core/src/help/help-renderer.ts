/**
 * Builds usage text from the same parameter specs and field
 * metadata the binder uses, so help always describes what binding accepts.
 *
 * Every function returns the full text, one "\n" after each line.
 */

import { isKind } from "@cmdbind/sdk";
import { toWords } from "@cmdbind/shared";
import { typeLabel } from "../coercion/coerce.js";
import { longNameOf, type FieldRef } from "../schema/metadata.js";
import { isRecordParam, type ParamSpec } from "../schema/params.js";
import type { RecordSchema } from "../schema/record.js";
import type { CommandEntry } from "../registry/command.js";

const HELP_OPTION = "  -h|--help               Show this help";

function toText(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

function recordsOf(params: readonly ParamSpec[]): RecordSchema[] {
  return params.filter(isRecordParam);
}

function fieldsOf(params: readonly ParamSpec[]): FieldRef[] {
  return recordsOf(params).flatMap((schema) => schema.entries().map(([name, def]) => ({ name, def })));
}

// ─── Sections ───────────────────────────────────────────────────────────────

function argumentLines(fields: readonly FieldRef[]): string[] {
  const names = new Map<number, string>();
  for (const { name, def } of fields) {
    const { position, help } = def.options;
    if (position === undefined) continue;
    names.set(position, help !== undefined && help !== "" ? help : toWords(name));
  }
  if (names.size === 0) return [];

  const maxPosition = Math.max(...names.keys());
  const lines = ["Arguments:"];
  for (let i = 0; i <= maxPosition; i++) {
    lines.push(`  [${i}] ${names.get(i) ?? `arg${i}`}`);
  }
  lines.push("");
  return lines;
}

function optionLine(ref: FieldRef): string {
  const { short, help } = ref.def.options;
  const name = short !== undefined ? `${short}|${longNameOf(ref)}` : longNameOf(ref);
  const label = ref.def.isFlag ? "" : ` ${typeLabel(ref.def.kind)}`;
  return `  ${name}${label}    ${help ?? ""}`.trimEnd();
}

function subcommandLines(subcommands: readonly CommandEntry[] | undefined): string[] {
  if (subcommands === undefined) return [];
  return [
    "Commands:",
    ...subcommands.map((entry) => `  ${entry.path} (args: ${entry.params.length})`),
    "",
  ];
}

// ─── Renderers ──────────────────────────────────────────────────────────────

/** Help for when no command matched and there is no root command. */
export function renderGlobalHelp(entries: readonly CommandEntry[]): string {
  const width = Math.max(0, ...entries.map((entry) => entry.path.length));
  const commands = entries.map((entry) =>
    entry.help ? `  ${entry.path.padEnd(width)}  ${entry.help}` : `  ${entry.path}`,
  );
  return toText(["Usage: [options...]", "", "Commands:", ...commands, "", "Options:", HELP_OPTION]);
}

/**
 * Help for one command. `name` is shown in the usage line; pass the
 * registered subcommands when rendering the root command. Subcommands are
 * listed only when the command takes a record or no parameters.
 */
export function renderCommandHelp(
  name: string,
  entry: CommandEntry,
  subcommands?: readonly CommandEntry[],
): string {
  const lines: string[] = entry.help ? [entry.help, ""] : [];
  const { params } = entry;
  const kinds = params.filter(isKind);

  if (params.length > 0 && kinds.length === params.length) {
    lines.push(`Usage: ${name} <args...>`, "", "Arguments:");
    kinds.forEach((kind, i) => lines.push(`  [${i}] arg${i} ${typeLabel(kind)}`));
    lines.push("", "Options:", HELP_OPTION);
    return toText(lines);
  }

  const fields = fieldsOf(params);
  const args = argumentLines(fields);
  // the options shape leaves two blank lines under the usage line
  lines.push(args.length > 0 ? `Usage: ${name} <args...> [options...]` : `Usage: ${name} [options...]`, "", "");
  lines.push(...args, ...subcommandLines(subcommands), "Options:", HELP_OPTION);
  for (const ref of fields) {
    if (ref.def.options.position === undefined) lines.push(optionLine(ref));
  }
  return toText(lines);
}
