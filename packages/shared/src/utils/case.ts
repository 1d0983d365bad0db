/**
 * Identifier case helpers for deriving option names and help labels
 * from camelCase field names.
 */

const UPPERCASE = /\p{Lu}/u;

function splitOnUpper(name: string, separator: string): string {
  let out = "";
  let index = 0;
  for (const ch of name) {
    if (UPPERCASE.test(ch)) {
      if (index > 0) out += separator;
      out += ch.toLowerCase();
    } else {
      out += ch;
    }
    index++;
  }
  return out;
}

/**
 * camelCase/PascalCase to kebab-case.
 *   - outDir -> out-dir
 */
export function toKebab(name: string): string {
  return splitOnUpper(name, "-");
}

/**
 * camelCase/PascalCase to space-separated lowercase words.
 *   - filePath -> file path
 */
export function toWords(name: string): string {
  return splitOnUpper(name, " ");
}
