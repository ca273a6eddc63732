/**
 * Minimal `key=value` properties reader.
 *
 * Only what the publish flow needs: one pair per line, split on the first
 * "=", `#`/`!` comments. No escapes, no continuation lines, no ":" separator.
 */
import fs from "node:fs";

export function parseProperties(text: string): Map<string, string> {
  const props = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;

    const eq = line.indexOf("=");
    if (eq < 0) continue;

    const key = line.slice(0, eq).trim();
    if (!key || props.has(key)) continue;
    props.set(key, line.slice(eq + 1).trim());
  }

  return props;
}

export function readProperty(text: string, key: string): string | undefined {
  return parseProperties(text).get(key);
}

/**
 * Reads `key` from the properties file at `filePath`.
 * Missing file or key -> undefined; whether that matters depends on the mode.
 */
export function resolveVersion(filePath: string, key: string): string | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  const value = readProperty(fs.readFileSync(filePath, "utf8"), key);
  return value ? value : undefined;
}
