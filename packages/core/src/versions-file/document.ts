// ============================================
// depsync Versions Document
// ============================================

/** Marker of the single comment line that records the last update date */
export const TIMESTAMP_PREFIX = "# Updated:";

/**
 * One physical line of a versions file. `raw` is the line exactly as read,
 * including a trailing `\r` for CRLF files.
 */
export type VersionsLine =
  | { kind: "blank"; raw: string }
  | { kind: "comment"; raw: string }
  | { kind: "timestamp"; raw: string }
  | {
      kind: "entry";
      raw: string;
      key: string;
      value: string;
      /** Original text up to the value: indentation, key, `=` and any spaces after it */
      prefix: string;
    }
  | { kind: "malformed"; raw: string };

/** Ordered key → raw value map. Later duplicates win. */
export type VersionsMap = ReadonlyMap<string, string>;

export interface VersionsDocument {
  readonly lines: readonly VersionsLine[];
  readonly values: VersionsMap;
}

/** Keys to rewrite, mapped to their new values */
export type VersionUpdates = Readonly<Record<string, string>>;

function splitCarriageReturn(raw: string): { body: string; eol: string } {
  return raw.endsWith("\r") ? { body: raw.slice(0, -1), eol: "\r" } : { body: raw, eol: "" };
}

function classifyLine(raw: string): VersionsLine {
  const trimmed = raw.trim();
  if (trimmed === "") {
    return { kind: "blank", raw };
  }
  if (raw.startsWith(TIMESTAMP_PREFIX)) {
    return { kind: "timestamp", raw };
  }
  if (trimmed.startsWith("#")) {
    return { kind: "comment", raw };
  }

  const { body } = splitCarriageReturn(raw);
  const equalsIndex = body.indexOf("=");
  if (equalsIndex === -1) {
    return { kind: "malformed", raw };
  }

  const key = body.slice(0, equalsIndex).trim();
  if (key === "") {
    return { kind: "malformed", raw };
  }

  const afterEquals = body.slice(equalsIndex + 1);
  const spacing = /^[ \t]*/.exec(afterEquals)?.[0] ?? "";
  return {
    kind: "entry",
    raw,
    key,
    value: afterEquals.trim(),
    prefix: body.slice(0, equalsIndex + 1) + spacing,
  };
}

/**
 * Parse versions file content into line records and a key/value map.
 * Lines that are neither blank, comments nor `KEY=VALUE` are kept as
 * `malformed` and contribute no value.
 */
export function parseVersionsContent(content: string): VersionsDocument {
  const lines = content.split("\n").map(classifyLine);
  const values = new Map<string, string>();
  for (const line of lines) {
    if (line.kind === "entry") {
      values.set(line.key, line.value);
    }
  }
  return { lines, values };
}

/**
 * Format a date as `YYYY-MM-DD` in local time.
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Render a document back to text, replacing the values of `updates` keys
 * and the timestamp anchor. Every other line is emitted unchanged. Keys
 * that do not appear in the document are ignored.
 */
export function renderVersionsDocument(
  document: VersionsDocument,
  updates: VersionUpdates,
  now: Date
): string {
  return document.lines
    .map((line) => {
      switch (line.kind) {
        case "timestamp": {
          const { eol } = splitCarriageReturn(line.raw);
          return `${TIMESTAMP_PREFIX} ${formatDate(now)}${eol}`;
        }
        case "entry": {
          const next = Object.hasOwn(updates, line.key) ? updates[line.key] : undefined;
          if (next === undefined) {
            return line.raw;
          }
          const { eol } = splitCarriageReturn(line.raw);
          return `${line.prefix}${next}${eol}`;
        }
        default:
          return line.raw;
      }
    })
    .join("\n");
}
