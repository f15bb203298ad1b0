import { MetadataError } from "./errors";

/**
 * Metadata block at the top of markdown files.
 *
 * ```
 * +++
 * time = "2006-01-02 15:04:05 -07:00"
 * title = "Hello, world"
 * draft = true
 * +++
 * ```
 */
export interface Metadata {
  title: string;
  draft: boolean;
  time: Date;
}

export interface MetadataOptions {
  /** Line opening and closing the block. default: "+++" */
  marker?: string;
  /** Separator between key and value. default: "=" */
  separator?: string;
  /** Time used when the block has no `time` key. */
  now: Date;
}

export interface ParsedDocument {
  exists: boolean;
  metadata: Metadata;
  body: string;
}

export const DEFAULT_MARKER = "+++";
export const DEFAULT_SEPARATOR = "=";

interface TimeFormat {
  name: string;
  re: RegExp;
}

/** Accepted formats for `time`, first match wins. */
export const TIME_FORMATS: readonly TimeFormat[] = [
  { name: "YYYY-MM-DD HH:mm:ss ±hh:mm", re: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2}):(\d{2})$/ },
  { name: "YYYY-MM-DD HH:mm:ss", re: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/ },
  { name: "YYYY-MM-DD", re: /^(\d{4})-(\d{2})-(\d{2})$/ },
];

const LINE_RE = /\r?\n/;

export function parseTime(value: string): Date | null {
  for (const { re } of TIME_FORMATS) {
    const m = re.exec(value);
    if (!m) continue;
    const [year, month, day, hour = 0, minute = 0, second = 0] = m.slice(1, 7).map((s) => (s ? Number(s) : 0));
    const utc = Date.UTC(year, month - 1, day, hour, minute, second);
    const date = new Date(utc);
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      hour > 23 ||
      minute > 59 ||
      second > 59
    ) {
      return null;
    }
    if (m[7]) {
      const offset = (Number(m[8]) * 60 + Number(m[9])) * 60_000;
      return new Date(m[7] === "+" ? utc - offset : utc + offset);
    }
    return date;
  }
  return null;
}

function unquote(s: string): string {
  s = s.trim();
  if (s.length < 2 || (s[0] !== '"' && s[0] !== "'") || s[s.length - 1] !== s[0]) {
    return s;
  }
  if (s[0] === "'") {
    return s.slice(1, -1);
  }
  try {
    const value: unknown = JSON.parse(s);
    return typeof value === "string" ? value : s.slice(1, -1);
  } catch {
    // "C:\path" and other strings that are not valid json
    return s.slice(1, -1);
  }
}

function fromMap(m: Map<string, string>, now: Date): Metadata {
  const metadata: Metadata = { title: m.get("title") ?? "", draft: false, time: now };

  const draft = m.get("draft") ?? "";
  if (draft === "true") {
    metadata.draft = true;
  } else if (draft !== "" && draft !== "false") {
    throw new MetadataError("draft", draft, ["true", "false"]);
  }

  const time = m.get("time") ?? "";
  if (time !== "") {
    const parsed = parseTime(time);
    if (!parsed) {
      throw new MetadataError("time", time, TIME_FORMATS.map((f) => f.name));
    }
    metadata.time = parsed;
  }

  return metadata;
}

/**
 * Parses the metadata block of `raw`. A document without a block is not an
 * error: `exists` is false and the whole input is the body.
 */
export function parseMetadata(raw: string, options: MetadataOptions): ParsedDocument {
  const marker = options.marker ?? DEFAULT_MARKER;
  const separator = (options.separator ?? DEFAULT_SEPARATOR).trim();
  const lines = raw.split(LINE_RE);

  if (lines[0] !== marker) {
    return { exists: false, metadata: { title: "", draft: false, time: options.now }, body: raw };
  }

  const m = new Map<string, string>();
  let end = -1;
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line === marker) {
      end = i;
      break;
    }
    if (line.trim() === "") continue;

    const at = line.indexOf(separator);
    const key = at === -1 ? "" : line.slice(0, at).trim();
    if (key === "") {
      throw new MetadataError(line, "", [], `metadata line ${JSON.stringify(line)} should be in format "key ${separator} value"`);
    }
    m.set(key, unquote(line.slice(at + separator.length)));
  }

  if (end === -1) {
    throw new MetadataError(marker, "", [], `metadata block opened with ${JSON.stringify(marker)} is never closed`);
  }

  return {
    exists: true,
    metadata: fromMap(m, options.now),
    body: trimLeadingBlankLines(lines.slice(end + 1).join("\n")),
  };
}

function trimLeadingBlankLines(s: string): string {
  return s.replace(/^(?:[ \t]*\r?\n)+/, "");
}

/** Removes the metadata block (if any) from `raw` without interpreting it. */
export function stripMetadata(raw: string, marker = DEFAULT_MARKER): string {
  const lines = raw.split(LINE_RE);
  if (lines[0] !== marker) return raw;
  const end = lines.indexOf(marker, 1);
  if (end === -1) return raw;
  return trimLeadingBlankLines(lines.slice(end + 1).join("\n"));
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +00:00`
  );
}

/** Inverse of {@link parseMetadata}, including the closing marker and newline. */
export function formatMetadata(metadata: Metadata, options: Pick<MetadataOptions, "marker" | "separator"> = {}): string {
  const marker = options.marker ?? DEFAULT_MARKER;
  const sep = (options.separator ?? DEFAULT_SEPARATOR).trim();
  const lines = [marker];
  if (metadata.title !== "") {
    lines.push(`title ${sep} ${JSON.stringify(metadata.title)}`);
  }
  if (metadata.draft) {
    lines.push(`draft ${sep} true`);
  }
  lines.push(`time ${sep} "${formatTime(metadata.time)}"`, marker);
  return lines.join("\n") + "\n";
}
