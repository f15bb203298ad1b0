import { MacroError } from "./errors";

export type MacroFunc = (...args: string[]) => string;

export type MacroTable = Readonly<Record<string, MacroFunc>>;

type Token = { kind: "ident"; value: string } | { kind: "string"; value: string };

const IDENT_RE = /^[A-Za-z_]\w*/;
const STRING_RE = /^"(?:[^"\\\n]|\\.)*"/;
const RAW_STRING_RE = /^`[^`]*`/;

function parseString(s: string, action: string): string {
  try {
    return JSON.parse(s);
  } catch {
    throw new MacroError("", `invalid string ${s} in {{${action}}}`);
  }
}

function tokenize(action: string): Token[] {
  const tokens: Token[] = [];
  let rest = action.trimStart();
  while (rest) {
    const m = IDENT_RE.exec(rest) ?? STRING_RE.exec(rest) ?? RAW_STRING_RE.exec(rest);
    if (!m) {
      throw new MacroError("", `unexpected ${JSON.stringify(rest[0])} in {{${action}}}`);
    }
    const s = m[0];
    if (s[0] === '"') {
      tokens.push({ kind: "string", value: parseString(s, action) });
    } else if (s[0] === "`") {
      tokens.push({ kind: "string", value: s.slice(1, -1) });
    } else {
      tokens.push({ kind: "ident", value: s });
    }
    rest = rest.slice(s.length).trimStart();
  }
  return tokens;
}

function call(action: string, table: MacroTable): string {
  const [head, ...args] = tokenize(action);
  if (!head) {
    throw new MacroError("", "missing value for {{}}");
  }
  if (head.kind === "string") {
    if (args.length > 0) {
      throw new MacroError("", `can't give argument to non-function ${JSON.stringify(head.value)}`);
    }
    return head.value;
  }

  const fn = Object.hasOwn(table, head.value) ? table[head.value] : undefined;
  if (!fn) {
    throw new MacroError(head.value, `function ${JSON.stringify(head.value)} not defined`);
  }
  const strings: string[] = [];
  for (const arg of args) {
    if (arg.kind !== "string") {
      throw new MacroError(head.value, `${head.value}: argument ${arg.value} is not a string`);
    }
    strings.push(arg.value);
  }
  try {
    return fn(...strings);
  } catch (err) {
    if (err instanceof MacroError) throw err;
    throw new MacroError(head.value, `${head.value}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Expands `{{ Name "arg" ... }}` actions in `text` with functions from
 * `table`. A lone string literal expands to itself, so `{{ "{{" }}` writes
 * literal braces.
 */
export function expandMacros(text: string, table: MacroTable): string {
  let out = "";
  let i = 0;
  while (true) {
    const open = text.indexOf("{{", i);
    if (open === -1) break;
    const close = text.indexOf("}}", open + 2);
    if (close === -1) {
      throw new MacroError("", `unclosed action starting at ${JSON.stringify(text.slice(open, open + 20))}`);
    }
    out += text.slice(i, open) + call(text.slice(open + 2, close), table);
    i = close + 2;
  }
  return out + text.slice(i);
}
