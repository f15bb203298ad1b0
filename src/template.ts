import { TemplateError } from "./errors";

type Part = { raw: string } | { expr: string };

export type Render<T> = (data: T) => string;

interface Tag {
  head: string;
  tail: string;
  raw?: string;
  expr?: string;
}

function nextTag(template: string): Tag | undefined {
  const i = template.indexOf("{");
  if (i === -1) return;
  // { expr } -> eval(expr)
  // {{ text }} -> '{ text }'
  if (template[i + 1] === "{") {
    const j = template.indexOf("}}", i + 2);
    if (j !== -1) {
      return { head: template.slice(0, i), tail: template.slice(j + 2), raw: template.slice(i + 1, j + 1) };
    }
  }
  const j = template.indexOf("}", i + 1);
  if (j !== -1) {
    return { head: template.slice(0, i), tail: template.slice(j + 1), expr: template.slice(i + 1, j) };
  }
}

function split(template: string): Part[] {
  const parts: Part[] = [];
  let indentSize = 4;
  const updateIndentSize = (raw: string) => {
    const l = raw.match(/^ */)?.[0].length;
    if (l) indentSize = Math.min(indentSize, l);
  };

  for (let tag = nextTag(template); ; tag = nextTag(template)) {
    if (tag === undefined) {
      parts.push({ raw: template });
      updateIndentSize(template);
      break;
    }
    parts.push({ raw: tag.head });
    updateIndentSize(tag.head);
    if (tag.raw) {
      parts.push({ raw: tag.raw });
      updateIndentSize(tag.raw);
    }
    if (tag.expr !== undefined) {
      parts.push({ expr: tag.expr });
    }
    template = tag.tail;
  }

  // drop the newline and indentation that block tags {#x}...{/x} introduce
  let depth = 0;
  let before: Part | undefined;
  let between: Part | undefined;
  for (const part of parts) {
    if ("raw" in part && depth > 0 && part.raw) {
      part.raw = part.raw.trimStart().replace(new RegExp(`^ {${depth * indentSize}}`, "gm"), "");
    }
    if ("expr" in part) {
      const expr = part.expr.trim();
      if (expr[0] === "#" && !expr.startsWith("#else")) {
        depth++;
        // whitespace between {/last}...{#current}
        if (before && "expr" in before && before.expr.trim()[0] === "/" && between && "raw" in between) {
          between.raw = between.raw.trimEnd();
        }
      } else if (expr[0] === "/") {
        depth--;
      }
    }
    before = between;
    between = part;
  }
  return parts;
}

function generate(parts: Part[]): string {
  let code = `let html = '';`;
  for (const part of parts) {
    if ("raw" in part) {
      if (part.raw) code += `html += ${JSON.stringify(part.raw)};`;
      continue;
    }
    // ' site.title '
    // '#each pages.slice(0, 20) as page'
    // '#if page.title' '#else if x' '#else'
    // '/each' '/if'
    // '@const x = 1'
    const expr = part.expr.trim();
    if (expr.startsWith("#each")) {
      const [list, x] = expr.slice(5).trim().split(" as ");
      code += `for (const ${x} of ${list}) {`;
    } else if (expr.startsWith("#if")) {
      code += `if (${expr.slice(3).trim()}) {`;
    } else if (expr.startsWith("#else if")) {
      code += `} else if (${expr.slice(8).trim()}) {`;
    } else if (expr === "#else") {
      code += `} else {`;
    } else if (expr.startsWith("/")) {
      code += "}";
    } else if (expr.startsWith("@")) {
      code += `${expr.slice(1).trim()};`;
    } else {
      code += `html += (${expr}) ?? '';`;
    }
  }
  return code + `return html;`;
}

/**
 * Compiles `template` into a render function whose argument is destructured
 * into `names`. `name` identifies the template in errors.
 */
export function compile<T extends object>(template: string, names: readonly (keyof T & string)[], name = "template"): Render<T> {
  let fn: Function;
  try {
    fn = new Function(`{ ${names.join(", ")} }`, generate(split(template)));
  } catch (cause) {
    throw new TemplateError(name, "parse", { cause });
  }
  return (data) => {
    try {
      return String(fn(data));
    } catch (cause) {
      throw new TemplateError(name, "execute", { cause });
    }
  };
}
