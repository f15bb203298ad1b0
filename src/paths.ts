import { posix } from "path";
import type { PathStyle } from "./typings";

export const MARKDOWN_EXTS = new Set([".md", ".markdown"]);

export function stripExt(p: string): string {
  const ext = posix.extname(p);
  return ext ? p.slice(0, -ext.length) : p;
}

export function isMarkdown(p: string): boolean {
  return MARKDOWN_EXTS.has(posix.extname(p).toLowerCase());
}

export interface OutputLocation {
  /** http path, e.g. "/posts/hello/" */
  url: string;
  /** file relative to the output root, e.g. "posts/hello/index.html" */
  file: string;
}

/**
 * Where the markdown file at `source` (posix, relative to the source root)
 * lives in the output tree. Both the page's path and the written file come
 * from here so they always agree.
 */
export function outputLocation(source: string, style: PathStyle): OutputLocation {
  const stem = stripExt(source);
  if (style === "flat") {
    return { url: `/${stem}.html`, file: `${stem}.html` };
  }
  if (posix.basename(stem) === "index") {
    const dir = posix.dirname(stem);
    return dir === "." ? { url: "/", file: "index.html" } : { url: `/${dir}/`, file: `${dir}/index.html` };
  }
  return { url: `/${stem}/`, file: `${stem}/index.html` };
}
