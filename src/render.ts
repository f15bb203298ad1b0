import { readFile } from "fs/promises";
import { posix } from "path";
import { parseMetadata, stripMetadata, type MetadataOptions } from "./frontmatter";
import { expandMacros, type MacroTable } from "./macro";
import { parse } from "./marked";
import { outputLocation, stripExt } from "./paths";
import type { Page, PathStyle } from "./typings";
import type { WalkEntry } from "./walk";

export interface RenderContext {
  pathStyle: PathStyle;
  metadata: MetadataOptions;
  macros: MacroTable;
}

export interface DocumentInput {
  /** posix path relative to the source root */
  source: string;
  raw: string;
  mtime: Date;
}

async function renderBody(raw: string, ctx: RenderContext): Promise<string> {
  return parse(expandMacros(stripMetadata(raw, ctx.metadata.marker), ctx.macros));
}

async function readMetadata(raw: string, ctx: RenderContext) {
  return parseMetadata(raw, ctx.metadata);
}

/**
 * Renders one markdown document. The metadata and the body are worked out
 * from the same input independently, the page is only returned once both are
 * done. Drafts are rendered too, leaving them out is up to the caller.
 */
export async function renderDocument(input: DocumentInput, ctx: RenderContext): Promise<Page> {
  const [{ exists, metadata }, html] = await Promise.all([readMetadata(input.raw, ctx), renderBody(input.raw, ctx)]);
  const { url, file } = outputLocation(input.source, ctx.pathStyle);
  const id = stripExt(input.source);

  return Object.freeze({
    id,
    source: input.source,
    dir: posix.dirname(input.source),
    path: url,
    file,
    title: metadata.title || posix.basename(id),
    date: exists ? metadata.time : input.mtime,
    draft: metadata.draft,
    html,
  });
}

export async function readDocument(entry: WalkEntry, ctx: RenderContext): Promise<Page> {
  const raw = await readFile(entry.path, "utf8");
  return renderDocument({ source: entry.rel, raw, mtime: entry.mtime }, ctx);
}
