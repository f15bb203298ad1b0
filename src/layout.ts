import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join, posix } from "path";
import type { Collections } from "./collection";
import { TemplateError } from "./errors";
import { minify } from "./minify";
import { compile, type Render } from "./template";
import { TEMPLATE_ARGS, type Page, type SiteInfo, type TemplateArgs } from "./typings";

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function escapeHtml(text: unknown): string {
  return String(text ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/** Reads and compiles the template at `file`. */
export async function loadTemplate(file: string): Promise<Render<TemplateArgs>> {
  let source: string;
  try {
    source = await readFile(file, "utf8");
  } catch (cause) {
    throw new TemplateError(file, "missing", { cause });
  }
  return compile<TemplateArgs>(source, TEMPLATE_ARGS, file);
}

/**
 * Compiled layout per directory. The first page of a directory starts the
 * compile and every later page awaits the same promise.
 */
export class LayoutCache {
  private readonly layouts = new Map<string, Promise<Render<TemplateArgs>>>();

  constructor(readonly filename: string) {}

  get size(): number {
    return this.layouts.size;
  }

  resolve(dir: string): Promise<Render<TemplateArgs>> {
    let layout = this.layouts.get(dir);
    if (!layout) {
      layout = loadTemplate(join(dir, this.filename));
      this.layouts.set(dir, layout);
    }
    return layout;
  }
}

export interface ComposeContext {
  srcDir: string;
  outDir: string;
  site: SiteInfo;
  collections: Collections;
  all: TemplateArgs["all"];
  layouts: LayoutCache;
  minify: boolean;
}

export async function writeOutput(file: string, data: string | Buffer): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, data);
}

async function finish(html: string, ctx: ComposeContext): Promise<string> {
  return ctx.minify ? minify("text/html", html) : html;
}

function args(ctx: ComposeContext, dir: string, page: Page | undefined): TemplateArgs {
  return {
    site: ctx.site,
    page,
    pages: ctx.collections.get(dir) ?? [],
    all: ctx.all,
    format_date: formatDate,
    escape: escapeHtml,
  };
}

/** Renders `page` through its directory's layout and writes `page.file`. */
export async function composePage(page: Page, ctx: ComposeContext): Promise<string> {
  const layout = await ctx.layouts.resolve(join(ctx.srcDir, page.dir));
  const html = await finish(layout(args(ctx, page.dir, page)), ctx);
  const file = join(ctx.outDir, page.file);
  await writeOutput(file, html);
  return file;
}

/**
 * Renders a stand-alone `.html` template (`rel` is relative to the source
 * root) against its directory's collection, writing it to the same place
 * under the output root.
 */
export async function composeTemplate(rel: string, ctx: ComposeContext): Promise<string> {
  const render = await loadTemplate(join(ctx.srcDir, rel));
  const html = await finish(render(args(ctx, posix.dirname(rel), undefined)), ctx);
  const file = join(ctx.outDir, rel);
  await writeOutput(file, html);
  return file;
}
