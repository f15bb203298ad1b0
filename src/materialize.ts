import { copyFile, mkdir, readFile } from "fs/promises";
import { dirname, join, posix } from "path";
import { BuildError } from "./errors";
import { composePage, composeTemplate, writeOutput, type ComposeContext } from "./layout";
import { assetType, minify, type ContentType } from "./minify";
import { isMarkdown } from "./paths";
import type { Page } from "./typings";
import type { WalkEntry } from "./walk";

export type FileRole =
  | { kind: "directory" }
  | { kind: "layout" }
  | { kind: "markdown" }
  | { kind: "template" }
  | { kind: "asset"; type: ContentType }
  | { kind: "copy" };

export function classify(entry: WalkEntry, layoutName: string): FileRole {
  if (entry.isDirectory) return { kind: "directory" };
  const name = posix.basename(entry.rel);
  if (name === layoutName) return { kind: "layout" };
  if (isMarkdown(name)) return { kind: "markdown" };
  if (posix.extname(name).toLowerCase() === ".html") return { kind: "template" };
  const type = assetType(name);
  return type ? { kind: "asset", type } : { kind: "copy" };
}

export interface MaterializeContext extends ComposeContext {
  /** rendered pages by source path */
  pages: ReadonlyMap<string, Page>;
}

export type Outcome = "skipped" | "page" | "file";

/** Output file of `entry` relative to the output root, undefined when nothing is written. */
export function outputTarget(entry: WalkEntry, role: FileRole, pages: ReadonlyMap<string, Page>): string | undefined {
  switch (role.kind) {
    case "directory":
    case "layout":
      return undefined;
    case "markdown": {
      const page = pages.get(entry.rel);
      return page && !page.draft ? page.file : undefined;
    }
    default:
      return entry.rel;
  }
}

/** Writes the output for one entry of the source tree. */
export async function materialize(entry: WalkEntry, role: FileRole, ctx: MaterializeContext): Promise<Outcome> {
  const target = join(ctx.outDir, entry.rel);
  switch (role.kind) {
    case "directory":
    case "layout":
      return "skipped";

    case "markdown": {
      const page = ctx.pages.get(entry.rel);
      if (!page) {
        throw new BuildError("layout", entry.rel, new Error("page was not rendered"));
      }
      if (page.draft) return "skipped";
      await wrap("layout", entry.rel, composePage(page, ctx));
      return "page";
    }

    case "template":
      await wrap("template", entry.rel, composeTemplate(entry.rel, ctx));
      return "file";

    case "asset": {
      if (!ctx.minify) {
        await copy(entry, target);
        return "file";
      }
      const text = await wrap("minify", entry.rel, readFile(entry.path, "utf8").then((s) => minify(role.type, s)));
      await wrap("write", entry.rel, writeOutput(target, text));
      return "file";
    }

    case "copy":
      await copy(entry, target);
      return "file";
  }
}

async function copy(entry: WalkEntry, target: string): Promise<void> {
  await wrap(
    "copy",
    entry.rel,
    mkdir(dirname(target), { recursive: true }).then(() => copyFile(entry.path, target)),
  );
}

async function wrap<T>(op: BuildError["op"], path: string, work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    throw BuildError.wrap(op, path, err);
  }
}
