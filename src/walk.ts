import type { Dirent } from "fs";
import { lstat, readdir, stat } from "fs/promises";
import { join } from "path";

export interface WalkEntry {
  path: string;
  /** posix path relative to the walk root */
  rel: string;
  isDirectory: boolean;
  mtime: Date;
}

export interface WalkFailure {
  path: string;
  rel: string;
  error: Error;
}

export type WalkItem = WalkEntry | WalkFailure;

export function isWalkFailure(item: WalkItem): item is WalkFailure {
  return "error" in item;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Walks `root` depth-first with siblings in lexical order. The root itself is
 * not yielded. A directory that can't be read yields one failure and its
 * subtree is skipped, the rest of the walk continues. Symlinks to files are
 * yielded as the file they point to, symlinks to directories are skipped.
 */
export async function* walk(root: string, rel = ""): AsyncGenerator<WalkItem> {
  const dir = rel ? join(root, rel) : root;
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    yield { path: dir, rel: rel || ".", error: toError(err) };
    return;
  }

  for (const dirent of dirents.sort(byName)) {
    const childRel = rel ? `${rel}/${dirent.name}` : dirent.name;
    const path = join(root, childRel);
    let entry: WalkEntry;
    try {
      const link = await lstat(path);
      const info = link.isSymbolicLink() ? await stat(path) : link;
      if (link.isSymbolicLink() && info.isDirectory()) continue;
      entry = { path, rel: childRel, isDirectory: info.isDirectory(), mtime: info.mtime };
    } catch (err) {
      yield { path, rel: childRel, error: toError(err) };
      continue;
    }
    yield entry;
    if (entry.isDirectory) {
      yield* walk(root, childRel);
    }
  }
}
