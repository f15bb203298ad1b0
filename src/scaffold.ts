import { copyFile, mkdir, rm, stat } from "fs/promises";
import { join, resolve } from "path";
import { fileURLToPath } from "url";
import { isWalkFailure, walk } from "./walk";

/** Files copied by `quire init`, shipped next to src/ and dist/. */
export const SCAFFOLD_DIR = fileURLToPath(new URL("../scaffold", import.meta.url));

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** Creates a new site at `target`, which must not exist yet. */
export async function initSite(target: string, from = SCAFFOLD_DIR): Promise<string[]> {
  const root = resolve(target);
  if (await exists(root)) {
    throw new Error(`quire: path ${JSON.stringify(root)} already exists`);
  }

  const written: string[] = [];
  try {
    await mkdir(root, { recursive: true });
    for await (const item of walk(from)) {
      if (isWalkFailure(item)) throw item.error;
      const dest = join(root, item.rel);
      if (item.isDirectory) {
        await mkdir(dest, { recursive: true });
      } else {
        await copyFile(item.path, dest);
        written.push(item.rel);
      }
    }
  } catch (err) {
    await rm(root, { recursive: true, force: true });
    throw err;
  }
  return written;
}
