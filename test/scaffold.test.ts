import { join } from "path";
import { describe, expect, test } from "vitest";
import { Builder } from "../src/build";
import { loadConfig } from "../src/config";
import { silent } from "../src/log";
import { initSite } from "../src/scaffold";
import { readTree, tempDir } from "./helpers";

describe("initSite", () => {
  test("creates a site that builds", async () => {
    const cwd = join(await tempDir(), "site");
    const files = await initSite(cwd);
    expect(files).toEqual([
      "quire.yml",
      "src/css/style.css",
      "src/index.html",
      "src/posts/hello-world.md",
      "src/posts/layout.tmpl",
      "src/robots.txt",
    ]);

    const config = await loadConfig(cwd);
    expect(config.title).toBe("My site");
    const result = await new Builder({ cwd, config, logger: silent }).run();
    expect(result).toMatchObject({ ok: true, pages: 1, drafts: 0 });

    const out = await readTree(join(cwd, "build"));
    expect(out.get("index.html")?.toString()).toContain('<a href="/posts/hello-world/">Hello, world</a>');
    expect(out.get("posts/hello-world/index.html")?.toString()).toContain("<h1>Hello, world</h1>");
  });

  test("refuses an existing path", async () => {
    const cwd = await tempDir();
    await expect(initSite(cwd)).rejects.toThrowError(`quire: path ${JSON.stringify(cwd)} already exists`);
  });
});
