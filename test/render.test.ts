import { describe, expect, test } from "vitest";
import { MacroError, MetadataError } from "../src/errors";
import { plugins } from "../src/plugins";
import { renderDocument, type RenderContext } from "../src/render";

const now = new Date("2024-06-01T12:00:00Z");
const mtime = new Date("2023-03-04T05:06:07Z");

const ctx: RenderContext = { pathStyle: "directory", metadata: { now }, macros: plugins };

describe("renderDocument", () => {
  test("renders metadata and body into a page", async () => {
    const page = await renderDocument(
      { source: "posts/hello.md", raw: '+++\ntitle = "Hello"\ntime = "2020-01-02"\n+++\n\n# Hi there\n', mtime },
      ctx,
    );
    expect(page).toEqual({
      id: "posts/hello",
      source: "posts/hello.md",
      dir: "posts",
      path: "/posts/hello/",
      file: "posts/hello/index.html",
      title: "Hello",
      date: new Date("2020-01-02T00:00:00Z"),
      draft: false,
      html: '<h1 id="hi-there">Hi there</h1>\n',
    });
    expect(Object.isFrozen(page)).toBe(true);
  });

  test("without a block, falls back to the file name and mtime", async () => {
    const page = await renderDocument({ source: "notes/todo.md", raw: "plain text\n", mtime }, ctx);
    expect(page.title).toBe("todo");
    expect(page.date).toBe(mtime);
    expect(page.html).toBe("<p>plain text</p>\n");
  });

  test("a block without time takes the build time", async () => {
    const page = await renderDocument({ source: "a.md", raw: '+++\ntitle = "A"\n+++\n', mtime }, ctx);
    expect(page.date).toBe(now);
  });

  test("keeps drafts, flagged", async () => {
    const page = await renderDocument({ source: "a.md", raw: "+++\ndraft = true\n+++\ntext\n", mtime }, ctx);
    expect(page.draft).toBe(true);
  });

  test("flat path style", async () => {
    const page = await renderDocument({ source: "posts/a.md", raw: "", mtime }, { ...ctx, pathStyle: "flat" });
    expect(page.path).toBe("/posts/a.html");
    expect(page.file).toBe("posts/a.html");
  });

  test("expands macros before markdown", async () => {
    const one = await renderDocument({ source: "a.md", raw: '{{ Gist "user/abc" }}\n', mtime }, ctx);
    expect(one.html).toContain('<script src="https://gist.github.com/user/abc.js"></script>');
    const two = await renderDocument({ source: "a.md", raw: '{{ Gist "abc" "a.rb" }}\n', mtime }, ctx);
    expect(two.html).toContain('<script src="https://gist.github.com/abc.js?file=a.rb"></script>');
  });

  test("macro errors reject", async () => {
    await expect(renderDocument({ source: "a.md", raw: "{{ Gist }}\n", mtime }, ctx)).rejects.toBeInstanceOf(MacroError);
  });

  test("invalid metadata rejects", async () => {
    const rendering = renderDocument({ source: "a.md", raw: "+++\ntime = notadate\n+++\n", mtime }, ctx);
    await expect(rendering).rejects.toBeInstanceOf(MetadataError);
    await expect(rendering).rejects.toMatchObject({ key: "time", value: "notadate" });
  });

  test("headings get unique ids per document", async () => {
    const page = await renderDocument({ source: "a.md", raw: "## Intro\n\n## Intro\n", mtime }, ctx);
    expect(page.html).toBe('<h2 id="intro">Intro</h2>\n<h2 id="intro-1">Intro</h2>\n');
  });
});
