import { describe, expect, test } from "vitest";
import { classify } from "../src/materialize";
import { outputLocation } from "../src/paths";

describe("outputLocation", () => {
  test("flat", () => {
    expect(outputLocation("a.md", "flat")).toEqual({ url: "/a.html", file: "a.html" });
    expect(outputLocation("posts/index.markdown", "flat")).toEqual({ url: "/posts/index.html", file: "posts/index.html" });
  });

  test("directory", () => {
    expect(outputLocation("posts/a.md", "directory")).toEqual({ url: "/posts/a/", file: "posts/a/index.html" });
    expect(outputLocation("posts/index.md", "directory")).toEqual({ url: "/posts/", file: "posts/index.html" });
    expect(outputLocation("index.md", "directory")).toEqual({ url: "/", file: "index.html" });
  });
});

describe("classify", () => {
  const entry = (rel: string, isDirectory = false) => ({ path: `/site/src/${rel}`, rel, isDirectory, mtime: new Date(0) });

  test("resolves each entry to one role", () => {
    expect(classify(entry("posts", true), "layout.tmpl")).toEqual({ kind: "directory" });
    expect(classify(entry("posts/layout.tmpl"), "layout.tmpl")).toEqual({ kind: "layout" });
    expect(classify(entry("posts/a.md"), "layout.tmpl")).toEqual({ kind: "markdown" });
    expect(classify(entry("index.html"), "layout.tmpl")).toEqual({ kind: "template" });
    expect(classify(entry("css/site.css"), "layout.tmpl")).toEqual({ kind: "asset", type: "text/css" });
    expect(classify(entry("logo.SVG"), "layout.tmpl")).toEqual({ kind: "asset", type: "image/svg+xml" });
    expect(classify(entry("robots.txt"), "layout.tmpl")).toEqual({ kind: "copy" });
    expect(classify(entry("other.tmpl"), "layout.tmpl")).toEqual({ kind: "copy" });
  });
});
