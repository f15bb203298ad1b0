import { describe, expect, test } from "vitest";
import { MetadataError } from "../src/errors";
import { formatMetadata, parseMetadata, parseTime, stripMetadata } from "../src/frontmatter";

const now = new Date("2024-06-01T12:00:00Z");

describe("parseMetadata", () => {
  test("reads title, draft and time, strips the block", () => {
    const doc = parseMetadata('+++\ntitle = "Hello"\ndraft = false\ntime = 2020-01-02\n+++\n\n# Body\n', { now });
    expect(doc).toEqual({
      exists: true,
      metadata: { title: "Hello", draft: false, time: new Date("2020-01-02T00:00:00Z") },
      body: "# Body\n",
    });
  });

  test("no block is not an error", () => {
    const doc = parseMetadata("# Title\n\ntext\n", { now });
    expect(doc.exists).toBe(false);
    expect(doc.body).toBe("# Title\n\ntext\n");
    expect(doc.metadata).toEqual({ title: "", draft: false, time: now });
  });

  test("missing time takes the build time", () => {
    const doc = parseMetadata("+++\ntitle = x\n+++\nbody", { now });
    expect(doc.metadata.time).toBe(now);
  });

  test("ignores unknown keys and blank lines, accepts CRLF", () => {
    const doc = parseMetadata("+++\r\nauthor = me\r\n\r\ndraft = true\r\n+++\r\nbody\r\n", { now });
    expect(doc.metadata).toEqual({ title: "", draft: true, time: now });
    expect(doc.body).toBe("body\n");
  });

  test("splits on the first separator only", () => {
    const doc = parseMetadata("+++\ntitle = a = b\n+++\n", { now });
    expect(doc.metadata.title).toBe("a = b");
  });

  test("supports a yaml-like marker and separator", () => {
    const doc = parseMetadata("---\ntitle: Hi\ntime: 2020-01-02 10:00:00\n---\nbody", {
      now,
      marker: "---",
      separator: ":",
    });
    expect(doc.metadata.title).toBe("Hi");
    expect(doc.metadata.time).toEqual(new Date("2020-01-02T10:00:00Z"));
    expect(doc.body).toBe("body");
  });

  test("rejects a time in no accepted format", () => {
    let error: unknown;
    try {
      parseMetadata("+++\ntime = notadate\n+++\n", { now });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(MetadataError);
    expect(error).toMatchObject({
      key: "time",
      value: "notadate",
      expected: ["YYYY-MM-DD HH:mm:ss ±hh:mm", "YYYY-MM-DD HH:mm:ss", "YYYY-MM-DD"],
    });
    expect(String(error)).toContain("expected values/formats: {YYYY-MM-DD HH:mm:ss ±hh:mm, YYYY-MM-DD HH:mm:ss, YYYY-MM-DD}");
  });

  test("rejects a draft value that is not a boolean", () => {
    expect(() => parseMetadata("+++\ndraft = yes\n+++\n", { now })).toThrowError(
      'key "draft" has invalid value "yes"\nexpected values/formats: {true, false}',
    );
  });

  test("rejects a line without separator", () => {
    expect(() => parseMetadata("+++\ntitle\n+++\n", { now })).toThrowError(
      'metadata line "title" should be in format "key = value"',
    );
  });

  test("rejects a block that is never closed", () => {
    expect(() => parseMetadata("+++\ntitle = x\n", { now })).toThrowError(MetadataError);
  });
});

describe("parseTime", () => {
  test("converts offsets to utc", () => {
    expect(parseTime("2006-01-02 15:04:05 -07:00")).toEqual(new Date("2006-01-02T22:04:05Z"));
    expect(parseTime("2006-01-02 15:04:05 +01:30")).toEqual(new Date("2006-01-02T13:34:05Z"));
  });

  test("rejects impossible dates", () => {
    expect(parseTime("2020-02-30")).toBeNull();
    expect(parseTime("2020-01-01 24:00:00")).toBeNull();
  });
});

describe("stripMetadata", () => {
  test("removes the block and leading blank lines", () => {
    expect(stripMetadata("+++\ntitle = foo\n+++\n\n# bar")).toBe("# bar");
  });

  test("leaves documents without a block alone", () => {
    expect(stripMetadata("# bar")).toBe("# bar");
  });
});

describe("formatMetadata", () => {
  test("round-trips through parseMetadata", () => {
    const metadata = { title: 'He said "hi"', draft: true, time: new Date("2021-03-04T05:06:07Z") };
    const body = "Some *text*.\n";
    const doc = parseMetadata(formatMetadata(metadata) + body, { now });
    expect(doc).toEqual({ exists: true, metadata, body });
  });

  test("omits empty title and false draft", () => {
    expect(formatMetadata({ title: "", draft: false, time: new Date("2021-03-04T05:06:07Z") })).toBe(
      '+++\ntime = "2021-03-04 05:06:07 +00:00"\n+++\n',
    );
  });
});
