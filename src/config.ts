import { load } from "js-yaml";
import { readFile } from "fs/promises";
import { isAbsolute, relative, resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_MARKER, DEFAULT_SEPARATOR } from "./frontmatter";

export const CONFIG_FILENAME = "quire.yml";

const schema = z
  .object({
    /** site.title in templates */
    title: z.string().default(""),
    /** source tree, relative to the site root */
    src: z.string().min(1).default("src"),
    /** output tree, relative to the site root */
    out: z.string().min(1).default("build"),
    /** "directory": a.md -> a/index.html, "flat": a.md -> a.html */
    pathStyle: z.enum(["flat", "directory"]).default("directory"),
    /** directory layout file name */
    layout: z.string().min(1).default("layout.tmpl"),
    concurrency: z.number().int().min(1).max(256).default(8),
    minify: z.boolean().default(true),
    /** empty the output tree before writing */
    clean: z.boolean().default(true),
    /** what to do with partial output when a build fails */
    onFailure: z.enum(["keep", "remove"]).default("keep"),
    frontmatter: z
      .object({
        marker: z.string().min(1).default(DEFAULT_MARKER),
        separator: z.string().trim().min(1).default(DEFAULT_SEPARATOR),
      })
      .strict()
      .default({}),
  })
  .strict();

export type SiteConfig = z.infer<typeof schema>;
export type SiteConfigInput = z.input<typeof schema>;

// paths in the config are relative to the site root, checked against a stand-in for it
const SITE_ROOT = resolve("/site");

function check(config: SiteConfig): string[] {
  const issues: string[] = [];
  const out = resolve(SITE_ROOT, config.out);
  const src = resolve(SITE_ROOT, config.src);
  const inside = (parent: string, child: string) => {
    const rel = relative(parent, child);
    return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
  };
  if (isAbsolute(config.out) || !inside(SITE_ROOT, out)) {
    issues.push(`out: "${config.out}" must be a relative path inside the site root`);
  } else if (out === SITE_ROOT) {
    issues.push("out: must not be the site root");
  } else if (inside(out, src) || inside(src, out)) {
    issues.push(`out: "${config.out}" must not overlap src "${config.src}"`);
  }
  return issues;
}

/** Validates `input` and fills in defaults. */
export function resolveConfig(input: unknown, file = CONFIG_FILENAME): SiteConfig {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      file,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  const issues = check(result.data);
  if (issues.length > 0) {
    throw new ConfigError(file, issues);
  }
  return result.data;
}

/** Reads `quire.yml` in `cwd`, defaults when there is none. */
export async function loadConfig(cwd: string): Promise<SiteConfig> {
  const file = resolve(cwd, CONFIG_FILENAME);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return resolveConfig({}, file);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = load(text, { filename: file });
  } catch (err) {
    throw new ConfigError(file, [err instanceof Error ? err.message : String(err)]);
  }
  return resolveConfig(data, file);
}
