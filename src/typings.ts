export type PathStyle = "flat" | "directory";

export interface Page {
  id: string; // {source} without extension, posix
  source: string; // path relative to the source root
  dir: string; // "." for the root directory
  path: string; // http path the page is served at
  file: string; // output file relative to the output root
  title: string; // from metadata, else the file name
  date: Date; // from metadata, else file's last modified time
  draft: boolean;
  html: string; // rendered body
}

export interface SiteInfo {
  title: string;
  date: Date; // build time
}

/** Data available to layout and page templates. */
export interface TemplateArgs {
  site: SiteInfo;
  /** Current page, only set when rendering through a directory layout. */
  page: Page | undefined;
  /** Pages in the same directory. */
  pages: readonly Page[];
  /** All pages in the tree, by directory. */
  all: Readonly<Record<string, readonly Page[]>>;
  format_date(date: Date): string;
  /** Escapes `&`, `<`, `>`, `"` and `'` for html text and attribute values. */
  escape(text: unknown): string;
}

export const TEMPLATE_ARGS = ["site", "page", "pages", "all", "format_date", "escape"] as const satisfies readonly (keyof TemplateArgs)[];
