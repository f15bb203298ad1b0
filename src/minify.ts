import { transform } from "esbuild";
import { minify as minifyHtml } from "html-minifier-terser";
import { posix } from "path";
import { optimize } from "svgo";

export type ContentType = "text/html" | "text/css" | "text/javascript" | "image/svg+xml";

/** Static assets that are minified in place, by extension. */
const assetTypes = new Map<string, ContentType>([
  [".css", "text/css"],
  [".js", "text/javascript"],
  [".mjs", "text/javascript"],
  [".svg", "image/svg+xml"],
]);

export function assetType(file: string): ContentType | undefined {
  return assetTypes.get(posix.extname(file).toLowerCase());
}

const minifiers: Record<ContentType, (text: string) => Promise<string>> = {
  "text/html": (text) =>
    minifyHtml(text, {
      collapseWhitespace: true,
      conservativeCollapse: false,
      removeComments: true,
      minifyCSS: true,
      minifyJS: true,
    }),
  "text/css": async (text) => (await transform(text, { loader: "css", minify: true })).code,
  "text/javascript": async (text) => (await transform(text, { loader: "js", minify: true })).code,
  "image/svg+xml": async (text) => optimize(text, { multipass: true }).data,
};

export function minify(type: ContentType, text: string): Promise<string> {
  return minifiers[type](text);
}
