export * from "./typings";
export * from "./errors";
export { Builder, type BuildOptions, type BuildResult, type BuildState } from "./build";
export { loadConfig, resolveConfig, CONFIG_FILENAME, type SiteConfig, type SiteConfigInput } from "./config";
export { collect, toRecord, byTime, type Collections } from "./collection";
export { parseMetadata, stripMetadata, formatMetadata, parseTime, TIME_FORMATS, type Metadata, type MetadataOptions } from "./frontmatter";
export { expandMacros, type MacroFunc, type MacroTable } from "./macro";
export { plugins } from "./plugins";
export { parse as parseMarkdown } from "./marked";
export { compile, type Render } from "./template";
export { renderDocument, type DocumentInput, type RenderContext } from "./render";
export { createLogger, silent, type Logger } from "./log";
export { WorkerPool } from "./pool";
export { walk, type WalkEntry, type WalkItem } from "./walk";
export { initSite } from "./scaffold";
export { createRebuilder, type Rebuilder } from "./watch";
