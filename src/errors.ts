export class MetadataError extends Error {
  override name = "MetadataError";
  constructor(
    readonly key: string,
    readonly value: string,
    readonly expected: readonly string[],
    message = `key ${JSON.stringify(key)} has invalid value ${JSON.stringify(value)}`,
  ) {
    super(expected.length > 0 ? `${message}\nexpected values/formats: {${expected.join(", ")}}` : message);
  }
}

export class MacroError extends Error {
  override name = "MacroError";
  constructor(readonly macro: string, message: string) {
    super(message);
  }
}

export type TemplateStage = "missing" | "parse" | "execute";

export class TemplateError extends Error {
  override name = "TemplateError";
  constructor(readonly template: string, readonly stage: TemplateStage, options?: { cause?: unknown }) {
    super(`${stage === "missing" ? "template not found" : `template ${stage} error`}: ${template}${describe(options?.cause)}`, options);
  }
}

export class ConfigError extends Error {
  override name = "ConfigError";
  constructor(readonly file: string, readonly issues: readonly string[]) {
    super(`invalid config ${file}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
  }
}

export type BuildOp = "walk" | "render" | "layout" | "template" | "minify" | "copy" | "write";

/** Build-phase failure, tagged with the operation and source path. */
export class BuildError extends Error {
  override name = "BuildError";
  constructor(readonly op: BuildOp, readonly path: string, cause: unknown) {
    super(`quire: ${op} ${path}:${describe(cause)}`, { cause });
  }

  static wrap(op: BuildOp, path: string, err: unknown): BuildError {
    return err instanceof BuildError ? err : new BuildError(op, path, err);
  }
}

function describe(cause: unknown): string {
  if (cause === undefined) return "";
  return " " + (cause instanceof Error ? cause.message : String(cause));
}
