import { rm } from "fs/promises";
import { resolve } from "path";
import { collect, toRecord } from "./collection";
import type { SiteConfig } from "./config";
import { BuildError, type BuildOp } from "./errors";
import { LayoutCache } from "./layout";
import { silent, type Logger } from "./log";
import type { MacroTable } from "./macro";
import { classify, materialize, outputTarget, type FileRole, type MaterializeContext } from "./materialize";
import { isMarkdown } from "./paths";
import { plugins } from "./plugins";
import { WorkerPool } from "./pool";
import { readDocument, type RenderContext } from "./render";
import type { Page } from "./typings";
import { isWalkFailure, walk, type WalkEntry } from "./walk";

export type BuildState = "idle" | "rendering" | "aggregating" | "materializing" | "done" | "failed";

export interface BuildOptions {
  /** site root, `src` and `out` are resolved against it */
  cwd: string;
  config: SiteConfig;
  /** default: {@link plugins} */
  macros?: MacroTable;
  /** read once per build, the date of pages whose metadata has no time */
  clock?: () => Date;
  logger?: Logger;
}

interface Planned {
  entry: WalkEntry;
  role: FileRole;
}

export type BuildResult =
  | { ok: true; pages: number; drafts: number; files: number; duration: number }
  | { ok: false; error: BuildError; errors: readonly BuildError[] };

/** First error wins, the rest are kept for reporting. */
class Failures {
  readonly errors: BuildError[] = [];

  get first(): BuildError | undefined {
    return this.errors[0];
  }

  record(op: BuildOp, path: string, err: unknown): void {
    this.errors.push(BuildError.wrap(op, path, err));
  }
}

/**
 * One full build of a site: render every markdown document, group them into
 * collections, then write the output tree. A builder runs once; rebuilding
 * means a new builder with a fresh index.
 */
export class Builder {
  private _state: BuildState = "idle";
  private readonly srcDir: string;
  private readonly outDir: string;
  private readonly logger: Logger;

  constructor(private readonly options: BuildOptions) {
    this.srcDir = resolve(options.cwd, options.config.src);
    this.outDir = resolve(options.cwd, options.config.out);
    this.logger = options.logger ?? silent;
  }

  get state(): BuildState {
    return this._state;
  }

  private enter(state: BuildState): void {
    this.logger.debug(`${this._state} -> ${state}`);
    this._state = state;
  }

  async run(): Promise<BuildResult> {
    if (this._state !== "idle") {
      throw new Error(`builder already ran (state: ${this._state})`);
    }
    const started = Date.now();
    const now = (this.options.clock ?? (() => new Date()))();
    const failures = new Failures();

    try {
      this.enter("rendering");
      const pages = await this.renderAll(now, failures);
      if (failures.first) return await this.fail(failures);

      this.enter("aggregating");
      const collections = collect(pages.values());
      const drafts = [...pages.values()].filter((page) => page.draft).length;

      this.enter("materializing");
      const plan = await this.planAll(pages, failures);
      if (failures.first) return await this.fail(failures);

      if (this.options.config.clean) {
        await rm(this.outDir, { recursive: true, force: true });
      }
      const files = await this.materializeAll(
        plan,
        {
          srcDir: this.srcDir,
          outDir: this.outDir,
          site: { title: this.options.config.title, date: now },
          collections,
          all: toRecord(collections),
          layouts: new LayoutCache(this.options.config.layout),
          minify: this.options.config.minify,
          pages,
        },
        failures,
      );
      if (failures.first) return await this.fail(failures);

      this.enter("done");
      return { ok: true, pages: pages.size - drafts, drafts, files, duration: Date.now() - started };
    } catch (err) {
      failures.record("write", this.options.config.out, err);
      return await this.fail(failures);
    }
  }

  private async renderAll(now: Date, failures: Failures): Promise<Map<string, Page>> {
    const { config } = this.options;
    const ctx: RenderContext = {
      pathStyle: config.pathStyle,
      metadata: { marker: config.frontmatter.marker, separator: config.frontmatter.separator, now },
      macros: this.options.macros ?? plugins,
    };
    const pool = new WorkerPool(config.concurrency);
    const pages = new Map<string, Page>();

    for await (const item of walk(this.srcDir)) {
      if (isWalkFailure(item)) {
        failures.record("walk", item.rel, item.error);
        continue;
      }
      if (item.isDirectory || !isMarkdown(item.rel)) continue;
      pool.submit(
        async () => {
          const page = await readDocument(item, ctx);
          if (page.draft) this.logger.debug(`draft ${page.source}`);
          pages.set(item.rel, page);
        },
        (err) => failures.record("render", item.rel, err),
      );
    }

    await pool.join();
    return pages;
  }

  /**
   * Walks the source tree again and classifies every entry. Two sources that
   * would write the same output file fail the build before anything is
   * written.
   */
  private async planAll(pages: ReadonlyMap<string, Page>, failures: Failures): Promise<Planned[]> {
    const plan: Planned[] = [];
    const owners = new Map<string, string>();

    for await (const item of walk(this.srcDir)) {
      if (isWalkFailure(item)) {
        failures.record("walk", item.rel, item.error);
        continue;
      }
      const role = classify(item, this.options.config.layout);
      if (role.kind === "directory") continue;
      const target = outputTarget(item, role, pages);
      if (target !== undefined) {
        const owner = owners.get(target);
        if (owner !== undefined) {
          failures.record("write", item.rel, new Error(`output "${target}" is also written by "${owner}"`));
          continue;
        }
        owners.set(target, item.rel);
      }
      plan.push({ entry: item, role });
    }
    return plan;
  }

  private async materializeAll(plan: readonly Planned[], ctx: MaterializeContext, failures: Failures): Promise<number> {
    const pool = new WorkerPool(this.options.config.concurrency);
    let files = 0;

    for (const { entry, role } of plan) {
      pool.submit(
        async () => {
          const outcome = await materialize(entry, role, ctx);
          if (outcome !== "skipped") files++;
        },
        (err) => failures.record("write", entry.rel, err),
      );
    }

    await pool.join();
    return files;
  }

  private async fail(failures: Failures): Promise<BuildResult> {
    this.enter("failed");
    const [error, ...rest] = failures.errors;
    if (rest.length > 0) {
      this.logger.debug(`${rest.length} more error(s):\n${rest.map((e) => e.message).join("\n")}`);
    }
    if (this.options.config.onFailure === "remove") {
      await rm(this.outDir, { recursive: true, force: true });
    }
    return { ok: false, error, errors: failures.errors };
  }
}
