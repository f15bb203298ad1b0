import { resolve } from "path";
import pc from "picocolors";
import sade from "sade";

import { version } from "../package.json";
import { Builder } from "./build";
import { loadConfig } from "./config";
import { formatMetadata } from "./frontmatter";
import { createLogger, type Logger } from "./log";
import { initSite } from "./scaffold";
import { serve } from "./serve";

interface CommonOptions {
  verbose: boolean;
}

interface ServeFlags extends CommonOptions {
  port: number;
  host: string;
  watch: boolean;
}

interface NewFlags {
  title: string;
  draft: boolean;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function build(cwd: string, logger: Logger): Promise<boolean> {
  const config = await loadConfig(cwd);
  const result = await new Builder({ cwd, config, logger }).run();
  if (result.ok) {
    logger.info(`built ${result.pages} pages, ${result.files} files in ${result.duration}ms`);
  } else {
    logger.error(result.error.message);
    if (result.errors.length > 1) {
      logger.error(`(${result.errors.length - 1} more error(s), run with --verbose to list them)`);
    }
  }
  return result.ok;
}

function run(action: () => Promise<void>): void {
  action().catch((err: unknown) => {
    console.error(pc.red(message(err)));
    process.exit(1);
  });
}

sade("quire")
  .version(version)
  .describe("Builds a static site from markdown with directory layouts.")
  .option("--verbose", "Log build phases and every error", false)

  .command("build [root]", "Generate the site into the output directory", { default: true })
  .example("build")
  .example("build my-site")
  .action((root: string | undefined, options: CommonOptions) =>
    run(async () => {
      const ok = await build(resolve(root || "."), createLogger({ verbose: options.verbose }));
      process.exitCode = ok ? 0 : 1;
    }),
  )

  .command("serve [root]", "Build, then preview the output directory over http")
  .option("-p, --port", "Port to listen on", 5000)
  .option("-H, --host", "Host to listen on", "localhost")
  .option("-w, --watch", "Rebuild on changes", false)
  .example("serve --watch")
  .action((root: string | undefined, options: ServeFlags) =>
    run(async () => {
      const cwd = resolve(root || ".");
      const logger = createLogger({ verbose: options.verbose });
      const config = await loadConfig(cwd);
      await build(cwd, logger);
      await serve({
        cwd,
        srcDir: resolve(cwd, config.src),
        outDir: resolve(cwd, config.out),
        host: options.host,
        port: Number(options.port),
        watch: options.watch,
        logger,
        rebuild: async () => {
          await build(cwd, logger);
        },
      });
      if (options.watch) logger.info("watching for changes, type q to quit");
    }),
  )

  .command("init <dir>", "Create a new site")
  .example("init my-site")
  .action((dir: string) =>
    run(async () => {
      const files = await initSite(dir);
      console.log(`created ${resolve(dir)} (${files.length} files)`);
    }),
  )

  .command("new", "Print a new markdown file to stdout")
  .option("-t, --title", "Title of the document", "")
  .option("-d, --draft", "Mark the document as draft", false)
  .example("new --title 'Hello, world' --draft > src/posts/hello.md")
  .action((options: NewFlags) =>
    run(async () => {
      process.stdout.write(formatMetadata({ title: String(options.title), draft: options.draft, time: new Date() }) + "\n");
    }),
  )

  .parse(process.argv);
