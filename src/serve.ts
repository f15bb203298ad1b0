import { watch } from "chokidar";
import { createServer, type Server } from "http";
import { join } from "path";
import sirv from "sirv";
import { CONFIG_FILENAME } from "./config";
import type { Logger } from "./log";
import { createRebuilder } from "./watch";

export interface ServeOptions {
  cwd: string;
  srcDir: string;
  outDir: string;
  host: string;
  port: number;
  watch: boolean;
  logger: Logger;
  /** Runs one full build, reporting its outcome. */
  rebuild: () => Promise<void>;
}

/** Serves the output tree, rebuilding on source changes in watch mode. */
export function serve(options: ServeOptions): Promise<Server> {
  const { logger } = options;
  const server = createServer(sirv(options.outDir, { dev: true }));

  const closers: (() => Promise<void>)[] = [
    () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  ];

  if (options.watch) {
    const rebuilder = createRebuilder(options.rebuild, (err) =>
      logger.error(err instanceof Error ? err.message : String(err)),
    );
    const watcher = watch([options.srcDir, join(options.cwd, CONFIG_FILENAME)], {
      ignored: ["**/.git/**", "**/node_modules/**"],
      ignoreInitial: true,
      ignorePermissionErrors: true,
    });
    watcher.on("all", (event, file) => {
      logger.debug(`${event} ${file}`);
      rebuilder.schedule();
    });
    closers.unshift(() => watcher.close(), () => rebuilder.idle());
  }

  process.stdin.on("data", (e) => {
    if (e.toString().startsWith("q")) {
      Promise.all(closers.map((close) => close())).then(
        () => process.exit(0),
        (err) => {
          logger.error(String(err));
          process.exit(1);
        },
      );
    }
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      logger.info(`previewing at http://${options.host}:${options.port}`);
      resolve(server);
    });
  });
}
