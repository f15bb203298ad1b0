import pc from "picocolors";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? process.env.QUIRE_DEBUG === "1";
  return {
    debug(message) {
      if (verbose) console.log(pc.dim(`quire ${message}`));
    },
    info(message) {
      console.log(`${pc.cyan("quire")} ${message}`);
    },
    warn(message) {
      console.warn(`${pc.yellow("quire")} ${message}`);
    },
    error(message) {
      console.error(pc.red(message));
    },
  };
}

const noop = () => {};

export const silent: Logger = { debug: noop, info: noop, warn: noop, error: noop };
