export interface Rebuilder {
  /** Requests a build. Calls during a build collapse into one follow-up build. */
  schedule(): void;
  /** Resolves once no build is running or scheduled. */
  idle(): Promise<void>;
}

/**
 * Serializes rebuilds for watch mode. A running build is never interrupted:
 * changes that arrive meanwhile mark the site dirty and trigger exactly one
 * more build when it finishes.
 */
export function createRebuilder(build: () => Promise<void>, onError: (err: unknown) => void): Rebuilder {
  let dirty = false;
  let running: Promise<void> | undefined;

  async function drain(): Promise<void> {
    try {
      while (dirty) {
        dirty = false;
        await build().catch(onError);
      }
    } finally {
      running = undefined;
    }
  }

  return {
    schedule() {
      dirty = true;
      running ??= drain();
    },
    async idle() {
      while (running) await running;
    },
  };
}
