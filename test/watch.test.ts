import { describe, expect, test } from "vitest";
import { createRebuilder } from "../src/watch";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe("createRebuilder", () => {
  test("changes during a build collapse into one more build", async () => {
    const gates = [deferred(), deferred()];
    let builds = 0;
    const rebuilder = createRebuilder(
      () => gates[builds++].promise,
      (err) => {
        throw err;
      },
    );
    rebuilder.schedule();
    rebuilder.schedule();
    rebuilder.schedule();
    expect(builds).toBe(1);
    gates[0].resolve();
    gates[1].resolve();
    await rebuilder.idle();
    expect(builds).toBe(2);
  });

  test("a failed build is reported, later builds still run", async () => {
    const errors: unknown[] = [];
    let builds = 0;
    const rebuilder = createRebuilder(async () => {
      builds++;
      if (builds === 1) throw new Error("broken");
    }, (err) => errors.push(err));
    rebuilder.schedule();
    await rebuilder.idle();
    rebuilder.schedule();
    await rebuilder.idle();
    expect(errors).toEqual([new Error("broken")]);
    expect(builds).toBe(2);
  });
});
