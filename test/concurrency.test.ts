import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ConcurrencyLimiter } from "../src/concurrency.js";

function deferred() {
  let release = () => {};
  const promise = new Promise<void>((resolve) => {
    release = () => resolve();
  });
  return { promise, release };
}

describe("ConcurrencyLimiter", () => {
  it("never runs more transfers than the limit", async () => {
    const limiter = new ConcurrencyLimiter({ transfer: 2, trigger: 1 });
    let active = 0;
    let peak = 0;
    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 6 }, () => limiter.transfer(task)));
    assert.strictEqual(peak, 2);
  });

  it("keeps the trigger limit independent of the transfer limit", async () => {
    const limiter = new ConcurrencyLimiter({ transfer: 3, trigger: 1 });
    const gate = deferred();
    const first = limiter.trigger(() => gate.promise);
    const second = limiter.trigger(async () => "second");
    await new Promise((resolve) => setImmediate(resolve));

    assert.strictEqual(limiter.activeTriggers, 1);
    assert.strictEqual(await limiter.transfer(async () => "transfer"), "transfer");
    gate.release();
    await first;
    assert.strictEqual(await second, "second");
  });

  it("applies a new size to later acquisitions", async () => {
    const limiter = new ConcurrencyLimiter({ transfer: 1, trigger: 1 });
    limiter.resize({ transfer: 3 });
    assert.deepStrictEqual(limiter.current, { transfer: 3, trigger: 1 });

    const gates = [deferred(), deferred(), deferred()];
    const running = gates.map((gate) => limiter.transfer(() => gate.promise));
    await new Promise((resolve) => setImmediate(resolve));
    assert.strictEqual(limiter.activeTransfers, 3);

    gates.forEach((gate) => gate.release());
    await Promise.all(running);
  });

  it("rejects sizes below one", () => {
    assert.throws(() => new ConcurrencyLimiter({ transfer: 0, trigger: 1 }), RangeError);
    const limiter = new ConcurrencyLimiter({ transfer: 1, trigger: 1 });
    assert.throws(() => limiter.resize({ trigger: 1.5 }), RangeError);
  });
});
