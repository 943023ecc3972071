/**
 * Recovery polling Tests
 * Fake clock: every sleep advances time
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { pollUntil } from "../../src/device/recovery";

function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

describe("pollUntil()", () => {
  it("waits one interval before the first probe", async () => {
    const clock = fakeClock();
    let probes = 0;

    const ok = await pollUntil(async () => ++probes === 1, { timeout: 100, interval: 10, ...clock });

    assert.strictEqual(ok, true);
    assert.strictEqual(probes, 1);
    assert.deepStrictEqual(clock.sleeps, [10]);
  });

  it("keeps probing until success", async () => {
    const clock = fakeClock();
    let probes = 0;

    const ok = await pollUntil(async () => ++probes === 3, { timeout: 100, interval: 10, ...clock });

    assert.strictEqual(ok, true);
    assert.strictEqual(probes, 3);
  });

  it("gives up after the timeout", async () => {
    const clock = fakeClock();
    let probes = 0;

    const ok = await pollUntil(async () => {
      probes++;
      return false;
    }, { timeout: 30, interval: 10, ...clock });

    assert.strictEqual(ok, false);
    assert.strictEqual(probes, 3);
    assert.strictEqual(clock.now(), 30);
  });

  it("propagates probe errors", async () => {
    const clock = fakeClock();
    await assert.rejects(
      pollUntil(async () => {
        throw new Error("probe broke");
      }, { timeout: 30, interval: 10, ...clock }),
      /probe broke/
    );
  });
});
