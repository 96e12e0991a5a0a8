import { describe, it, expect } from "vitest";
import { parseSessionConfig, type TargetingMode, type VersusConfig } from "../src/presets/schema";
import type { BlockShape } from "../src/versus/garbageEconomy";
import { GarbageRouter, type GarbageTarget } from "../src/versus/garbageRouter";

class FakeGrid implements GarbageTarget {
  isGameOver = false;
  height = 0;
  received: BlockShape[][] = [];

  stackHeight() {
    return this.height;
  }

  receiveGarbage(blocks: BlockShape[]) {
    this.received.push(blocks);
  }
}

function setup(count: number, overrides: Partial<VersusConfig> = {}) {
  const config = { ...parseSessionConfig().versus, ...overrides };
  const grids = Array.from({ length: count }, () => new FakeGrid());
  const router = new GarbageRouter(grids, config);
  const sent: [number, number, number][] = [];
  router.events.on("garbage-sent", (s, t, score) => sent.push([s, t, score]));
  return { grids, router, sent };
}

function mode(targeting: TargetingMode) {
  return { targeting };
}

describe("targeting", () => {
  it("goes round robin and skips the sender", () => {
    const { router, sent } = setup(3);
    for (let i = 0; i < 4; i++) router.send(0, 250);
    expect(sent.map(([, t]) => t)).toEqual([1, 2, 1, 2]);
  });

  it("skips grids that are out", () => {
    const { grids, router, sent } = setup(3);
    grids[1].isGameOver = true;
    router.send(0, 250);
    router.send(0, 250);
    expect(sent.map(([, t]) => t)).toEqual([2, 2]);
  });

  it("splits a score with the remainder going to the first targets", () => {
    const { router, sent } = setup(3, mode("split-evenly"));
    router.send(0, 501);
    expect(sent).toEqual([
      [0, 1, 251],
      [0, 2, 250],
    ]);
  });

  it("sends the full score to every opponent", () => {
    const { grids, router, sent } = setup(3, mode("all-opponents"));
    router.send(1, 500);
    expect(sent).toEqual([
      [1, 0, 500],
      [1, 2, 500],
    ]);
    expect(grids[0].received).toEqual([[{ width: 2, height: 2 }]]);
    expect(grids[1].received).toEqual([]);
  });

  it("picks the lowest or highest stack", () => {
    const low = setup(3, mode("lowest-stack"));
    low.grids.forEach((g, i) => (g.height = [5, 9, 3][i]));
    low.router.send(0, 250);
    expect(low.sent[0][1]).toBe(2);

    const high = setup(3, mode("highest-stack"));
    high.grids.forEach((g, i) => (g.height = [5, 9, 3][i]));
    high.router.send(0, 250);
    expect(high.sent[0][1]).toBe(1);
  });

  it("picks a random opponent", () => {
    const { router, sent } = setup(4, mode("random"));
    for (let i = 0; i < 10; i++) router.send(2, 250);
    for (const [, t] of sent) {
      expect(t).not.toBe(2);
      expect(t).toBeGreaterThanOrEqual(0);
      expect(t).toBeLessThan(4);
    }
  });

  it("does nothing with a single grid", () => {
    const { router, sent } = setup(1);
    router.send(0, 1000);
    expect(sent).toEqual([]);
  });
});

describe("combo handling", () => {
  it("sends a finished combo after the send delay", () => {
    const { grids, router } = setup(2);
    router.onComboStarted(0);
    router.onMatchScored(0, 10, 1);
    expect(router.isInCombo(0)).toBe(true);
    router.onComboEnded(0, 1, 1);
    expect(router.isInCombo(0)).toBe(false);
    expect(router.sendsInFlight).toBe(1);

    router.tick(499);
    expect(grids[1].received).toEqual([]);
    router.tick(1);
    // A ten-tile match scores 600, exactly one 5x1
    expect(grids[1].received).toEqual([[{ width: 5, height: 1 }]]);
  });

  it("holds garbage for a grid that is mid-combo", () => {
    const { grids, router } = setup(2);
    router.onComboStarted(1);
    router.onMatchScored(1, 3, 2);
    expect(router.currentChain(1)).toBe(2);
    router.send(0, 1500);
    expect(router.pendingIncoming(1)).toBe(1500);
    expect(grids[1].received).toEqual([]);

    router.forceDeliver(1);
    expect(router.pendingIncoming(1)).toBe(0);
    expect(grids[1].received).toEqual([[{ width: 6, height: 1 }]]);
  });

  it("counters pending garbage with the grid's own combo", () => {
    const { grids, router } = setup(2);
    const countered: number[][] = [];
    router.events.on("garbage-countered", (p, amount, left) => countered.push([p, amount, left]));

    router.onComboStarted(1);
    router.send(0, 600);
    router.onMatchScored(1, 4, 1);
    router.onComboEnded(1, 1, 1);

    expect(countered).toEqual([[1, 100, 500]]);
    expect(router.pendingIncoming(1)).toBe(0);
    expect(grids[1].received).toEqual([[{ width: 2, height: 2 }]]);
    expect(router.sendsInFlight).toBe(0);
  });

  it("does not counter when countering is off", () => {
    const { grids, router } = setup(2, { allowCountering: false });
    router.onComboStarted(1);
    router.send(0, 600);
    router.onMatchScored(1, 4, 1);
    router.onComboEnded(1, 1, 1);
    expect(grids[1].received).toEqual([[{ width: 5, height: 1 }]]);
    // Its own 100 still goes out
    expect(router.sendsInFlight).toBe(1);
  });

  it("clears pending garbage on request", () => {
    const { grids, router } = setup(2);
    router.onComboStarted(1);
    router.manualSend(0, 1, 800);
    expect(router.pendingIncoming(1)).toBe(800);
    router.clearPending(1);
    expect(router.pendingIncoming(1)).toBe(0);
    expect(router.isInCombo(1)).toBe(true);
    router.onComboEnded(1, 0, 0);
    expect(grids[1].received).toEqual([]);
  });

  it("answers queries for unknown players with zero", () => {
    const { router } = setup(2);
    expect(router.pendingIncoming(5)).toBe(0);
    expect(router.isInCombo(-1)).toBe(false);
    expect(router.currentChain(9)).toBe(0);
  });
});
