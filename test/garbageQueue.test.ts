import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import type { GarbageDropReason } from "../src/game-core/events";
import { setLogLevel } from "../src/lib/logger";
import { advance, makeEngine } from "./helpers";

beforeAll(() => setLogLevel("silent"));
afterAll(() => setLogLevel("warn"));

describe("pending garbage", () => {
  it("counts and cancels rows from the front", () => {
    const e = makeEngine();
    e.queueGarbage(3, 2);
    e.queueGarbage(6, 1);
    expect(e.pendingGarbageCount()).toBe(3);

    expect(e.cancelGarbage(1)).toBe(1);
    expect(e.garbage.pendingRequests()).toEqual([
      { width: 3, height: 1 },
      { width: 6, height: 1 },
    ]);
    expect(e.cancelGarbage(5)).toBe(2);
    expect(e.pendingGarbageCount()).toBe(0);
  });

  it("lowers the count by exactly the rows it can cancel", () => {
    for (const n of [0, 1, 2, 4, 7, 20]) {
      const e = makeEngine();
      e.queueGarbage(2, 3);
      e.queueGarbage(4, 1);
      e.queueGarbage(1, 2);
      const before = e.pendingGarbageCount();
      e.cancelGarbage(n);
      expect(before - e.pendingGarbageCount()).toBe(Math.min(n, before));
    }
  });

  it("clamps widths and refuses requests past the limit", () => {
    const e = makeEngine({ garbage: { maxPending: 2 } });
    const dropped: [GarbageDropReason, number, number][] = [];
    e.on("garbage-dropped", (reason, w, h) => dropped.push([reason, w, h]));
    expect(e.queueGarbage(10)).toBe(true);
    expect(e.queueGarbage(0)).toBe(true);
    expect(e.queueGarbage(2)).toBe(false);
    expect(e.garbage.pendingRequests()).toEqual([
      { width: 6, height: 1 },
      { width: 1, height: 1 },
    ]);
    expect(dropped).toEqual([["queue-full", 2, 1]]);
  });
});

describe("spawning", () => {
  it("prefers the centred window, then scans from the left", () => {
    const e = makeEngine();
    expect(e.garbage.findSpawnColumn(3)).toBe(1);
    e.placeTile(2, 13, 0);
    expect(e.garbage.findSpawnColumn(3)).toBe(3);
    expect(e.garbage.findSpawnColumn(6)).toBe(-1);
  });

  it("drops a block when no window is free", () => {
    const e = makeEngine();
    const dropped: GarbageDropReason[] = [];
    e.on("garbage-dropped", (reason) => dropped.push(reason));
    for (let x = 0; x < 6; x += 2) e.placeTile(x, 13, 0);
    expect(e.garbage.spawn(2, 1)).toBeNull();
    expect(dropped).toEqual(["no-spawn-column"]);
    expect(e.grid.garbageBlocks()).toEqual([]);
  });

  it("drops pending blocks one at a time and lets them fall whole", () => {
    const e = makeEngine();
    const spawned: number[] = [];
    e.on("garbage-spawned", (b) => spawned.push(b.width));
    e.placeTile(0, 0, 1);
    e.queueGarbage(6);
    e.queueGarbage(2);
    expect(e.dropPendingGarbage()).toBe(true);
    expect(spawned).toEqual([6]);
    expect(e.dropPendingGarbage()).toBe(false);

    // 12 rows at 150ms each
    advance(e, 1800);
    const [wide] = e.grid.garbageBlocks();
    expect(wide.y).toBe(1);
    expect(wide.falling).toBe(false);
    expect(spawned).toEqual([6]);

    advance(e, 5000);
    expect(spawned).toEqual([6, 2]);
    const narrow = e.grid.garbageAt(2, 2);
    expect(narrow?.width).toBe(2);
    expect(e.pendingGarbageCount()).toBe(0);
    expect(e.garbage.isDropping).toBe(false);
  });

  it("rescans for matches once a dropped block lands", () => {
    const e = makeEngine();
    const rescan = vi.spyOn(e, "resolveMatches");
    e.queueGarbage(2);
    e.dropPendingGarbage();
    advance(e, 1940);
    expect(rescan).not.toHaveBeenCalled();
    // 13 rows at 150ms each
    advance(e, 20);
    expect(e.grid.garbageAt(2, 0)?.width).toBe(2);
    expect(rescan).toHaveBeenCalledTimes(1);
  });
});

describe("conversion", () => {
  function matchUnder(propagateToCluster: boolean) {
    const e = makeEngine({ garbage: { propagateToCluster } });
    e.placeTile(0, 0, 1);
    e.placeTile(1, 0, 1);
    e.placeTile(2, 0, 1);
    const lower = e.placeGarbage(0, 1, 2, 1);
    const upper = e.placeGarbage(0, 2, 2, 1);
    const converted: number[] = [];
    e.on("garbage-converted", (b) => converted.push(b.id));
    return { e, lower, upper, converted };
  }

  it("turns a block next to a match into tiles", () => {
    const { e, lower, converted } = matchUnder(false);
    e.resolveMatches();
    expect(lower?.converting).toBe(true);
    advance(e, 500);
    expect(converted).toEqual([lower?.id]);
    expect(e.grid.tileAt(0, 1)).not.toBeNull();
    expect(e.grid.tileAt(1, 1)).not.toBeNull();
  });

  it("leaves a touching block alone without cluster propagation", () => {
    const { e, upper } = matchUnder(false);
    e.resolveMatches();
    advance(e, 4000);
    expect(e.grid.garbageBlocks()).toEqual([upper]);
    expect(upper?.y).toBe(1);
    expect(e.grid.tiles()).toHaveLength(2);
    expect(e.grid.tileAt(0, 0)).not.toBeNull();
    expect(e.grid.tileAt(2, 0)).toBeNull();
  });

  it("converts the whole touching cluster", () => {
    const { e, lower, upper, converted } = matchUnder(true);
    e.resolveMatches();
    expect(upper?.converting).toBe(true);
    advance(e, 4000);
    expect(converted).toEqual([lower?.id, upper?.id]);
    expect(e.grid.garbageBlocks()).toEqual([]);
    expect(e.grid.tiles()).toHaveLength(4);
  });

  it("rescans for matches after the converted tiles settle", () => {
    const { e, converted } = matchUnder(false);
    e.resolveMatches();
    const rescan = vi.spyOn(e, "resolveMatches");
    advance(e, 4000);
    expect(converted).toHaveLength(1);
    expect(rescan).toHaveBeenCalledTimes(1);
  });

  it("ignores a match next to a falling block", () => {
    const e = makeEngine();
    const block = e.placeGarbage(0, 1, 2, 1);
    if (block) block.falling = true;
    e.garbage.onMatchAdjacent([{ x: 0, y: 1 }]);
    expect(block?.converting).toBe(false);
    expect(e.isConverting()).toBe(false);
  });
});
