import { describe, it, expect } from "vitest";
import { GridEngine } from "../src/game-core/engine";
import type { SwapRejection } from "../src/game-core/events";
import { findMatchGroups } from "../src/game-core/matchDetector";
import { SeededRandom } from "../src/game-core/rng";
import { advance, isSettled, makeEngine, quietConfig, types } from "./helpers";

describe("GridEngine cascade", () => {
  it("clears a bottom-row triple and drops the column above it", () => {
    const e = makeEngine();
    e.placeTile(0, 0, 0);
    e.placeTile(1, 0, 0);
    e.placeTile(2, 0, 0);
    const above = e.placeTile(0, 1, 1);
    const top = e.placeTile(0, 2, 2);
    const popped: number[] = [];
    const scored: number[][] = [];
    const ended: number[][] = [];
    e.on("tile-popped", (t) => popped.push(t.x));
    e.on("match-scored", (size, combo, chain) => scored.push([size, combo, chain]));
    e.on("combo-ended", (combo, chain) => ended.push([combo, chain]));

    expect(e.resolveMatches()).toBe(true);
    expect(e.matches.phase).toBe("highlighting");
    expect(e.grid.tiles().filter((t) => t.processing)).toHaveLength(3);

    // Highlight, then the first pop
    advance(e, 900);
    expect(e.comboState().combo).toBe(1);
    expect(popped).toEqual([0]);
    expect(e.grid.get(0, 0)).toBeNull();

    // Remaining pops are staggered
    advance(e, 300);
    expect(popped).toEqual([0, 1, 2]);

    // Post-pop pause, then a one-row drop
    advance(e, 390);
    expect(e.isProcessing()).toBe(true);
    advance(e, 10);
    expect(e.isProcessing()).toBe(false);

    expect(scored).toEqual([[3, 1, 1]]);
    expect(ended).toEqual([[1, 1]]);
    expect(e.grid.tileAt(0, 0)).toBe(above);
    expect(e.grid.tileAt(0, 1)).toBe(top);
    expect(e.grid.get(0, 2)).toBeNull();
    expect(top?.visualY).toBe(1);
    expect(e.matches.score).toBe(3);
  });

  it("raises the chain when a landed tile completes the next match", () => {
    const e = makeEngine();
    e.placeTile(0, 0, 1);
    e.placeTile(1, 0, 1);
    e.placeTile(2, 0, 1);
    e.placeTile(3, 0, 2);
    e.placeTile(4, 0, 2);
    e.placeTile(2, 1, 2);
    const scored: number[][] = [];
    const ended: number[][] = [];
    const breathing: number[] = [];
    let sizes: number[] = [];
    e.on("match-scored", (size, combo, chain) => {
      scored.push([size, combo, chain]);
      sizes = e.comboState().matchSizes;
      breathing.push(e.rise.breathingRoomMs);
    });
    e.on("combo-ended", (combo, chain) => {
      ended.push([combo, chain]);
      breathing.push(e.rise.breathingRoomMs);
    });

    e.resolveMatches();
    advance(e, 5000);

    expect(scored).toEqual([
      [3, 1, 1],
      [3, 2, 2],
    ]);
    expect(ended).toEqual([[2, 2]]);
    expect(sizes).toEqual([3, 3]);
    // Each triple adds 600ms; nothing drains while the cascade runs
    expect(breathing).toEqual([0, 600, 1200]);
    expect(e.grid.tiles()).toHaveLength(0);
    expect(isSettled(e)).toBe(true);
  });

  it("terminates on a crowded random board", () => {
    const e = makeEngine({ grid: { tileTypes: 3 } });
    const rng = new SeededRandom(99);
    for (let y = 0; y < 10; y++) {
      for (let x = 0; x < e.width; x++) e.placeTile(x, y, rng.int(3));
    }
    let maxCombo = 0;
    e.on("combo-ended", (combo) => {
      maxCombo = Math.max(maxCombo, combo);
    });
    e.resolveMatches();

    let elapsed = 0;
    while (!isSettled(e) && elapsed < 300000) {
      e.update(10);
      expect(e.validate()).toEqual([]);
      elapsed += 10;
    }
    expect(isSettled(e)).toBe(true);
    expect(maxCombo).toBeGreaterThan(0);
    expect(maxCombo).toBeLessThanOrEqual(e.width * e.height);
    expect(findMatchGroups(e.grid)).toEqual([]);
  });
});

describe("GridEngine swaps", () => {
  function collect(e: GridEngine) {
    const rejections: SwapRejection[] = [];
    e.on("swap-rejected", (r) => rejections.push(r));
    return rejections;
  }

  it("swaps two tiles in place", () => {
    const e = makeEngine();
    const a = e.placeTile(0, 0, 1);
    const b = e.placeTile(1, 0, 2);
    e.setCursor(0, 0);
    e.swap();
    e.update(10);
    expect(e.isSwapping()).toBe(true);
    expect(a?.isSwapping).toBe(true);

    advance(e, 140);
    expect(e.grid.tileAt(0, 0)).toBe(b);
    expect(e.grid.tileAt(1, 0)).toBe(a);
    expect(a?.isIdle).toBe(true);
    expect(a?.visualX).toBe(1);
    expect(e.isSwapping()).toBe(false);
  });

  it("drops a tile swapped over a gap", () => {
    const e = makeEngine();
    e.placeTile(0, 0, 1);
    const moved = e.placeTile(0, 1, 3);
    e.setCursor(0, 1);
    e.swap();
    advance(e, 400);
    expect(e.grid.tileAt(1, 0)).toBe(moved);
    expect(e.grid.get(0, 1)).toBeNull();
    expect(isSettled(e)).toBe(true);
  });

  it("scores a match made by a swap", () => {
    const e = makeEngine();
    [1, 2, 1, 1].forEach((t, x) => e.placeTile(x, 0, t));
    const scored: number[] = [];
    e.on("match-scored", (size) => scored.push(size));
    e.setCursor(0, 0);
    e.swap();
    advance(e, 3000);
    expect(scored).toEqual([3]);
    expect(types(e, 0)).toEqual([2, null, null, null, null, null]);
  });

  it("rejects swaps on empty cells and garbage", () => {
    const e = makeEngine();
    const rejections = collect(e);
    e.setCursor(2, 5);
    e.swap();
    e.update(10);
    e.placeGarbage(0, 0, 2, 1);
    e.setCursor(0, 0);
    e.swap();
    e.update(10);
    expect(rejections).toEqual(["empty", "garbage"]);
  });

  it("rejects locked and matched tiles", () => {
    const e = makeEngine();
    const rejections = collect(e);
    const locked = e.placeTile(0, 0, 1);
    if (locked) locked.canSwap = false;
    const busy = e.placeTile(2, 0, 1);
    if (busy) busy.processing = true;
    e.setCursor(0, 0);
    e.swap();
    e.update(10);
    e.setCursor(2, 0);
    e.swap();
    e.update(10);
    expect(rejections).toEqual(["locked", "processing"]);
  });

  it("allows one swap in flight", () => {
    const e = makeEngine();
    const rejections = collect(e);
    e.placeTile(0, 0, 1);
    e.placeTile(1, 0, 2);
    e.placeTile(3, 0, 3);
    e.placeTile(4, 0, 4);
    e.setCursor(0, 0);
    e.swap();
    e.update(10);
    e.setCursor(3, 0);
    e.swap();
    e.update(10);
    expect(rejections).toEqual(["busy"]);
  });
});

describe("GridEngine cursor", () => {
  it("clamps to the two-cell window", () => {
    const e = makeEngine();
    expect(e.cursorX).toBe(2);
    for (let i = 0; i < 5; i++) e.moveLeft();
    e.moveDown();
    e.update(10);
    expect([e.cursorX, e.cursorY]).toEqual([0, 0]);
    for (let i = 0; i < 10; i++) e.moveRight();
    for (let i = 0; i < 20; i++) e.moveUp();
    e.update(10);
    expect([e.cursorX, e.cursorY]).toEqual([4, 13]);
  });

  it("applies commands on the next tick only", () => {
    const e = makeEngine();
    e.moveRight();
    expect(e.cursorX).toBe(2);
    e.update(10);
    expect(e.cursorX).toBe(3);
  });

  it("holds fast rise until released", () => {
    const e = makeEngine();
    e.fastRise(true);
    e.update(10);
    expect(e.rise.fastRise).toBe(true);
    e.fastRise(false);
    e.update(10);
    expect(e.rise.fastRise).toBe(false);
  });
});

describe("GridEngine rows", () => {
  it("fills starting rows without triples", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const e = new GridEngine(quietConfig({ seed, grid: { initialFillRows: 13, tileTypes: 3 } }));
      expect(findMatchGroups(e.grid)).toEqual([]);
      expect(e.grid.tiles()).toHaveLength(13 * 6);
      for (let x = 0; x < e.width; x++) {
        const near = e.grid.tileAt(x, 0)?.type;
        const far = e.grid.tileAt(x, 1)?.type;
        expect(e.preload[0][x] === near && near === far).toBe(false);
      }
    }
  });

  it("builds the same board from the same seed", () => {
    const a = makeEngine({ seed: 7, grid: { initialFillRows: 4 } });
    const b = makeEngine({ seed: 7, grid: { initialFillRows: 4 } });
    expect(a.getState().preload).toEqual(b.getState().preload);
    for (let y = 0; y < 4; y++) expect(types(a, y)).toEqual(types(b, y));
  });

  it("injects the nearest preload row when the offset reaches a full row", () => {
    const e = makeEngine({ grid: { initialFillRows: 2 }, rise: { baseSpeed: 1 } });
    const bottom = e.grid.tileAt(0, 0);
    const incoming = e.preload[0].slice();
    const injected: number[] = [];
    e.on("row-injected", (n) => injected.push(n));

    e.update(500);
    expect(e.rise.offset).toBe(0.5);
    expect(e.rowVisibility(-1)).toBe(0.5);
    expect(e.isPreloadRowVisible(0)).toBe(true);
    expect(e.isPreloadRowVisible(1)).toBe(false);

    e.update(500);
    expect(injected).toEqual([1]);
    expect(bottom?.y).toBe(1);
    expect(e.grid.tileAt(0, 1)).toBe(bottom);
    expect(types(e, 0)).toEqual(incoming);
    expect(e.preload).toHaveLength(2);
    expect(e.cursorY).toBe(2);
    expect(e.validate()).toEqual([]);
  });

  it("ends the game when the top row stays occupied through grace", () => {
    const e = makeEngine();
    const events: string[] = [];
    e.on("grace-started", () => events.push("grace"));
    e.on("game-over", () => events.push("over"));
    e.placeTile(0, 13, 1);
    advance(e, 1990);
    expect(events).toEqual(["grace"]);
    expect(e.isGameOver).toBe(false);
    e.update(10);
    expect(events).toEqual(["grace", "over"]);
    expect(e.isGameOver).toBe(true);

    const t = e.timeMs;
    e.update(10);
    expect(e.timeMs).toBe(t);
  });
});

describe("GridEngine state", () => {
  it("snapshots occupants with logical and visual positions", () => {
    const e = makeEngine();
    e.placeTile(1, 0, 4);
    e.placeGarbage(0, 3, 3, 1);
    e.queueGarbage(2);
    const s = e.getState();
    expect(s.occupants).toEqual([
      { kind: "tile", id: 1, type: 4, x: 1, y: 0, visualX: 1, visualY: 0, state: "idle", processing: false },
      { kind: "garbage", id: 2, x: 0, y: 3, width: 3, height: 1, visualY: 3, falling: false, converting: false },
    ]);
    expect(s.pendingGarbage).toEqual([{ width: 2, height: 1 }]);
    expect(s.preload).toHaveLength(2);
    expect(s.phase).toBe("idle");
    expect(s.rise.gameOver).toBe(false);
  });
});
