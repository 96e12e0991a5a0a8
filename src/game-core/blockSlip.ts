import type { AnimationRecord, AnimationTable } from "./animations";
import type { SwapRejection } from "./events";
import { GarbageBlock } from "./garbage";
import type { GridCells } from "./grid";
import type { Coord } from "./tile";
import { Tile } from "./tile";
import type { TimingConfig } from "../presets/schema";
import { createLogger } from "../lib/logger";

const log = createLogger("block slip");

export type SlipContext = {
  grid: GridCells;
  animations: AnimationTable;
  timing: TimingConfig;
};

/**
 * One tile relocated by a slip or an interception. Nudged tiles stop and
 * step up to `to`; retargeted tiles keep falling toward the new `to`.
 */
export type SlipMove = {
  tile: Tile;
  from: Coord;
  to: Coord;
  kind: "nudge" | "retarget";
};

export type SlipPlan = {
  kicked: Tile;
  from: Coord;
  target: Coord;
  moves: SlipMove[];
};

export type SlipDecision =
  | { kind: "none" }
  | { kind: "rejected"; reason: SwapRejection }
  | { kind: "slip"; plan: SlipPlan };

/**
 * True once a falling tile is less than half a row above its landing cell.
 * Such a tile is committed: it cannot be swapped, kicked under or nudged.
 */
export function isPastHalfway(animations: AnimationTable, tile: Tile) {
  const rec = animations.get(tile);
  if (!rec || rec.kind !== "drop") return false;
  return tile.visualY - rec.to.y < 0.5;
}

function fallingThrough(ctx: SlipContext, x: number, row: number) {
  return ctx.animations.drops().some((rec) => {
    const s = rec.subject;
    return (
      s instanceof Tile &&
      rec.to.x === x &&
      rec.to.y <= row &&
      Math.round(s.visualY) > row
    );
  });
}

/**
 * Decides whether a swap at the cursor is a block slip.
 *
 * - Kick-under: one cursor cell holds a falling tile, so the idle tile
 *   beside it is kicked into that column at the cursor row.
 * - Slip: neither cursor tile is falling, but a tile is falling down one of
 *   the two columns toward a row at or below the cursor; the tile in the
 *   other column is kicked underneath it.
 *
 * Returns `none` when the request should be handled as a plain swap.
 */
export function planBlockSlip(ctx: SlipContext, cursor: Coord): SlipDecision {
  const { grid } = ctx;
  const a = { x: cursor.x, y: cursor.y };
  const b = { x: cursor.x + 1, y: cursor.y };
  const ta = grid.tileAt(a.x, a.y);
  const tb = grid.tileAt(b.x, b.y);
  const aFalling = ta?.isFalling ?? false;
  const bFalling = tb?.isFalling ?? false;

  if (aFalling && bFalling) return { kind: "none" };

  if (aFalling || bFalling) {
    const fallCell = aFalling ? a : b;
    const otherCell = aFalling ? b : a;
    const other = aFalling ? tb : ta;
    if (!other || !other.isIdle || other.processing || !other.canSwap)
      return { kind: "rejected", reason: "no-kick-tile" };
    return plan(ctx, other, otherCell, fallCell);
  }

  const pairs: [Coord, Coord, Tile | null][] = [
    [a, b, tb],
    [b, a, ta],
  ];
  for (const [col, otherCell, other] of pairs) {
    if (!grid.isEmpty(col.x, col.y)) continue;
    if (!fallingThrough(ctx, col.x, cursor.y)) continue;
    if (!other || !other.isIdle || other.processing || !other.canSwap) continue;
    return plan(ctx, other, otherCell, col);
  }
  return { kind: "none" };
}

function plan(
  ctx: SlipContext,
  kicked: Tile,
  from: Coord,
  target: Coord
): SlipDecision {
  const moves = planColumnCascade(ctx, target, kicked);
  if (!moves) return { kind: "rejected", reason: "slip-blocked" };
  return { kind: "slip", plan: { kicked, from, target, moves } };
}

type Candidate = {
  tile: Tile;
  height: number;
  stationary: boolean;
  nudge: boolean;
};

/**
 * Classifies everything in the slip column at or above the slip row and
 * assigns each occupant a new row above the kicked tile.
 *
 * Stationary tiles step up by one row. A falling tile inside the slip row
 * that is not yet halfway down is nudged to the row above; falling tiles
 * further along, or still higher up, are retargeted. All of them are
 * stacked in order of visual height so the lowest lands nearest the kicked
 * tile, and no two share a row.
 *
 * Returns null, logging why, when the column cannot absorb the slip.
 */
export function planColumnCascade(
  ctx: SlipContext,
  slip: Coord,
  kicked: Tile | null
): SlipMove[] | null {
  const { grid, animations } = ctx;
  const col = slip.x;
  const row = slip.y;
  const candidates: Candidate[] = [];

  for (let y = row; y < grid.height; y++) {
    const o = grid.get(col, y);
    if (o === null || o === kicked) continue;
    if (!(o instanceof Tile)) {
      log.debug(`garbage above (${col},${row}) blocks the slip`);
      return null;
    }
    if (o.isFalling) continue;
    if (o.isSwapping || o.processing) return null;
    candidates.push({ tile: o, height: y, stationary: true, nudge: true });
  }

  for (const rec of animations.drops()) {
    const s = rec.subject;
    if (s instanceof GarbageBlock) {
      if (col >= s.x && col < s.x + s.width && s.visualY + s.height > row)
        return null;
      continue;
    }
    if (rec.to.x !== col || s === kicked) continue;
    const v = s.visualY;
    if (v < row) continue;
    const inSlipRow = v < row + 1;
    const nudge = inSlipRow && v - row >= 0.5;
    candidates.push({ tile: s, height: v, stationary: false, nudge });
  }

  candidates.sort(
    (p, q) => p.height - q.height || Number(q.stationary) - Number(p.stationary)
  );

  const moves: SlipMove[] = [];
  let next = row + 1;
  for (const c of candidates) {
    const to = c.stationary ? Math.max(c.height + 1, next) : next;
    if (to >= grid.height) {
      log.error(`slip at (${col},${row}) would push tile ${c.tile.id} out of the grid`);
      return null;
    }
    moves.push({
      tile: c.tile,
      from: { x: c.tile.x, y: c.tile.y },
      to: { x: col, y: to },
      kind: c.nudge ? "nudge" : "retarget",
    });
    next = to + 1;
  }

  const movers = new Set<Tile>(moves.map((m) => m.tile));
  if (kicked) movers.add(kicked);
  for (const cell of [slip, ...moves.map((m) => m.to)]) {
    const o = grid.get(cell.x, cell.y);
    if (o !== null && !(o instanceof Tile && movers.has(o))) {
      log.error(`slip destination (${cell.x},${cell.y}) is held by another occupant`);
      return null;
    }
  }
  return moves;
}

/**
 * After a plain swap lands, falling tiles visually above the swapped tile in
 * its column are stopped and stacked from the row above it, one row higher
 * than the cell they were heading for.
 */
export function planInterception(ctx: SlipContext, tile: Tile): SlipMove[] | null {
  const { grid, animations } = ctx;
  const falling = animations
    .drops()
    .map((r) => r.subject)
    .filter(
      (s): s is Tile =>
        s instanceof Tile && s !== tile && s.x === tile.x && s.visualY > tile.y
    )
    .sort((p, q) => p.visualY - q.visualY);
  if (falling.length === 0) return [];

  const moves: SlipMove[] = [];
  let next = tile.y + 1;
  for (const f of falling) {
    const to = Math.max(f.y + 1, next);
    if (to >= grid.height) {
      log.error(`interception above (${tile.x},${tile.y}) overflows the grid`);
      return null;
    }
    moves.push({ tile: f, from: { x: f.x, y: f.y }, to: { x: tile.x, y: to }, kind: "nudge" });
    next = to + 1;
  }

  const movers = new Set<Tile>(falling);
  for (const m of moves) {
    const o = grid.get(m.to.x, m.to.y);
    if (o !== null && !(o instanceof Tile && movers.has(o))) {
      log.error(`interception destination (${m.to.x},${m.to.y}) is occupied`);
      return null;
    }
  }
  return moves;
}

/**
 * Cancels every affected animation, clears all old slots, then writes the
 * new ones and starts replacement animations from the tiles' current
 * visual positions. Returns the longest resulting duration in ms.
 */
export function commitMoves(ctx: SlipContext, moves: SlipMove[], kick?: SlipPlan) {
  const { grid, animations, timing } = ctx;
  for (const m of moves) {
    if (animations.isMoving(m.tile)) animations.cancel(m.tile);
  }

  if (kick && grid.get(kick.from.x, kick.from.y) === kick.kicked)
    grid.clear(kick.from.x, kick.from.y);
  for (const m of moves) {
    if (grid.get(m.from.x, m.from.y) === m.tile) grid.clear(m.from.x, m.from.y);
  }

  let longest = 0;
  if (kick) {
    grid.set(kick.target.x, kick.target.y, kick.kicked);
    kick.kicked.startSwapping(kick.target);
    animations.start("swap", kick.kicked, kick.target, timing.swapMs);
    longest = timing.swapMs;
  }
  for (const m of moves) {
    grid.set(m.to.x, m.to.y, m.tile);
    const distance = Math.abs(m.tile.visualY - m.to.y);
    if (m.kind === "nudge") {
      const ms = distance * timing.dropMsPerRow * timing.nudgeFactor;
      m.tile.startSwapping(m.to);
      animations.start("nudge", m.tile, m.to, ms);
      longest = Math.max(longest, ms);
    } else {
      const ms = distance * timing.dropMsPerRow;
      m.tile.startFalling(m.to);
      animations.start("drop", m.tile, m.to, ms, true).retargeted = true;
      animations.claimRetarget(m.tile);
      longest = Math.max(longest, ms);
    }
  }
  return longest;
}

/**
 * Per-step check for a retargetable fall: scans the cells between the
 * tile's current height and its landing row for something solid and, if
 * found, lands the tile one row above it instead.
 *
 * A tile is only retargeted once per tick; see
 * {@link AnimationTable.claimRetarget}.
 */
export function checkObstruction(ctx: SlipContext, rec: AnimationRecord) {
  const { grid, animations, timing } = ctx;
  const tile = rec.subject;
  if (!(tile instanceof Tile)) return;
  if (tile.visualY - rec.to.y <= 0.5) return;

  const x = rec.to.x;
  const top = Math.min(grid.height - 1, Math.round(tile.visualY));
  for (let y = top - 1; y >= rec.to.y; y--) {
    const o = grid.get(x, y);
    if (o === null || o === tile) continue;
    let solid = true;
    if (o instanceof Tile && animations.isDropping(o)) {
      // A falling tile only blocks once it is visually below this one
      const other = animations.get(o);
      solid =
        other !== undefined &&
        other.retargeted &&
        other.to.y <= y &&
        o.visualY < tile.visualY;
    }
    if (!solid) continue;

    const landY = y + 1;
    if (landY === rec.to.y || landY >= grid.height) return;
    const held = grid.get(x, landY);
    if (held !== null && held !== tile) return;
    if (!animations.claimRetarget(tile)) return;

    if (grid.get(tile.x, tile.y) === tile) grid.clear(tile.x, tile.y);
    grid.set(x, landY, tile);
    tile.x = x;
    tile.y = landY;
    tile.state = { kind: "falling", target: { x, y: landY } };
    const ms = Math.abs(tile.visualY - landY) * timing.dropMsPerRow;
    rec.retarget({ x, y: landY }, ms);
    log.debug(`tile ${tile.id} retargeted to (${x},${landY})`);
    return;
  }
}
