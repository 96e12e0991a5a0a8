import type { GarbageBlock } from "./garbage";
import type { GridCells, Occupant } from "./grid";
import type { Coord } from "./tile";
import { Tile } from "./tile";

export type DropRecord = { tile: Tile; from: Coord; to: Coord };
export type GarbageDropRecord = { block: GarbageBlock; from: Coord; to: Coord };

export type DropPass = {
  drops: DropRecord[];
  garbageDrops: GarbageDropRecord[];
  // Longest fall in rows; drives how long the pass takes to settle
  maxDistance: number;
};

function canFall(t: Tile) {
  return t.isIdle && !t.processing;
}

/**
 * Sweeps each column bottom-up and, for every empty cell, pulls down the
 * nearest occupant above it. The search for a column stops at the first
 * occupant that may not move: a falling, swapping or matched tile, or any
 * garbage cell.
 *
 * Works on a copy of each column, so nothing is written to `grid`.
 */
export function planTileDrops(grid: GridCells): DropRecord[] {
  const records: DropRecord[] = [];
  for (let x = 0; x < grid.width; x++) {
    const col: (Occupant | null)[] = [];
    for (let y = 0; y < grid.height; y++) col.push(grid.get(x, y));

    for (let y = 0; y < grid.height; y++) {
      if (col[y] !== null) continue;
      for (let above = y + 1; above < grid.height; above++) {
        const o = col[above];
        if (o === null) continue;
        if (!(o instanceof Tile) || !canFall(o)) break;
        records.push({ tile: o, from: { x, y: above }, to: { x, y } });
        col[y] = o;
        col[above] = null;
        break;
      }
    }
  }
  return records;
}

/** Destinations claimed by more than one record. Empty when the pass is valid. */
export function findDestinationConflicts(
  records: { to: Coord }[]
): Coord[] {
  const seen = new Set<string>();
  const conflicts: Coord[] = [];
  for (const r of records) {
    const key = `${r.to.x},${r.to.y}`;
    if (seen.has(key)) conflicts.push({ ...r.to });
    seen.add(key);
  }
  return conflicts;
}

/** Rewrites the cell array for a validated pass, clearing every source first. */
export function commitTileDrops(grid: GridCells, records: DropRecord[]) {
  for (const r of records) {
    if (grid.get(r.from.x, r.from.y) === r.tile) grid.clear(r.from.x, r.from.y);
  }
  for (const r of records) grid.set(r.to.x, r.to.y, r.tile);
}

/**
 * Lowest row a garbage block can rest on: it keeps descending while the row
 * beneath its full width is empty.
 */
export function garbageRestRow(grid: GridCells, block: GarbageBlock) {
  let y = block.y;
  while (y > 0) {
    let clear = true;
    for (let dx = 0; dx < block.width; dx++) {
      if (grid.get(block.x + dx, y - 1) !== null) {
        clear = false;
        break;
      }
    }
    if (!clear) break;
    y--;
  }
  return y;
}

/**
 * Moves unsupported garbage blocks down as whole units, lowest block first
 * so a block stacked on another sees the lower one's new position. Blocks
 * already falling or converting are left alone.
 */
export function dropGarbage(
  grid: GridCells,
  isMoving: (block: GarbageBlock) => boolean
): GarbageDropRecord[] {
  const records: GarbageDropRecord[] = [];
  const blocks = grid
    .garbageBlocks()
    .filter((b) => !b.converting && !isMoving(b))
    .sort((a, b) => a.y - b.y);
  for (const block of blocks) {
    const restY = garbageRestRow(grid, block);
    if (restY === block.y) continue;
    const from = { x: block.x, y: block.y };
    grid.removeGarbage(block);
    block.y = restY;
    grid.placeGarbage(block);
    records.push({ block, from, to: { x: block.x, y: restY } });
  }
  return records;
}

export function passDistance(pass: Omit<DropPass, "maxDistance">) {
  let max = 0;
  for (const r of pass.drops) max = Math.max(max, r.from.y - r.to.y);
  for (const r of pass.garbageDrops) max = Math.max(max, r.from.y - r.to.y);
  return max;
}
