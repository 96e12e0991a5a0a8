import type { GridCells } from "./grid";
import type { Coord } from "./tile";
import { Tile } from "./tile";

export type MatchGroup = Tile[];

function matchableAt(grid: GridCells, x: number, y: number): Tile | null {
  const t = grid.tileAt(x, y);
  return t && t.isMatchable ? t : null;
}

/**
 * Marks every tile that belongs to a horizontal or vertical run of three or
 * more matchable tiles of the same type.
 *
 * Runs are scanned row by row and then column by column; a run ends at an
 * empty cell, garbage, a tile that cannot match, or a type change.
 */
export function findMatchedTiles(grid: GridCells): Set<Tile> {
  const matched = new Set<Tile>();

  const scanLine = (length: number, at: (i: number) => Tile | null) => {
    let runStart = 0;
    for (let i = 1; i <= length; i++) {
      const prev = at(i - 1);
      const curr = i < length ? at(i) : null;
      const same = prev !== null && curr !== null && prev.type === curr.type;
      if (same) continue;
      if (prev !== null && i - runStart >= 3) {
        for (let k = runStart; k < i; k++) {
          const t = at(k);
          if (t) matched.add(t);
        }
      }
      runStart = i;
    }
  };

  for (let y = 0; y < grid.height; y++) {
    scanLine(grid.width, (x) => matchableAt(grid, x, y));
  }
  for (let x = 0; x < grid.width; x++) {
    scanLine(grid.height, (y) => matchableAt(grid, x, y));
  }
  return matched;
}

const neighbours: Coord[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
];

/**
 * Groups matched tiles into connected components. The flood fill only walks
 * through tiles that are themselves matched and share the group's type, so
 * two parallel runs of different types stay separate.
 *
 * Groups come out in scan order (bottom row first, left to right), and tiles
 * within a group in fill order starting from that corner.
 */
export function findMatchGroups(grid: GridCells): MatchGroup[] {
  const matched = findMatchedTiles(grid);
  if (matched.size === 0) return [];

  const visited = new Set<Tile>();
  const groups: MatchGroup[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const start = grid.tileAt(x, y);
      if (!start || !matched.has(start) || visited.has(start)) continue;

      const group: MatchGroup = [];
      const queue: Tile[] = [start];
      visited.add(start);
      while (queue.length > 0) {
        const t = queue.shift();
        if (!t) break;
        group.push(t);
        for (const d of neighbours) {
          const n = grid.tileAt(t.x + d.x, t.y + d.y);
          if (!n || visited.has(n) || !matched.has(n) || n.type !== start.type)
            continue;
          visited.add(n);
          queue.push(n);
        }
      }
      groups.push(group);
    }
  }
  return groups;
}

/** In-bounds cells 4-adjacent to any tile of the groups, deduplicated. */
export function adjacentCells(grid: GridCells, groups: MatchGroup[]): Coord[] {
  const seen = new Set<string>();
  const out: Coord[] = [];
  for (const group of groups) {
    for (const t of group) {
      for (const d of neighbours) {
        const x = t.x + d.x;
        const y = t.y + d.y;
        const key = `${x},${y}`;
        if (!grid.inBounds(x, y) || seen.has(key)) continue;
        seen.add(key);
        out.push({ x, y });
      }
    }
  }
  return out;
}
