import type { GarbageBlock } from "./garbage";
import type { Coord, Tile } from "./tile";

export type SwapRejection =
  | "game-over"
  | "busy"
  | "garbage"
  | "empty"
  | "processing"
  | "locked"
  | "too-late"
  | "no-kick-tile"
  | "slip-blocked";

export type GarbageDropReason = "queue-full" | "no-spawn-column";

/** Discrete notifications for presentation and the versus layer. */
export type GridEvents = {
  "swap-started": [a: Coord, b: Coord];
  "swap-rejected": [reason: SwapRejection];
  "block-slip": [tile: Tile, target: Coord];
  "tile-landed": [tile: Tile];
  "tile-popped": [tile: Tile, combo: number, chain: number];
  "combo-started": [];
  "match-scored": [size: number, combo: number, chain: number];
  "combo-ended": [combo: number, chain: number];
  "row-injected": [rowsInjected: number];
  "garbage-spawned": [block: GarbageBlock];
  "garbage-dropped": [reason: GarbageDropReason, width: number, height: number];
  "garbage-converted": [block: GarbageBlock];
  "grace-started": [durationMs: number];
  "grace-cleared": [];
  "game-over": [];
};
