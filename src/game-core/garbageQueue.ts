import type { EventHub } from "../lib/eventHub";
import { createLogger, type Logger } from "../lib/logger";
import type { GarbageConfig, TimingConfig } from "../presets/schema";
import type { GridEvents } from "./events";
import { GarbageBlock } from "./garbage";
import type { GridCells } from "./grid";
import type { Routine, RoutineHandle, RoutineRunner } from "./routines";
import type { Coord, Tile } from "./tile";

export type GarbageRequest = { width: number; height: number };

export interface GarbageHost {
  readonly grid: GridCells;
  readonly timing: TimingConfig;
  readonly events: EventHub<GridEvents>;
  readonly routines: RoutineRunner;
  nextOccupantId(): number;
  isMoving(block: GarbageBlock): boolean;
  createTile(x: number, y: number): Tile;
  settle(chain: boolean): Routine;
  resolveMatches(): boolean;
}

/**
 * Incoming garbage for one grid: the pending request queue, spawning at
 * the top of the grid, and conversion back into tiles after an adjacent
 * match.
 */
export class GarbageQueue {
  private pending: GarbageRequest[] = [];
  private dropping: RoutineHandle | null = null;
  private conversions = 0;
  private readonly host: GarbageHost;
  private readonly config: GarbageConfig;
  private readonly log: Logger;

  constructor(host: GarbageHost, config: GarbageConfig, scope = "garbage") {
    this.host = host;
    this.config = config;
    this.log = createLogger(scope);
  }

  get isDropping() {
    return this.dropping !== null && !this.dropping.done;
  }

  get isConverting() {
    return this.conversions > 0;
  }

  pendingRequests(): readonly GarbageRequest[] {
    return this.pending.map((r) => ({ ...r }));
  }

  /** Number of pending garbage rows. */
  pendingCount() {
    return this.pending.reduce((sum, r) => sum + r.height, 0);
  }

  queue(width: number, height = 1) {
    if (this.pending.length >= this.config.maxPending) {
      this.log.warn(`pending queue full, dropping ${width}x${height}`);
      this.host.events.emit("garbage-dropped", "queue-full", width, height);
      return false;
    }
    this.pending.push({
      width: Math.min(Math.max(1, Math.floor(width)), this.config.maxWidth),
      height: Math.max(1, Math.floor(height)),
    });
    return true;
  }

  /**
   * Cancels up to `rows` pending rows, oldest first. A request taller than
   * what is left to cancel loses rows from its height. Returns the number
   * of rows cancelled.
   */
  cancel(rows: number) {
    let remaining = Math.max(0, Math.floor(rows));
    let cancelled = 0;
    while (remaining > 0 && this.pending.length > 0) {
      const head = this.pending[0];
      if (head.height <= remaining) {
        remaining -= head.height;
        cancelled += head.height;
        this.pending.shift();
      } else {
        head.height -= remaining;
        cancelled += remaining;
        remaining = 0;
      }
    }
    return cancelled;
  }

  clear() {
    this.pending = [];
  }

  /** Starts spawning pending requests unless a drop sequence is running. */
  dropPending() {
    if (this.isDropping || this.pending.length === 0) return false;
    const handle = this.host.routines.start("garbage drop", this.dropRoutine());
    this.dropping = handle.done ? null : handle;
    return true;
  }

  private *dropRoutine(): Routine {
    while (this.pending.length > 0) {
      const req = this.pending.shift();
      if (!req) break;
      if (this.spawn(req.width, req.height)) {
        yield* this.host.settle(false);
        this.host.resolveMatches();
      }
      if (this.pending.length > 0) yield this.host.timing.garbageDropDelayMs;
    }
  }

  private regionEmpty(x: number, width: number, height: number) {
    const { grid } = this.host;
    for (let y = grid.height - height; y < grid.height; y++) {
      for (let dx = 0; dx < width; dx++) {
        if (!grid.isEmpty(x + dx, y)) return false;
      }
    }
    return true;
  }

  /**
   * Left column of the spawn window: centred if free, otherwise the first
   * free window scanning left to right, or -1 when none is free. A window
   * is free when every cell the block would cover at the top of the grid is
   * empty.
   */
  findSpawnColumn(width: number, height = 1) {
    const { grid } = this.host;
    const w = Math.min(width, grid.width);
    const h = Math.min(height, grid.height);
    const centre = Math.floor((grid.width - w) / 2);
    if (this.regionEmpty(centre, w, h)) return centre;
    for (let x = 0; x + w <= grid.width; x++) {
      if (this.regionEmpty(x, w, h)) return x;
    }
    return -1;
  }

  spawn(width: number, height: number): GarbageBlock | null {
    const { grid } = this.host;
    const w = Math.min(width, grid.width);
    const h = Math.min(height, grid.height);
    const x = this.findSpawnColumn(w, h);
    if (x < 0) {
      this.log.warn(`no spawn column for ${w}x${h}, garbage dropped`);
      this.host.events.emit("garbage-dropped", "no-spawn-column", w, h);
      return null;
    }
    const block = new GarbageBlock(this.host.nextOccupantId(), x, grid.height - h, w, h);
    grid.placeGarbage(block);
    this.host.events.emit("garbage-spawned", block);
    return block;
  }

  /**
   * Starts converting every resting garbage block next to the matched
   * cells, plus, with `propagateToCluster`, every block touching those.
   */
  onMatchAdjacent(cells: Coord[]) {
    const { grid } = this.host;
    const eligible = (b: GarbageBlock) =>
      !b.converting && !b.falling && !this.host.isMoving(b);

    const hit: GarbageBlock[] = [];
    for (const c of cells) {
      const b = grid.garbageAt(c.x, c.y);
      if (b && eligible(b) && !hit.includes(b)) hit.push(b);
    }
    if (hit.length === 0) return;

    if (this.config.propagateToCluster) {
      const all = grid.garbageBlocks().filter(eligible);
      for (let i = 0; i < hit.length; i++) {
        for (const other of all) {
          if (!hit.includes(other) && hit[i].touches(other)) hit.push(other);
        }
      }
    }

    for (const b of hit) b.converting = true;
    this.conversions++;
    this.host.routines.start("garbage conversion", this.convert(hit));
  }

  /**
   * Converting blocks stay in the cell array, so nothing falls into them,
   * until the delay ends; then each block is swapped for tiles in one step.
   */
  private *convert(blocks: GarbageBlock[]): Routine {
    yield this.host.timing.conversionDelayMs;
    const { grid } = this.host;
    for (const b of blocks) {
      b.converting = false;
      if (grid.garbageAt(b.x, b.y) !== b) continue;
      grid.removeGarbage(b);
      for (const c of b.cells()) {
        if (grid.isEmpty(c.x, c.y)) grid.set(c.x, c.y, this.host.createTile(c.x, c.y));
      }
      this.host.events.emit("garbage-converted", b);
    }
    this.conversions--;
    yield* this.host.settle(false);
    this.host.resolveMatches();
  }
}
