import type { EventHub } from "../lib/eventHub";
import { createLogger, type Logger } from "../lib/logger";
import type { TimingConfig } from "../presets/schema";
import type { GridEvents } from "./events";
import type { GridCells } from "./grid";
import { adjacentCells, findMatchGroups, type MatchGroup } from "./matchDetector";
import type { Routine, RoutineHandle, RoutineRunner } from "./routines";
import type { Coord, Tile } from "./tile";

export type CascadePhase =
  | "idle"
  | "scanning"
  | "highlighting"
  | "scoring"
  | "popping"
  | "settling";

export type ComboState = {
  combo: number;
  chain: number;
  maxChain: number;
  // Size of every group scored in the active combo
  matchSizes: number[];
};

/** What the cascade loop needs from the grid that owns it. */
export interface CascadeHost {
  readonly grid: GridCells;
  readonly timing: TimingConfig;
  readonly events: EventHub<GridEvents>;
  readonly routines: RoutineRunner;
  grantBreathingRoom(tilesMatched: number): void;
  onMatchAdjacent(cells: Coord[]): void;
  isConverting(): boolean;
  settle(chain: boolean): Routine;
  removeTile(tile: Tile): void;
}

/**
 * The cascade loop: scan, highlight, score, pop, settle, and scan again
 * until a scan finds nothing. Only one loop runs per grid; a trigger while
 * it runs is ignored because the next scan sees the new tiles anyway.
 *
 * Every group found by one scan shares that step's combo number. The chain
 * depth grows only for steps that use a tile which landed during the
 * previous settle.
 */
export class MatchResolver {
  phase: CascadePhase = "idle";
  score = 0;
  matchesTotal = 0;
  private combo = 0;
  private chain = 0;
  private maxChain = 0;
  private matchSizes: number[] = [];
  private handle: RoutineHandle | null = null;
  private readonly host: CascadeHost;
  private readonly log: Logger;

  constructor(host: CascadeHost, scope = "cascade") {
    this.host = host;
    this.log = createLogger(scope);
  }

  get isProcessing() {
    return this.phase !== "idle";
  }

  comboState(): ComboState {
    return {
      combo: this.combo,
      chain: this.chain,
      maxChain: this.maxChain,
      matchSizes: this.matchSizes.slice(),
    };
  }

  /** Starts the loop unless it is already running. */
  trigger() {
    if (this.isProcessing) return false;
    this.phase = "scanning";
    const handle = this.host.routines.start("cascade", this.run());
    this.handle = handle.done ? null : handle;
    return true;
  }

  /** Stops a running loop without scoring; used on game over. */
  stop() {
    this.handle?.cancel();
    this.handle = null;
    this.reset();
  }

  private *run(): Routine {
    const { grid, timing, events } = this.host;
    const maxSteps = grid.width * grid.height;
    let steps = 0;

    for (;;) {
      this.phase = "scanning";
      const groups = findMatchGroups(grid);
      if (groups.length === 0) break;
      if (steps >= maxSteps) {
        this.log.error(`cascade exceeded ${maxSteps} steps, stopping`);
        break;
      }
      steps++;

      this.phase = "highlighting";
      for (const g of groups) for (const t of g) t.processing = true;
      this.host.onMatchAdjacent(adjacentCells(grid, groups));
      yield timing.highlightMs;

      this.phase = "scoring";
      const tilesMatched = this.scoreStep(groups);
      this.host.grantBreathingRoom(tilesMatched);

      this.phase = "popping";
      const combo = this.combo;
      const chain = this.chain;
      const pops = groups.map((g) =>
        this.host.routines.start("pop", this.popGroup(g, combo, chain))
      );
      yield () => pops.every((p) => p.done);
      yield timing.postPopMs;

      this.phase = "settling";
      for (const g of groups) for (const t of g) t.processing = false;
      for (const t of grid.tiles()) t.chainSource = false;
      yield () => !this.host.isConverting();
      yield* this.host.settle(true);
    }

    if (this.combo > 0) events.emit("combo-ended", this.combo, this.maxChain);
    this.reset();
  }

  private scoreStep(groups: MatchGroup[]) {
    const previous = this.combo;
    this.combo = previous + 1;
    if (previous === 0) {
      this.chain = 1;
      this.matchSizes = [];
      this.host.events.emit("combo-started");
    } else if (groups.some((g) => g.some((t) => t.chainSource))) {
      this.chain++;
    }
    this.maxChain = Math.max(this.maxChain, this.chain);

    let total = 0;
    for (const g of groups) {
      total += g.length;
      this.matchSizes.push(g.length);
      this.host.events.emit("match-scored", g.length, this.combo, this.chain);
    }
    this.score += total;
    this.matchesTotal += groups.length;
    this.log.debug(`step ${this.combo}: ${groups.length} group(s), ${total} tiles, chain ${this.chain}`);
    return total;
  }

  private *popGroup(group: MatchGroup, combo: number, chain: number): Routine {
    for (const t of group) {
      this.host.removeTile(t);
      this.host.events.emit("tile-popped", t, combo, chain);
      yield this.host.timing.popStaggerMs;
    }
  }

  private reset() {
    for (const t of this.host.grid.tiles()) t.chainSource = false;
    this.combo = 0;
    this.chain = 0;
    this.maxChain = 0;
    this.matchSizes = [];
    this.phase = "idle";
    this.handle = null;
  }
}
