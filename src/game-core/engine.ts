import type { CursorCommands } from "../lib/commands";
import { EventHub } from "../lib/eventHub";
import { createLogger, type Logger } from "../lib/logger";
import type { SessionConfig, TimingConfig } from "../presets/schema";
import { AnimationTable, type AnimationRecord } from "./animations";
import {
  checkObstruction,
  commitMoves,
  isPastHalfway,
  planBlockSlip,
  planInterception,
  type SlipContext,
  type SlipMove,
  type SlipPlan,
} from "./blockSlip";
import {
  commitTileDrops,
  dropGarbage,
  findDestinationConflicts,
  passDistance,
  planTileDrops,
  type DropPass,
} from "./dropResolver";
import type { GridEvents, SwapRejection } from "./events";
import { GarbageBlock } from "./garbage";
import { GarbageQueue, type GarbageRequest } from "./garbageQueue";
import { GridCells } from "./grid";
import { MatchResolver, type CascadePhase, type ComboState } from "./matchResolver";
import { RiseController, type RiseState } from "./riseController";
import { SeededRandom } from "./rng";
import { RoutineRunner, type Routine } from "./routines";
import { Tile, type Coord, type MovementState } from "./tile";

export type OccupantView =
  | {
      kind: "tile";
      id: number;
      type: number;
      x: number;
      y: number;
      visualX: number;
      visualY: number;
      state: MovementState["kind"];
      processing: boolean;
    }
  | {
      kind: "garbage";
      id: number;
      x: number;
      y: number;
      width: number;
      height: number;
      visualY: number;
      falling: boolean;
      converting: boolean;
    };

export type GameState = {
  index: number;
  width: number;
  height: number;
  cursorX: number;
  cursorY: number;
  occupants: OccupantView[];
  // Tile types of the rows waiting below the grid, nearest first
  preload: number[][];
  phase: CascadePhase;
  swapping: boolean;
  score: number;
  matchesTotal: number;
  combo: ComboState;
  rise: RiseState;
  pendingGarbage: GarbageRequest[];
  timeMs: number;
};

type Command =
  | { kind: "move"; dx: number; dy: number }
  | { kind: "swap" }
  | { kind: "fast-rise"; held: boolean };

export type GridEngineOptions = {
  // Position of this grid in a versus session; also offsets the seed
  index?: number;
  // Fill the bottom rows on construction (defaults to true)
  fill?: boolean;
};

/**
 * One player's grid: owns the cell array and drives every resolver from a
 * single `update(dtMs)` tick.
 *
 * Per tick, in order: queued commands are applied, animations advance
 * (finishing moves and running obstruction checks), routines resume, and
 * the rise controller moves the stack. Nothing mutates the grid outside
 * that tick.
 */
export class GridEngine implements CursorCommands {
  readonly index: number;
  readonly config: SessionConfig;
  readonly width: number;
  readonly height: number;
  readonly grid: GridCells;
  readonly timing: TimingConfig;
  readonly animations = new AnimationTable();
  readonly routines = new RoutineRunner();
  readonly events = new EventHub<GridEvents>();
  readonly matches: MatchResolver;
  readonly rise: RiseController;
  readonly garbage: GarbageQueue;
  cursorX: number;
  cursorY: number;
  preload: number[][] = [];
  timeMs = 0;
  private swapInFlight = false;
  private commands: Command[] = [];
  private occupantIds = 1;
  private rng: SeededRandom;
  private readonly log: Logger;

  constructor(config: SessionConfig, options: GridEngineOptions = {}) {
    this.index = options.index ?? 0;
    this.config = config;
    this.width = config.grid.width;
    this.height = config.grid.height;
    this.timing = config.timing;
    this.grid = new GridCells(this.width, this.height);
    this.rng = new SeededRandom(config.seed + this.index * 7919);
    this.log = createLogger(`grid[${this.index}]`);
    this.matches = new MatchResolver(this, `grid[${this.index}] cascade`);
    this.rise = new RiseController(config.rise, this);
    this.garbage = new GarbageQueue(this, config.garbage, `grid[${this.index}] garbage`);
    this.cursorX = Math.floor((this.width - 2) / 2);
    this.cursorY = Math.min(this.height - 1, Math.max(0, config.grid.initialFillRows - 1));

    if (options.fill ?? true) this.fillStartingRows(config.grid.initialFillRows);
    for (let i = 0; i < config.grid.preloadRows; i++) {
      const [near, far] = this.belowContext();
      this.preload.push(this.generateRow(near, far));
    }
  }

  get slipContext(): SlipContext {
    return { grid: this.grid, animations: this.animations, timing: this.timing };
  }

  get isGameOver() {
    return this.rise.gameOver;
  }

  /** Subscribes to a grid event; returns the unsubscribe function. */
  on<K extends keyof GridEvents>(event: K, fn: (...args: GridEvents[K]) => void) {
    return this.events.on(event, fn);
  }

  nextOccupantId() {
    return this.occupantIds++;
  }

  // ---------------------------------------------------------------------
  // Generation

  private typesAt(y: number): (number | null)[] {
    return Array.from({ length: this.width }, (_, x) => this.grid.tileAt(x, y)?.type ?? null);
  }

  /**
   * Random row that forms no horizontal triple and no vertical triple with
   * the two rows beside it in the column (`near` adjacent, `far` beyond).
   * A forbidden type is replaced by the next allowed one.
   */
  private generateRow(near?: (number | null)[], far?: (number | null)[]): number[] {
    const types = this.config.grid.tileTypes;
    const row: number[] = [];
    for (let x = 0; x < this.width; x++) {
      const forbidden = new Set<number>();
      if (x >= 2 && row[x - 1] === row[x - 2]) forbidden.add(row[x - 1]);
      const a = near?.[x] ?? null;
      const b = far?.[x] ?? null;
      if (a !== null && a === b) forbidden.add(a);
      let t = this.rng.int(types);
      for (let k = 0; k < types && forbidden.has(t); k++) t = (t + 1) % types;
      row.push(t);
    }
    return row;
  }

  private belowContext(): [(number | null)[], (number | null)[]] {
    const n = this.preload.length;
    const near = n >= 1 ? this.preload[n - 1] : this.typesAt(0);
    const far = n >= 2 ? this.preload[n - 2] : n === 1 ? this.typesAt(0) : this.typesAt(1);
    return [near, far];
  }

  private fillStartingRows(rows: number) {
    const count = Math.max(0, Math.min(rows, this.height - 1));
    for (let y = 0; y < count; y++) {
      const row = this.generateRow(this.typesAt(y - 1), this.typesAt(y - 2));
      row.forEach((type, x) => this.placeTile(x, y, type));
    }
  }

  createTile(x: number, y: number): Tile {
    return new Tile(this.nextOccupantId(), this.rng.int(this.config.grid.tileTypes), x, y);
  }

  /** Puts a new idle tile into an empty cell. Returns null if the cell is taken. */
  placeTile(x: number, y: number, type: number): Tile | null {
    if (!this.grid.isEmpty(x, y)) {
      this.log.warn(`cannot place tile at (${x},${y}): cell occupied or out of bounds`);
      return null;
    }
    const tile = new Tile(this.nextOccupantId(), type, x, y);
    this.grid.set(x, y, tile);
    return tile;
  }

  /** Puts a resting garbage block directly into the grid. */
  placeGarbage(x: number, y: number, width: number, height: number): GarbageBlock | null {
    for (let dy = 0; dy < height; dy++) {
      for (let dx = 0; dx < width; dx++) {
        if (!this.grid.isEmpty(x + dx, y + dy)) return null;
      }
    }
    const block = new GarbageBlock(this.nextOccupantId(), x, y, width, height);
    this.grid.placeGarbage(block);
    return block;
  }

  // ---------------------------------------------------------------------
  // Commands

  moveLeft() {
    this.commands.push({ kind: "move", dx: -1, dy: 0 });
  }

  moveRight() {
    this.commands.push({ kind: "move", dx: 1, dy: 0 });
  }

  moveUp() {
    this.commands.push({ kind: "move", dx: 0, dy: 1 });
  }

  moveDown() {
    this.commands.push({ kind: "move", dx: 0, dy: -1 });
  }

  swap() {
    this.commands.push({ kind: "swap" });
  }

  fastRise(held = true) {
    this.commands.push({ kind: "fast-rise", held });
  }

  setCursor(x: number, y: number) {
    this.cursorX = Math.max(0, Math.min(this.width - 2, Math.floor(x)));
    this.cursorY = Math.max(0, Math.min(this.height - 1, Math.floor(y)));
  }

  private applyCommands() {
    const queued = this.commands;
    this.commands = [];
    for (const c of queued) {
      switch (c.kind) {
        case "move":
          this.setCursor(this.cursorX + c.dx, this.cursorY + c.dy);
          break;
        case "swap": {
          const rejected = this.trySwap();
          if (rejected) this.events.emit("swap-rejected", rejected);
          break;
        }
        case "fast-rise":
          this.rise.fastRise = c.held;
          break;
      }
    }
  }

  // ---------------------------------------------------------------------
  // Tick

  update(dtMs: number) {
    if (this.rise.gameOver) return;
    this.timeMs += dtMs;
    this.animations.beginTick();
    this.applyCommands();
    this.animations.tick(dtMs, {
      beforeStep: (rec) => checkObstruction(this.slipContext, rec),
      onFinish: (rec) => this.onAnimationFinished(rec),
    });
    this.routines.tick(dtMs);
    this.rise.tick(dtMs);
    if (this.rise.gameOver) this.matches.stop();
  }

  private onAnimationFinished(rec: AnimationRecord) {
    const s = rec.subject;
    if (s instanceof GarbageBlock) {
      s.falling = false;
      s.visualX = s.x;
      s.visualY = s.y;
      return;
    }
    const landed = s.isFalling;
    const direction = rec.kind === "swap" ? Math.sign(rec.to.x - rec.fromX) : 0;
    s.finishMovement();
    if (landed) this.events.emit("tile-landed", s);
    if (direction !== 0 && s.momentum) this.continueMomentum(s, direction);
  }

  // Momentum tiles keep sliding in the swap direction until blocked
  private continueMomentum(tile: Tile, direction: number) {
    const nx = tile.x + direction;
    if (!this.grid.isEmpty(nx, tile.y)) return;
    const target = { x: nx, y: tile.y };
    this.grid.clear(tile.x, tile.y);
    this.grid.set(nx, tile.y, tile);
    tile.startSwapping(target);
    this.animations.start("swap", tile, target, this.timing.swapMs);
  }

  // ---------------------------------------------------------------------
  // Swaps and block slip

  isSwapping() {
    return this.swapInFlight;
  }

  private trySwap(): SwapRejection | null {
    if (this.swapInFlight) return "busy";
    const a = { x: this.cursorX, y: this.cursorY };
    const b = { x: this.cursorX + 1, y: this.cursorY };
    if (this.grid.isGarbage(a.x, a.y) || this.grid.isGarbage(b.x, b.y)) return "garbage";
    const ta = this.grid.tileAt(a.x, a.y);
    const tb = this.grid.tileAt(b.x, b.y);
    if (!ta && !tb) return "empty";

    for (const t of [ta, tb]) {
      if (!t) continue;
      if (t.processing) return "processing";
      if (!t.canSwap) return "locked";
      if (t.isSwapping) return "busy";
      if (t.isFalling && isPastHalfway(this.animations, t)) return "too-late";
    }

    const decision = planBlockSlip(this.slipContext, a);
    if (decision.kind === "rejected") return decision.reason;
    if (decision.kind === "slip") {
      this.routines.start("block slip", this.slipRoutine(decision.plan));
      return null;
    }
    if (ta?.isFalling || tb?.isFalling) return "busy";
    this.routines.start("swap", this.swapRoutine(a, b, ta, tb));
    return null;
  }

  private *swapRoutine(a: Coord, b: Coord, ta: Tile | null, tb: Tile | null): Routine {
    this.swapInFlight = true;
    this.grid.set(a.x, a.y, tb);
    this.grid.set(b.x, b.y, ta);
    if (ta) {
      ta.startSwapping(b);
      this.animations.start("swap", ta, b, this.timing.swapMs);
    }
    if (tb) {
      tb.startSwapping(a);
      this.animations.start("swap", tb, a, this.timing.swapMs);
    }
    this.events.emit("swap-started", a, b);
    yield () => !(ta?.isSwapping ?? false) && !(tb?.isSwapping ?? false);
    this.swapInFlight = false;

    const stopped: Tile[] = [];
    let longest = 0;
    for (const t of [ta, tb]) {
      if (!t || this.grid.get(t.x, t.y) !== t) continue;
      const moves = planInterception(this.slipContext, t);
      if (!moves || moves.length === 0) continue;
      longest = Math.max(longest, commitMoves(this.slipContext, moves));
      stopped.push(...moves.map((m: SlipMove) => m.tile));
    }
    if (stopped.length > 0) {
      yield longest;
      yield () => stopped.every((t) => !this.animations.isMoving(t));
    }

    yield* this.settle(false);
    this.matches.trigger();
  }

  private *slipRoutine(plan: SlipPlan): Routine {
    this.swapInFlight = true;
    this.events.emit("block-slip", plan.kicked, plan.target);
    const longest = commitMoves(this.slipContext, plan.moves, plan);
    const moved = [plan.kicked, ...plan.moves.map((m) => m.tile)];
    yield longest;
    yield () => moved.every((t) => !this.animations.isMoving(t));
    this.swapInFlight = false;
    yield* this.settle(false);
    this.matches.trigger();
  }

  // ---------------------------------------------------------------------
  // Gravity

  /**
   * One gravity pass: plan tile drops, validate that no two share a
   * destination, commit them, then let unsupported garbage fall. Returns
   * null when the pass was rejected as invalid.
   */
  runDropPass(chain: boolean): DropPass | null {
    const drops = planTileDrops(this.grid);
    const conflicts = findDestinationConflicts(drops);
    if (conflicts.length > 0) {
      const where = conflicts.map((c) => `(${c.x},${c.y})`).join(" ");
      this.log.error(`drop pass skipped, duplicate destinations ${where}`);
      return null;
    }
    commitTileDrops(this.grid, drops);
    for (const d of drops) {
      d.tile.startFalling(d.to);
      if (chain) d.tile.chainSource = true;
      const ms = (d.tile.visualY - d.to.y) * this.timing.dropMsPerRow;
      this.animations.start("drop", d.tile, d.to, ms);
    }

    const garbageDrops = dropGarbage(this.grid, (b) => this.animations.isMoving(b));
    for (const g of garbageDrops) {
      g.block.falling = true;
      g.block.version++;
      const ms = (g.block.visualY - g.to.y) * this.timing.dropMsPerRow;
      this.animations.start("drop", g.block, g.to, ms);
    }
    return { drops, garbageDrops, maxDistance: passDistance({ drops, garbageDrops }) };
  }

  /**
   * Runs gravity passes until one moves nothing, waiting for each pass to
   * land before the next. Gives up after `maxGravityPasses`.
   */
  *settle(chain: boolean): Routine {
    for (let pass = 0; ; pass++) {
      if (pass >= this.timing.maxGravityPasses) {
        this.log.error(`gravity still moving after ${pass} passes, stopping`);
        return;
      }
      const result = this.runDropPass(chain);
      if (!result) return;
      const moved = [
        ...result.drops.map((d) => d.tile),
        ...result.garbageDrops.map((g) => g.block),
      ];
      if (moved.length === 0) return;
      yield result.maxDistance * this.timing.dropMsPerRow;
      yield () => moved.every((m) => !this.animations.isMoving(m));
    }
  }

  /** Starts a standalone gravity sequence, e.g. after tiles were placed by hand. */
  settleNow() {
    this.routines.start("settle", this.settleThenMatch());
  }

  private *settleThenMatch(): Routine {
    yield* this.settle(false);
    this.matches.trigger();
  }

  // ---------------------------------------------------------------------
  // Cascade host

  resolveMatches() {
    return this.matches.trigger();
  }

  isProcessing() {
    return this.matches.isProcessing;
  }

  grantBreathingRoom(tilesMatched: number) {
    this.rise.grantBreathingRoom(tilesMatched);
  }

  onMatchAdjacent(cells: Coord[]) {
    this.garbage.onMatchAdjacent(cells);
  }

  isConverting() {
    return this.garbage.isConverting;
  }

  isMoving(block: GarbageBlock) {
    return this.animations.isMoving(block);
  }

  removeTile(tile: Tile) {
    if (this.grid.get(tile.x, tile.y) === tile) this.grid.clear(tile.x, tile.y);
    if (this.animations.isMoving(tile)) this.animations.cancel(tile);
    tile.processing = false;
  }

  comboState(): ComboState {
    return this.matches.comboState();
  }

  // ---------------------------------------------------------------------
  // Rise host

  topRowOccupied() {
    return this.grid.rowOccupied(this.height - 1);
  }

  /**
   * Shifts every occupant up one row, promotes the nearest preload row into
   * row 0, generates a new preload row, and rescans for matches.
   */
  injectRow() {
    const lost = this.grid.shiftUp([]);
    if (lost.length > 0)
      this.log.error(`row injection pushed ${lost.length} occupant(s) off the top`);
    for (const t of this.grid.tiles()) t.shiftRows(1);
    for (const b of this.grid.garbageBlocks()) {
      b.y += 1;
      b.visualY += 1;
    }
    this.animations.shiftRows(1);

    const types = this.preload.shift() ?? this.generateRow(this.typesAt(1), this.typesAt(2));
    types.forEach((type, x) => this.placeTile(x, 0, type));
    const [near, far] = this.belowContext();
    this.preload.push(this.generateRow(near, far));

    this.cursorY = Math.min(this.height - 1, this.cursorY + 1);
    this.events.emit("row-injected", this.rise.rowsInjected);
    this.matches.trigger();
  }

  /**
   * Visible fraction of a row: rows inside the grid are fully visible, the
   * first preload row shows as much as the rise offset has revealed, and
   * deeper preload rows are hidden.
   */
  rowVisibility(y: number) {
    if (y >= 0) return 1;
    if (y === -1) return this.rise.offset;
    return 0;
  }

  /** Whether preload row `depth` (0 is nearest the grid) is exposed by the rise. */
  isPreloadRowVisible(depth: number) {
    return this.rowVisibility(-1 - depth) > 0;
  }

  // ---------------------------------------------------------------------
  // Garbage

  queueGarbage(width: number, height = 1) {
    return this.garbage.queue(width, height);
  }

  cancelGarbage(rows: number) {
    return this.garbage.cancel(rows);
  }

  pendingGarbageCount() {
    return this.garbage.pendingCount();
  }

  dropPendingGarbage() {
    return this.garbage.dropPending();
  }

  /** Queues delivered blocks and starts dropping them. */
  receiveGarbage(blocks: { width: number; height: number }[]) {
    for (const b of blocks) this.garbage.queue(b.width, b.height);
    this.garbage.dropPending();
  }

  isInCombo() {
    return this.matches.isProcessing;
  }

  stackHeight() {
    return this.grid.stackHeight();
  }

  // ---------------------------------------------------------------------
  // Inspection

  /**
   * Lists broken invariants: cell and coordinate disagreement, duplicate
   * tiles, and in-flight animations whose tile is no longer in the grid.
   */
  validate(): string[] {
    const problems = this.grid.validate();
    for (const rec of this.animations.live()) {
      const s = rec.subject;
      if (s instanceof Tile && this.grid.get(s.x, s.y) !== s)
        problems.push(`tile ${s.id} is animating but not stored at (${s.x},${s.y})`);
    }
    return problems;
  }

  getState(): GameState {
    const occupants: OccupantView[] = [];
    for (const t of this.grid.tiles()) {
      occupants.push({
        kind: "tile",
        id: t.id,
        type: t.type,
        x: t.x,
        y: t.y,
        visualX: t.visualX,
        visualY: t.visualY,
        state: t.state.kind,
        processing: t.processing,
      });
    }
    for (const b of this.grid.garbageBlocks()) {
      occupants.push({
        kind: "garbage",
        id: b.id,
        x: b.x,
        y: b.y,
        width: b.width,
        height: b.height,
        visualY: b.visualY,
        falling: b.falling,
        converting: b.converting,
      });
    }
    return {
      index: this.index,
      width: this.width,
      height: this.height,
      cursorX: this.cursorX,
      cursorY: this.cursorY,
      occupants,
      preload: this.preload.map((r) => r.slice()),
      phase: this.matches.phase,
      swapping: this.swapInFlight,
      score: this.matches.score,
      matchesTotal: this.matches.matchesTotal,
      combo: this.matches.comboState(),
      rise: this.rise.getState(),
      pendingGarbage: this.garbage.pendingRequests().map((r) => ({ ...r })),
      timeMs: this.timeMs,
    };
  }
}
