import type { GarbageBlock } from "./garbage";
import type { Coord, Tile } from "./tile";

export type AnimationKind = "swap" | "nudge" | "drop";
export type Movable = Tile | GarbageBlock;

export class AnimationRecord {
  readonly kind: AnimationKind;
  readonly subject: Movable;
  readonly version: number;
  fromX: number;
  fromY: number;
  to: Coord;
  durationMs: number;
  elapsedMs = 0;
  // Per-step obstruction scan; only slip and interception falls enable it
  readonly checkObstructions: boolean;
  // Set once the landing row was recomputed mid-flight
  retargeted = false;

  constructor(
    kind: AnimationKind,
    subject: Movable,
    to: Coord,
    durationMs: number,
    checkObstructions: boolean
  ) {
    this.kind = kind;
    this.subject = subject;
    this.version = subject.version;
    this.fromX = subject.visualX;
    this.fromY = subject.visualY;
    this.to = { ...to };
    this.durationMs = durationMs;
    this.checkObstructions = checkObstructions;
  }

  get progress() {
    if (this.durationMs <= 0) return 1;
    return Math.min(1, this.elapsedMs / this.durationMs);
  }

  /** Restarts from the subject's current visual position toward a new cell. */
  retarget(to: Coord, durationMs: number) {
    this.fromX = this.subject.visualX;
    this.fromY = this.subject.visualY;
    this.to = { ...to };
    this.durationMs = durationMs;
    this.elapsedMs = 0;
    this.retargeted = true;
  }
}

export type AnimationHooks = {
  // Runs before the position update of a drop that checks obstructions
  beforeStep?: (record: AnimationRecord) => void;
  onFinish: (record: AnimationRecord) => void;
};

/**
 * In-flight movement records keyed by occupant id. A record whose version no
 * longer matches its subject was cancelled or superseded and is discarded
 * without running its completion.
 */
export class AnimationTable {
  private records = new Map<number, AnimationRecord>();
  // Occupants whose landing row was already changed during the current tick
  private retargetedThisTick = new Set<number>();

  get size() {
    return this.records.size;
  }

  start(
    kind: AnimationKind,
    subject: Movable,
    to: Coord,
    durationMs: number,
    checkObstructions = false
  ): AnimationRecord {
    const record = new AnimationRecord(
      kind,
      subject,
      to,
      durationMs,
      checkObstructions
    );
    this.records.set(subject.id, record);
    return record;
  }

  get(subject: Movable): AnimationRecord | undefined {
    const r = this.records.get(subject.id);
    return r && r.version === subject.version ? r : undefined;
  }

  isDropping(subject: Movable) {
    return this.get(subject)?.kind === "drop";
  }

  isMoving(subject: Movable) {
    return this.get(subject) !== undefined;
  }

  /** Drops the record and invalidates any completion still pending for it. */
  cancel(subject: Movable) {
    subject.version++;
    this.records.delete(subject.id);
  }

  live(): AnimationRecord[] {
    return [...this.records.values()].filter(
      (r) => r.version === r.subject.version
    );
  }

  drops(): AnimationRecord[] {
    return this.live().filter((r) => r.kind === "drop");
  }

  beginTick() {
    this.retargetedThisTick.clear();
  }

  /**
   * Takes the single retarget slot of `subject` for this tick. Returns false
   * when another resolver already changed its landing row this tick.
   */
  claimRetarget(subject: Movable) {
    if (this.retargetedThisTick.has(subject.id)) return false;
    this.retargetedThisTick.add(subject.id);
    return true;
  }

  /** Keeps records aligned with the cell array after the grid rises. */
  shiftRows(dy: number) {
    for (const r of this.records.values()) {
      r.fromY += dy;
      r.to = { x: r.to.x, y: r.to.y + dy };
    }
  }

  tick(dtMs: number, hooks: AnimationHooks) {
    for (const record of [...this.records.values()]) {
      const subject = record.subject;
      if (subject.version !== record.version) {
        if (this.records.get(subject.id) === record)
          this.records.delete(subject.id);
        continue;
      }
      record.elapsedMs += dtMs;
      if (record.kind === "drop" && record.checkObstructions && hooks.beforeStep)
        hooks.beforeStep(record);

      const p = record.progress;
      subject.visualX = record.fromX + (record.to.x - record.fromX) * p;
      subject.visualY = record.fromY + (record.to.y - record.fromY) * p;
      if (p < 1) continue;

      this.records.delete(subject.id);
      hooks.onFinish(record);
    }
  }
}
