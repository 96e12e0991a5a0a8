import type { EventHub } from "../lib/eventHub";
import type { RiseConfig } from "../presets/schema";
import type { GridEvents } from "./events";

/** What the rise controller reads from, and does to, its grid. */
export interface RiseHost {
  readonly events: EventHub<GridEvents>;
  isSwapping(): boolean;
  isProcessing(): boolean;
  topRowOccupied(): boolean;
  injectRow(): void;
}

export type RiseState = {
  offset: number;
  speedLevel: number;
  rowsPerSecond: number;
  breathingRoomMs: number;
  timeDebtMs: number;
  graceRemainingMs: number;
  inGrace: boolean;
  fastRise: boolean;
  gameOver: boolean;
  rowsInjected: number;
};

/** Rows per second at `level`: `base` at level 1, `base * 80` at the max. */
export function speedForLevel(config: RiseConfig, level: number) {
  const base = config.baseSpeed * config.speedMultiplier;
  if (level <= 1 || config.maxLevel <= 1) return base;
  const clamped = Math.min(level, config.maxLevel);
  return base * Math.pow(80, (clamped - 1) / (config.maxLevel - 1));
}

/**
 * Pushes the stack upward one fractional row at a time.
 *
 * Rising pauses during grace, a swap, the cascade loop or breathing room.
 * Only the pause caused by a swap is owed back: it accumulates as time
 * debt, repaid by rising at `catchUpMultiplier` until the extra distance
 * covers it.
 */
export class RiseController {
  offset = 0;
  speedLevel: number;
  breathingRoomMs = 0;
  timeDebtMs = 0;
  graceRemainingMs = 0;
  inGrace = false;
  fastRise = false;
  gameOver = false;
  rowsInjected = 0;
  private levelTimerMs = 0;
  private readonly config: RiseConfig;
  private readonly host: RiseHost;

  constructor(config: RiseConfig, host: RiseHost) {
    this.config = config;
    this.host = host;
    this.speedLevel = Math.min(config.startLevel, config.maxLevel);
  }

  get rowsPerSecond() {
    const speed = speedForLevel(this.config, this.speedLevel);
    return this.fastRise ? speed * this.config.fastRiseMultiplier : speed;
  }

  /** Breathing room earned by a cascade step; adds to the pause up to the cap. */
  grantBreathingRoom(tilesMatched: number) {
    if (!this.config.enableBreathingRoom || tilesMatched <= 0) return;
    this.breathingRoomMs = Math.min(
      this.breathingRoomMs + tilesMatched * this.config.breathingRoomPerTileMs,
      this.config.maxBreathingRoomMs
    );
  }

  tick(dtMs: number) {
    if (this.gameOver) return;
    this.advanceLevel(dtMs);

    const processing = this.host.isProcessing();
    if (!processing && this.breathingRoomMs > 0)
      this.breathingRoomMs = Math.max(0, this.breathingRoomMs - dtMs);

    if (!this.inGrace && this.host.topRowOccupied()) this.enterGrace();
    if (this.inGrace) {
      this.tickGrace(dtMs, processing);
      return;
    }
    if (this.host.isSwapping()) {
      this.timeDebtMs += dtMs;
      return;
    }
    if (processing || this.breathingRoomMs > 0) return;
    this.rise(dtMs);
  }

  private advanceLevel(dtMs: number) {
    if (this.speedLevel >= this.config.maxLevel) return;
    this.levelTimerMs += dtMs;
    while (
      this.levelTimerMs >= this.config.levelIntervalMs &&
      this.speedLevel < this.config.maxLevel
    ) {
      this.levelTimerMs -= this.config.levelIntervalMs;
      this.speedLevel++;
    }
  }

  private rise(dtMs: number) {
    const multiplier = this.timeDebtMs > 0 ? this.config.catchUpMultiplier : 1;
    this.offset += (this.rowsPerSecond * multiplier * dtMs) / 1000;
    if (this.timeDebtMs > 0)
      this.timeDebtMs = Math.max(0, this.timeDebtMs - (multiplier - 1) * dtMs);

    while (this.offset >= 1) {
      if (this.host.topRowOccupied()) {
        // Hold at a full row until the top clears
        this.offset = 1;
        this.enterGrace();
        return;
      }
      this.offset -= 1;
      this.rowsInjected++;
      this.host.injectRow();
    }
    if (this.host.topRowOccupied()) this.enterGrace();
  }

  private enterGrace() {
    if (this.inGrace) return;
    this.inGrace = true;
    this.graceRemainingMs = this.config.gracePeriodMs;
    this.host.events.emit("grace-started", this.config.gracePeriodMs);
  }

  private tickGrace(dtMs: number, processing: boolean) {
    if (!this.host.topRowOccupied()) {
      this.inGrace = false;
      this.graceRemainingMs = 0;
      this.host.events.emit("grace-cleared");
      return;
    }
    if (!processing) this.graceRemainingMs -= dtMs;
    if (this.graceRemainingMs <= 0) {
      this.graceRemainingMs = 0;
      this.gameOver = true;
      this.host.events.emit("game-over");
    }
  }

  getState(): RiseState {
    return {
      offset: this.offset,
      speedLevel: this.speedLevel,
      rowsPerSecond: this.rowsPerSecond,
      breathingRoomMs: this.breathingRoomMs,
      timeDebtMs: this.timeDebtMs,
      graceRemainingMs: this.graceRemainingMs,
      inGrace: this.inGrace,
      fastRise: this.fastRise,
      gameOver: this.gameOver,
      rowsInjected: this.rowsInjected,
    };
  }
}
