import { expect } from "vitest";
import { GridEngine } from "../src/game-core/engine";
import { mergeConfig } from "../src/presets/loader";
import {
  sessionConfigSchema,
  type SessionConfig,
  type SessionConfigInput,
} from "../src/presets/schema";

// Empty board that practically never rises, so scenarios control every tile
export function quietConfig(overrides: SessionConfigInput = {}): SessionConfig {
  const base = { grid: { initialFillRows: 0 }, rise: { baseSpeed: 0.0001 } };
  return sessionConfigSchema.parse(mergeConfig(base, overrides));
}

export function makeEngine(overrides: SessionConfigInput = {}) {
  return new GridEngine(quietConfig(overrides));
}

/** Ticks the engine in fixed steps, checking grid invariants after each one. */
export function advance(engine: GridEngine, ms: number, step = 10) {
  for (let t = 0; t < ms; t += step) {
    engine.update(step);
    expect(engine.validate()).toEqual([]);
  }
}

/** True once nothing is moving, matching or waiting on a routine. */
export function isSettled(engine: GridEngine) {
  return (
    !engine.isProcessing() &&
    !engine.isSwapping() &&
    engine.animations.size === 0 &&
    engine.routines.active === 0
  );
}

export function types(engine: GridEngine, y: number) {
  return Array.from({ length: engine.width }, (_, x) => engine.grid.tileAt(x, y)?.type ?? null);
}
