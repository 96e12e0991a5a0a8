import { GridEngine, type GameState } from "../game-core/engine";
import { createLogger } from "../lib/logger";
import type { SessionConfig } from "../presets/schema";
import { GarbageRouter } from "./garbageRouter";

export type SessionState = {
  timeMs: number;
  grids: GameState[];
  pendingIncoming: number[];
  over: boolean;
  winner: number | null;
};

const log = createLogger("session");

/**
 * Several grids built from one configuration, ticked together, with a
 * garbage router between them. Each grid gets the session seed offset by
 * its index so boards differ but replays match.
 */
export class VersusSession {
  readonly config: SessionConfig;
  readonly engines: GridEngine[];
  readonly router: GarbageRouter;
  timeMs = 0;
  private unsubscribers: (() => void)[] = [];

  constructor(config: SessionConfig, players = 2) {
    this.config = config;
    const count = Math.max(1, Math.floor(players));
    this.engines = Array.from({ length: count }, (_, index) => new GridEngine(config, { index }));
    this.router = new GarbageRouter(this.engines, config.versus, config.seed);

    this.engines.forEach((engine, i) => {
      this.unsubscribers.push(
        engine.on("combo-started", () => this.router.onComboStarted(i)),
        engine.on("match-scored", (size, _combo, chain) => this.router.onMatchScored(i, size, chain)),
        engine.on("combo-ended", (combo, chain) => this.router.onComboEnded(i, combo, chain)),
        engine.on("game-over", () => {
          log.info(`player ${i} topped out at ${this.timeMs}ms`);
        })
      );
    });
  }

  /** The match is over once at most one grid is still playing (or the only grid lost). */
  get isOver() {
    const alive = this.engines.filter((e) => !e.isGameOver).length;
    return this.engines.length > 1 ? alive <= 1 : alive === 0;
  }

  get winner(): number | null {
    if (this.engines.length < 2 || !this.isOver) return null;
    const i = this.engines.findIndex((e) => !e.isGameOver);
    return i >= 0 ? i : null;
  }

  engine(index: number): GridEngine | undefined {
    return this.engines[index];
  }

  update(dtMs: number) {
    if (this.isOver) return;
    this.timeMs += dtMs;
    for (const e of this.engines) e.update(dtMs);
    this.router.tick(dtMs);
  }

  getState(): SessionState {
    return {
      timeMs: this.timeMs,
      grids: this.engines.map((e) => e.getState()),
      pendingIncoming: this.engines.map((_, i) => this.router.pendingIncoming(i)),
      over: this.isOver,
      winner: this.winner,
    };
  }

  dispose() {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }
}
