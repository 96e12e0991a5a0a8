import { createLogger } from "../lib/logger";

/**
 * What a routine yields: a number of milliseconds to sleep, or a predicate
 * polled once per tick until it returns true.
 */
export type Wait = number | (() => boolean);
export type Routine = Generator<Wait, void, void>;

export type RoutineHandle = {
  readonly name: string;
  readonly done: boolean;
  cancel: () => void;
};

type Running = {
  name: string;
  gen: Routine;
  waitMs: number;
  until: (() => boolean) | null;
  done: boolean;
};

const log = createLogger("routines");

// Guards against a routine that keeps yielding zero-length waits
const MAX_STEPS_PER_TICK = 256;

/**
 * Advances multi-step sequences (swap, slip, cascade, garbage drop) from
 * the simulation tick. A routine runs synchronously up to its first wait
 * when started; afterwards it only resumes inside {@link tick}, so every
 * mutation it makes happens on a tick.
 *
 * Time not consumed by a finished wait carries into the next wait within
 * the same tick.
 */
export class RoutineRunner {
  private running: Running[] = [];

  get active() {
    return this.running.length;
  }

  start(name: string, gen: Routine): RoutineHandle {
    const r: Running = { name, gen, waitMs: 0, until: null, done: false };
    this.running.push(r);
    this.advance(r, 0);
    return {
      name,
      get done() {
        return r.done;
      },
      cancel: () => {
        if (r.done) return;
        r.done = true;
        r.gen.return();
        this.running = this.running.filter((x) => x !== r);
      },
    };
  }

  tick(dtMs: number) {
    for (const r of [...this.running]) {
      if (!r.done) this.advance(r, dtMs);
    }
    this.running = this.running.filter((r) => !r.done);
  }

  private advance(r: Running, budgetMs: number) {
    let budget = budgetMs;
    for (let steps = 0; steps < MAX_STEPS_PER_TICK; steps++) {
      if (r.until) {
        if (!r.until()) return;
        r.until = null;
      } else if (r.waitMs > 0) {
        if (r.waitMs > budget) {
          r.waitMs -= budget;
          return;
        }
        budget -= r.waitMs;
        r.waitMs = 0;
      }
      const next = r.gen.next();
      if (next.done) {
        r.done = true;
        return;
      }
      if (typeof next.value === "number") r.waitMs = Math.max(0, next.value);
      else r.until = next.value;
    }
    log.error(`routine '${r.name}' exceeded ${MAX_STEPS_PER_TICK} steps in one tick`);
  }
}
