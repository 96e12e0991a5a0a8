import { SeededRandom } from "../game-core/rng";
import { RoutineRunner, type Routine } from "../game-core/routines";
import { EventHub } from "../lib/eventHub";
import { createLogger } from "../lib/logger";
import type { VersusConfig } from "../presets/schema";
import { calculateAttackScore, convertScoreToBlocks, type BlockShape } from "./garbageEconomy";

/** What the router needs from each grid it connects. */
export interface GarbageTarget {
  readonly isGameOver: boolean;
  stackHeight(): number;
  receiveGarbage(blocks: BlockShape[]): void;
}

export type RouterEvents = {
  "garbage-sent": [sender: number, target: number, score: number];
  "garbage-countered": [player: number, amount: number, remaining: number];
  "garbage-received": [player: number, score: number, blocks: BlockShape[]];
};

type ComboTally = {
  active: boolean;
  matchSizes: number[];
  maxChain: number;
};

const log = createLogger("garbage router");

/**
 * Turns finished combos into attacks between grids.
 *
 * Each grid's combo is tallied from its match events. When the combo ends
 * its attack score first cancels the grid's own pending incoming score, and
 * what remains is sent after `sendDelayMs` to the targets chosen by the
 * targeting mode. A target in the middle of a combo keeps the score pending
 * (where its own attack can still counter it) until that combo ends.
 */
export class GarbageRouter {
  readonly events = new EventHub<RouterEvents>();
  private readonly targets: GarbageTarget[];
  private readonly config: VersusConfig;
  private readonly rng: SeededRandom;
  private readonly routines = new RoutineRunner();
  private pending: number[];
  private tallies: ComboTally[];
  private sequentialIndex = 0;

  constructor(targets: GarbageTarget[], config: VersusConfig, seed = 1) {
    this.targets = targets;
    this.config = config;
    this.rng = new SeededRandom(seed);
    this.pending = targets.map(() => 0);
    this.tallies = targets.map(() => ({ active: false, matchSizes: [], maxChain: 0 }));
  }

  /** Sends still waiting out their delay. */
  get sendsInFlight() {
    return this.routines.active;
  }

  private valid(i: number) {
    return Number.isInteger(i) && i >= 0 && i < this.targets.length;
  }

  tick(dtMs: number) {
    this.routines.tick(dtMs);
  }

  // -------------------------------------------------------------------
  // Combo tracking

  onComboStarted(player: number) {
    if (!this.valid(player)) return;
    this.tallies[player] = { active: true, matchSizes: [], maxChain: 0 };
  }

  onMatchScored(player: number, size: number, chain: number) {
    if (!this.valid(player)) return;
    const tally = this.tallies[player];
    tally.matchSizes.push(size);
    tally.maxChain = Math.max(tally.maxChain, chain);
  }

  onComboEnded(player: number, combo: number, maxChain: number) {
    if (!this.valid(player)) return;
    const tally = this.tallies[player];
    let score = calculateAttackScore(
      this.config,
      tally.matchSizes,
      combo,
      Math.max(maxChain, tally.maxChain)
    );
    this.tallies[player] = { active: false, matchSizes: [], maxChain: 0 };

    if (score > 0 && this.config.allowCountering && this.pending[player] > 0) {
      const countered = Math.min(score, this.pending[player]);
      this.pending[player] -= countered;
      score -= countered;
      this.events.emit("garbage-countered", player, countered, this.pending[player]);
      log.debug(`player ${player} countered ${countered}, ${this.pending[player]} left`);
    }

    // Whatever was held back during the combo lands now
    this.deliver(player);

    if (score > 0) {
      log.debug(`player ${player} sending ${score} after combo ${combo}, chain ${maxChain}`);
      this.routines.start("send", this.sendLater(player, score));
    }
  }

  private *sendLater(sender: number, score: number): Routine {
    yield this.config.sendDelayMs;
    this.send(sender, score);
  }

  // -------------------------------------------------------------------
  // Targeting

  private opponents(sender: number) {
    const out: number[] = [];
    this.targets.forEach((t, i) => {
      if (i !== sender && !t.isGameOver) out.push(i);
    });
    return out;
  }

  /** Picks the receivers for a send from `sender` according to the targeting mode. */
  chooseTargets(sender: number): number[] {
    const opponents = this.opponents(sender);
    if (opponents.length === 0) return [];

    switch (this.config.targeting) {
      case "sequential":
        return [this.nextSequential(sender)];
      case "random": {
        const pick = this.rng.pick(opponents);
        return pick === undefined ? [] : [pick];
      }
      case "lowest-stack":
        return [this.byStack(opponents, (a, b) => a < b)];
      case "highest-stack":
        return [this.byStack(opponents, (a, b) => a > b)];
      case "split-evenly":
      case "all-opponents":
        return opponents;
    }
  }

  /**
   * Round robin over every grid, skipping the sender and eliminated grids.
   * The cursor moves past the grid it just chose.
   */
  private nextSequential(sender: number) {
    const n = this.targets.length;
    let candidate = this.sequentialIndex % n;
    for (let k = 0; k < n; k++) {
      if (candidate !== sender && !this.targets[candidate].isGameOver) break;
      candidate = (candidate + 1) % n;
    }
    this.sequentialIndex = (candidate + 1) % n;
    return candidate;
  }

  private byStack(candidates: number[], better: (a: number, b: number) => boolean) {
    let best = candidates[0];
    let bestHeight = this.targets[best].stackHeight();
    for (const i of candidates.slice(1)) {
      const h = this.targets[i].stackHeight();
      if (better(h, bestHeight)) {
        best = i;
        bestHeight = h;
      }
    }
    return best;
  }

  /** Routes `score` from `sender` now, without the send delay. */
  send(sender: number, score: number) {
    if (score <= 0 || this.targets.length < 2) return;
    const targets = this.chooseTargets(sender);
    if (targets.length === 0) {
      log.info(`no target left for player ${sender}, ${score} discarded`);
      return;
    }

    if (this.config.targeting === "split-evenly") {
      const share = Math.floor(score / targets.length);
      const remainder = score % targets.length;
      targets.forEach((t, i) => {
        const amount = share + (i < remainder ? 1 : 0);
        if (amount > 0) this.queueFor(sender, t, amount);
      });
      return;
    }
    for (const t of targets) this.queueFor(sender, t, score);
  }

  private queueFor(sender: number, target: number, score: number) {
    this.pending[target] += score;
    this.events.emit("garbage-sent", sender, target, score);
    if (!this.tallies[target].active) this.deliver(target);
  }

  private deliver(player: number) {
    const score = this.pending[player];
    if (score <= 0) return;
    this.pending[player] = 0;
    const target = this.targets[player];
    if (target.isGameOver) return;

    const blocks = convertScoreToBlocks(this.config.blockCosts, score);
    if (blocks.length > 0) target.receiveGarbage(blocks);
    this.events.emit("garbage-received", player, score, blocks);
    log.debug(`player ${player} received ${blocks.length} block(s) for ${score}`);
  }

  // -------------------------------------------------------------------
  // Queries and manual control

  pendingIncoming(player: number) {
    return this.valid(player) ? this.pending[player] : 0;
  }

  isInCombo(player: number) {
    return this.valid(player) && this.tallies[player].active;
  }

  currentChain(player: number) {
    return this.valid(player) ? this.tallies[player].maxChain : 0;
  }

  forceDeliver(player: number) {
    if (this.valid(player)) this.deliver(player);
  }

  manualSend(sender: number, target: number, score: number) {
    if (!this.valid(target) || score <= 0) return;
    this.queueFor(sender, target, score);
  }

  clearPending(player: number) {
    if (!this.valid(player)) return;
    this.pending[player] = 0;
    this.tallies[player] = { active: this.tallies[player].active, matchSizes: [], maxChain: 0 };
  }
}
