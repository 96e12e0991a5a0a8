import { z } from "zod";

export const targetingModes = [
  "sequential",
  "split-evenly",
  "all-opponents",
  "random",
  "lowest-stack",
  "highest-stack",
] as const;

export type TargetingMode = (typeof targetingModes)[number];

const gridSchema = z.object({
  width: z.number().int().min(3).default(6),
  height: z.number().int().min(4).default(14),
  // Rows generated below the visible grid, revealed as the grid rises
  preloadRows: z.number().int().min(1).default(2),
  initialFillRows: z.number().int().min(0).default(4),
  tileTypes: z.number().int().min(3).max(12).default(6),
});

const timingSchema = z.object({
  swapMs: z.number().nonnegative().default(150),
  // Gravity speed: milliseconds per row of fall distance
  dropMsPerRow: z.number().positive().default(150),
  // Scale applied to dropMsPerRow for slip and interception nudges
  nudgeFactor: z.number().positive().default(0.5),
  highlightMs: z.number().nonnegative().default(900),
  popStaggerMs: z.number().nonnegative().default(150),
  postPopMs: z.number().nonnegative().default(100),
  conversionDelayMs: z.number().nonnegative().default(500),
  garbageDropDelayMs: z.number().nonnegative().default(1000),
  maxGravityPasses: z.number().int().positive().default(32),
});

const riseSchema = z.object({
  // Rows per second at level 1
  baseSpeed: z.number().positive().default(0.1),
  speedMultiplier: z.number().positive().default(1),
  fastRiseMultiplier: z.number().min(1).default(4),
  startLevel: z.number().int().min(1).default(1),
  maxLevel: z.number().int().min(1).default(99),
  levelIntervalMs: z.number().positive().default(60000),
  gracePeriodMs: z.number().nonnegative().default(2000),
  enableBreathingRoom: z.boolean().default(true),
  breathingRoomPerTileMs: z.number().nonnegative().default(200),
  maxBreathingRoomMs: z.number().nonnegative().default(5000),
  catchUpMultiplier: z.number().min(1).default(1.5),
});

const garbageSchema = z.object({
  maxPending: z.number().int().positive().default(12),
  maxWidth: z.number().int().positive().default(6),
  propagateToCluster: z.boolean().default(true),
});

export const blockCostSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  // A cost of zero disables the shape
  cost: z.number().int().nonnegative(),
});

export type BlockCost = z.infer<typeof blockCostSchema>;

const defaultBlockCosts: BlockCost[] = [
  { width: 6, height: 6, cost: 10000 },
  { width: 6, height: 5, cost: 8000 },
  { width: 6, height: 4, cost: 7000 },
  { width: 6, height: 3, cost: 6000 },
  { width: 6, height: 2, cost: 4000 },
  { width: 6, height: 1, cost: 1500 },
  { width: 5, height: 2, cost: 1000 },
  { width: 4, height: 2, cost: 800 },
  { width: 3, height: 2, cost: 700 },
  { width: 5, height: 1, cost: 600 },
  { width: 2, height: 2, cost: 500 },
  { width: 1, height: 2, cost: 400 },
  { width: 1, height: 1, cost: 250 },
];

const versusSchema = z.object({
  targeting: z.enum(targetingModes).default("sequential"),
  allowCountering: z.boolean().default(true),
  sendDelayMs: z.number().nonnegative().default(500),
  matchSizeScores: z
    .array(z.number().int().nonnegative())
    .default([0, 0, 0, 50, 100, 175, 300, 400, 500, 550, 600]),
  comboBonusScores: z
    .array(z.number().int().nonnegative())
    .default([0, 0, 100, 150, 200, 250, 300, 350, 400, 450, 500]),
  chainBonusScores: z
    .array(z.number().int().nonnegative())
    .default([0, 0, 100, 200, 300, 400, 500, 600, 700, 800, 900]),
  blockCosts: z.array(blockCostSchema).default(defaultBlockCosts),
});

export const sessionConfigSchema = z
  .object({
    grid: gridSchema.default({}),
    timing: timingSchema.default({}),
    rise: riseSchema.default({}),
    garbage: garbageSchema.default({}),
    versus: versusSchema.default({}),
    seed: z.number().int().default(1),
  })
  .refine((c) => c.grid.initialFillRows < c.grid.height, {
    message: "initialFillRows must leave at least one empty row",
    path: ["grid", "initialFillRows"],
  })
  .refine((c) => c.rise.startLevel <= c.rise.maxLevel, {
    message: "startLevel cannot exceed maxLevel",
    path: ["rise", "startLevel"],
  });

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type GridConfig = SessionConfig["grid"];
export type TimingConfig = SessionConfig["timing"];
export type RiseConfig = SessionConfig["rise"];
export type GarbageConfig = SessionConfig["garbage"];
export type VersusConfig = SessionConfig["versus"];

export const presetSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(""),
  config: z.record(z.unknown()).default({}),
});

export type Preset = z.infer<typeof presetSchema>;

export function parseSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  return sessionConfigSchema.parse(input);
}
