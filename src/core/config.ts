import { z } from "zod";
import { ConfigError } from "./errors";

export const DIFFICULTIES = ["easy", "normal", "hard"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

/** Frame units (1/60 s) of accumulated time between two spread steps. */
export const SPREAD_DELAY: Readonly<Record<Difficulty, number>> = {
  easy: 55,
  normal: 35,
  hard: 20,
};

/** Nominal update rate the frame-unit constants were tuned against. */
export const FRAME_RATE = 60;

// Balance constants, tuned by feel. Overrides re-balance the game.
const TuningSchema = z.object({
  spreadFactor: z.number().min(0).max(1).default(0.39),
  controlledBurnFactor: z.number().min(0).max(1).default(0.4),
  controlledBurnBudget: z
    .tuple([z.number().int().min(0), z.number().int().min(0)])
    .refine(([min, max]) => min <= max, "budget min must not exceed max")
    .default([10, 20]),
  controlledBurnAgingRate: z.number().min(0).default(0.2),
  defeatThreshold: z.number().min(0).max(1).default(0.15),
  maxAshTimer: z.number().positive().default(420),
  initialFires: z.number().int().min(0).default(2),
  fireStartAttempts: z.number().int().positive().default(100),
});

export const SimulationConfigSchema = z.object({
  width: z.number().int().min(1).default(80),
  height: z.number().int().min(1).default(45),
  seed: z
    .string()
    .min(1)
    .default(() => Date.now().toString(36)),
  difficulty: z.enum(DIFFICULTIES).default("normal"),
  debugAssertions: z.boolean().default(false),
  logLevel: z.enum(["debug", "info", "warn", "silent"]).default("info"),
  tuning: TuningSchema.default({}),
});

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;
export type FireTuning = z.output<typeof TuningSchema>;

export const DEFAULT_TUNING: FireTuning = TuningSchema.parse({});

export function loadConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}
