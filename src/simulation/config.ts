import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { GameConfig, GameRules } from "./types.js";

export const DEFAULT_GAME_CONFIG: GameConfig = {
  seekerCount: 2,
  hiderCount: 7,
  gameDuration: 120,
  detectionRadius: 5,
  catchRadius: 1.5,
  seekerVisionRange: 15,
  patrolUpdateInterval: 5,
  hiderUpdateInterval: 8,
  fleeDistance: 15,
  fleeTriggerDistance: 10,
  playAreaSize: 50,
  numObstacles: 8,
  obstacleSeed: 42,
  hidingSpotCount: 20,
};

const positive = z.number().finite().positive();

const GameRulesShape = {
  gameDuration: positive,
  detectionRadius: positive,
  catchRadius: positive,
  seekerVisionRange: positive,
  patrolUpdateInterval: positive,
  hiderUpdateInterval: positive,
  fleeDistance: positive,
  fleeTriggerDistance: positive,
};

function checkRadii(rules: GameRules, ctx: z.RefinementCtx) {
  if (rules.catchRadius > rules.detectionRadius) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["catchRadius"],
      message: `must not exceed detectionRadius (${rules.catchRadius} > ${rules.detectionRadius})`,
    });
  }
  if (rules.seekerVisionRange < rules.detectionRadius) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["seekerVisionRange"],
      message: `must be at least detectionRadius (${rules.seekerVisionRange} < ${rules.detectionRadius})`,
    });
  }
}

export const GameRulesSchema = z.object(GameRulesShape).strict().superRefine(checkRadii);

export const GameConfigSchema = z
  .object({
    ...GameRulesShape,
    seekerCount: z.number().int().positive(),
    hiderCount: z.number().int().positive(),
    playAreaSize: positive,
    numObstacles: z.number().int().nonnegative(),
    obstacleSeed: z.union([z.string().min(1), z.number().int()]),
    hidingSpotCount: z.number().int().nonnegative(),
  })
  .strict()
  .superRefine(checkRadii);

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `${path}: ${issue.message}`;
  });
}

function asRecord(input: unknown): Record<string, unknown> {
  if (input === undefined) return {};
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ConfigurationError(["config: expected an object"]);
  }
  return { ...input };
}

/** Merges `input` over the defaults and validates the result. */
export function parseGameConfig(input: unknown = {}): GameConfig {
  const result = GameConfigSchema.safeParse({ ...DEFAULT_GAME_CONFIG, ...asRecord(input) });
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

export function parseGameRules(input: unknown): GameRules {
  const result = GameRulesSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

export function rulesOf(config: GameConfig): GameRules {
  return {
    gameDuration: config.gameDuration,
    detectionRadius: config.detectionRadius,
    catchRadius: config.catchRadius,
    seekerVisionRange: config.seekerVisionRange,
    patrolUpdateInterval: config.patrolUpdateInterval,
    hiderUpdateInterval: config.hiderUpdateInterval,
    fleeDistance: config.fleeDistance,
    fleeTriggerDistance: config.fleeTriggerDistance,
  };
}
