import { z } from "zod";
import { parseGameConfig } from "../simulation/config.js";
import { ConfigurationError } from "../simulation/errors.js";
import { RunnerConfig } from "./types.js";

const RunnerOptionsSchema = z
  .object({
    tickRate: z.number().positive().default(60),
    maxTicks: z.number().int().positive().optional(),
    snapshotInterval: z.number().int().positive().default(30),
    seekerSpeed: z.number().positive().default(6),
    hiderSpeed: z.number().positive().default(5),
    output: z.string().min(1).default("dist/replays/session.json"),
  })
  .strict();

export interface RunnerInput {
  game?: unknown;
  tickRate?: number;
  maxTicks?: number;
  snapshotInterval?: number;
  seekerSpeed?: number;
  hiderSpeed?: number;
  output?: string;
}

export function parseRunnerConfig(input: RunnerInput = {}): RunnerConfig {
  const { game, ...options } = input;
  const parsedGame = parseGameConfig(game);
  const result = RunnerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map((i) => `${i.path.join(".") || "runner"}: ${i.message}`));
  }
  const { maxTicks, ...rest } = result.data;
  return {
    ...rest,
    game: parsedGame,
    // one tick past the clock so a time-out always resolves
    maxTicks: maxTicks ?? Math.ceil(parsedGame.gameDuration * rest.tickRate) + 1,
  };
}
