import { z } from "zod";
import { formatIssues } from "../simulation/config.js";
import { ConfigurationError } from "../simulation/errors.js";
import { RunnerInput } from "./config.js";

export function parseArgs(args: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

const count = z.coerce.number().int();
const amount = z.coerce.number();
// "42" and 42 hash to different arenas, so integer seeds stay numeric
const seed = z
  .string()
  .min(1)
  .transform((value): string | number => (/^-?\d+$/.test(value) ? Number(value) : value));

const CliSchema = z
  .object({
    seed: seed.optional(),
    seekers: count.optional(),
    hiders: count.optional(),
    duration: amount.optional(),
    obstacles: count.optional(),
    arena: amount.optional(),
    detectionRadius: amount.optional(),
    catchRadius: amount.optional(),
    visionRange: amount.optional(),
    fleeDistance: amount.optional(),
    tickRate: amount.optional(),
    maxTicks: count.optional(),
    snapshotInterval: count.optional(),
    seekerSpeed: amount.optional(),
    hiderSpeed: amount.optional(),
    output: z.string().optional(),
  })
  .strict();

function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

/** Maps command-line flags onto runner input; unknown or malformed flags are configuration errors. */
export function parseCliArgs(args: readonly string[]): RunnerInput {
  const result = CliSchema.safeParse(parseArgs(args));
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  const cli = result.data;
  return {
    game: defined({
      obstacleSeed: cli.seed,
      seekerCount: cli.seekers,
      hiderCount: cli.hiders,
      gameDuration: cli.duration,
      numObstacles: cli.obstacles,
      playAreaSize: cli.arena,
      detectionRadius: cli.detectionRadius,
      catchRadius: cli.catchRadius,
      seekerVisionRange: cli.visionRange,
      fleeDistance: cli.fleeDistance,
    }),
    tickRate: cli.tickRate,
    maxTicks: cli.maxTicks,
    snapshotInterval: cli.snapshotInterval,
    seekerSpeed: cli.seekerSpeed,
    hiderSpeed: cli.hiderSpeed,
    output: cli.output,
  };
}
