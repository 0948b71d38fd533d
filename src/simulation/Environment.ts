import { z } from "zod";
import { formatIssues } from "./config.js";
import { ConfigurationError } from "./errors.js";
import {
  Obstacle,
  Vec3,
  clamp,
  collides,
  distanceToObstacle,
  footprintOverlapArea,
  footprintsOverlap,
  sampleSegment,
} from "./geometry.js";
import { HidingSpot } from "./types.js";
import { createRng, Rng, uniform } from "../utils/random.js";
import { createConsoleLogger, Logger } from "../utils/logger.js";

export const AGENT_RADIUS = 0.5;
export const LOS_SAMPLE_RADIUS = 0.1;
export const DEFAULT_LOS_SAMPLES = 20;
export const DEFAULT_HIDING_SPOTS = 20;

export const FLIGHT_FLOOR = 2;
export const FLIGHT_CEILING = 10;
export const MAX_ALTITUDE = 20;

const OBSTACLE_HALF_EXTENT = { min: 1, max: 2.5 };
const OBSTACLE_HEIGHT = { min: 3, max: 8 };
// Tunable: minimum ground gap kept between generated obstacles.
export const OBSTACLE_SEPARATION = 1;
export const MAX_PLACEMENT_ATTEMPTS = 50;

const HIDING_STANDOFF = 1.5;
const REFERENCE_COVER_AREA = 40;
const SAFE_POSITION_ATTEMPTS = 100;

export interface EnvironmentOptions {
  playAreaSize: number;
  obstacleCount: number;
  hidingSpotCount?: number;
}

const ArenaSchema = z.object({
  playAreaSize: z.number().positive().finite(),
  hidingSpotCount: z.number().int().nonnegative(),
});

const EnvironmentOptionsSchema = ArenaSchema.extend({
  obstacleCount: z.number().int().nonnegative(),
  hidingSpotCount: z.number().int().nonnegative().optional(),
});

function validated<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

export function placeObstacles(rng: Rng, playAreaSize: number, count: number, logger: Logger): Obstacle[] {
  const half = playAreaSize / 2;
  const placed: Obstacle[] = [];

  for (let i = 0; i < count; i++) {
    let best: Obstacle | null = null;
    let bestOverlap = Infinity;
    let free = false;

    for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS; attempt++) {
      const hw = Math.min(uniform(rng, OBSTACLE_HALF_EXTENT.min, OBSTACLE_HALF_EXTENT.max), half);
      const hd = Math.min(uniform(rng, OBSTACLE_HALF_EXTENT.min, OBSTACLE_HALF_EXTENT.max), half);
      const height = uniform(rng, OBSTACLE_HEIGHT.min, OBSTACLE_HEIGHT.max);
      const cx = uniform(rng, -half + hw, half - hw);
      const cz = uniform(rng, -half + hd, half - hd);
      const candidate: Obstacle = {
        id: `O${i}`,
        min: { x: cx - hw, z: cz - hd },
        max: { x: cx + hw, z: cz + hd },
        height,
      };

      if (!placed.some((o) => footprintsOverlap(candidate, o, OBSTACLE_SEPARATION))) {
        best = candidate;
        free = true;
        break;
      }
      const overlap = placed.reduce((acc, o) => acc + footprintOverlapArea(candidate, o, OBSTACLE_SEPARATION), 0);
      if (overlap < bestOverlap) {
        best = candidate;
        bestOverlap = overlap;
      }
    }

    if (!best) continue;
    if (!free) {
      logger.warn(
        `obstacle ${best.id}: no free placement after ${MAX_PLACEMENT_ATTEMPTS} attempts, accepting overlap area ${bestOverlap.toFixed(2)}`,
      );
    }
    placed.push(best);
  }

  return placed;
}

/**
 * Static arena: obstacles, bounds and precomputed hiding spots.
 * Nothing here changes after construction.
 */
export class Environment {
  readonly playAreaSize: number;
  readonly obstacles: readonly Obstacle[];
  readonly hidingSpots: readonly HidingSpot[];
  private readonly logger: Logger;

  constructor(
    playAreaSize: number,
    obstacles: readonly Obstacle[],
    hidingSpotCount = DEFAULT_HIDING_SPOTS,
    logger: Logger = createConsoleLogger("env"),
  ) {
    validated(ArenaSchema, { playAreaSize, hidingSpotCount });
    this.playAreaSize = playAreaSize;
    this.obstacles = Object.freeze(
      obstacles.map((o) => Object.freeze({ ...o, min: Object.freeze({ ...o.min }), max: Object.freeze({ ...o.max }) })),
    );
    this.logger = logger;
    this.hidingSpots = Object.freeze(
      this.generateHidingSpots(hidingSpotCount).map((s) => Object.freeze({ ...s, position: Object.freeze(s.position) })),
    );
  }

  static fromSeed(seed: string | number, options: EnvironmentOptions, logger?: Logger): Environment {
    return Environment.generate(createRng(seed), options, logger);
  }

  static generate(rng: Rng, options: EnvironmentOptions, logger: Logger = createConsoleLogger("env")): Environment {
    const { playAreaSize, obstacleCount, hidingSpotCount } = validated(EnvironmentOptionsSchema, options);
    const obstacles = placeObstacles(rng, playAreaSize, obstacleCount, logger);
    return new Environment(playAreaSize, obstacles, hidingSpotCount ?? DEFAULT_HIDING_SPOTS, logger);
  }

  get halfExtent(): number {
    return this.playAreaSize / 2;
  }

  checkCollision(point: Vec3, radius = AGENT_RADIUS): boolean {
    return collides(point, radius, this.obstacles);
  }

  /**
   * Discrete occlusion test: samples the segment and fails on the first sample
   * touching an obstacle. Obstacles thinner than the sample spacing can be missed.
   */
  isLineOfSightClear(a: Vec3, b: Vec3, numSamples = DEFAULT_LOS_SAMPLES): boolean {
    for (const sample of sampleSegment(a, b, numSamples)) {
      if (this.checkCollision(sample, LOS_SAMPLE_RADIUS)) return false;
    }
    return true;
  }

  isInPlayArea(p: Vec3): boolean {
    const half = this.halfExtent;
    return Math.abs(p.x) <= half && Math.abs(p.z) <= half && p.y >= 0 && p.y <= MAX_ALTITUDE;
  }

  /** Clamps to the arena inset by `margin` and to the flight band. */
  clampToFlightVolume(p: Vec3, margin = 0): Vec3 {
    const limit = this.halfExtent - Math.min(Math.max(0, margin), this.halfExtent);
    return {
      x: clamp(p.x, -limit, limit),
      y: clamp(p.y, FLIGHT_FLOOR, FLIGHT_CEILING),
      z: clamp(p.z, -limit, limit),
    };
  }

  /**
   * Candidate spots a fixed standoff from each side of every obstacle, in
   * obstacle order (+x, +z, -x, -z per obstacle), until `count` are found.
   * Quality grows with the area of the face the spot hides behind.
   */
  generateHidingSpots(count = DEFAULT_HIDING_SPOTS): HidingSpot[] {
    const spots: HidingSpot[] = [];
    if (count <= 0) return spots;

    for (const obstacle of this.obstacles) {
      const cx = (obstacle.min.x + obstacle.max.x) / 2;
      const cz = (obstacle.min.z + obstacle.max.z) / 2;
      const width = obstacle.max.x - obstacle.min.x;
      const depth = obstacle.max.z - obstacle.min.z;
      const y = obstacle.height / 2;
      const sides: Array<{ position: Vec3; face: number }> = [
        { position: { x: obstacle.max.x + HIDING_STANDOFF, y, z: cz }, face: depth },
        { position: { x: cx, y, z: obstacle.max.z + HIDING_STANDOFF }, face: width },
        { position: { x: obstacle.min.x - HIDING_STANDOFF, y, z: cz }, face: depth },
        { position: { x: cx, y, z: obstacle.min.z - HIDING_STANDOFF }, face: width },
      ];

      for (const side of sides) {
        if (!this.isInPlayArea(side.position) || this.checkCollision(side.position, AGENT_RADIUS)) continue;
        spots.push({
          position: side.position,
          quality: Math.min(1, (side.face * obstacle.height) / REFERENCE_COVER_AREA),
          obstacleId: obstacle.id,
        });
        if (spots.length >= count) return spots;
      }
    }

    return spots;
  }

  /** Rejection-samples a point in the flight band at least `minClearance` from every obstacle. */
  sampleSafePosition(rng: Rng, minClearance = 2, maxAttempts = SAFE_POSITION_ATTEMPTS): Vec3 {
    const half = this.halfExtent;
    const inset = Math.min(Math.max(0, minClearance), half);
    let best: Vec3 | null = null;
    let bestClearance = -Infinity;

    for (let attempt = 0; attempt < Math.max(1, maxAttempts); attempt++) {
      const p: Vec3 = {
        x: uniform(rng, -half + inset, half - inset),
        y: uniform(rng, FLIGHT_FLOOR, FLIGHT_CEILING),
        z: uniform(rng, -half + inset, half - inset),
      };
      if (!this.checkCollision(p, minClearance)) return p;
      const clearance = this.clearanceAt(p);
      if (clearance > bestClearance) {
        best = p;
        bestClearance = clearance;
      }
    }

    this.logger.warn(
      `no position with clearance ${minClearance} after ${maxAttempts} attempts, using best clearance ${bestClearance.toFixed(2)}`,
    );
    return best ?? { x: 0, y: FLIGHT_FLOOR, z: 0 };
  }

  clearanceAt(p: Vec3): number {
    return this.obstacles.reduce((acc, o) => Math.min(acc, distanceToObstacle(p, o)), Infinity);
  }

  getArenaSnapshot() {
    return {
      playAreaSize: this.playAreaSize,
      obstacles: this.obstacles,
      hidingSpots: this.hidingSpots,
    };
  }
}
