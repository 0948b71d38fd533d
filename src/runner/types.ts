import { Obstacle } from "../simulation/geometry.js";
import { TelemetryFrame } from "../simulation/telemetry.js";
import { GameConfig, HidingSpot, SessionPhase, Winner } from "../simulation/types.js";

export interface RunnerConfig {
  game: GameConfig;
  tickRate: number; // ticks per second
  maxTicks: number;
  snapshotInterval: number; // record every Nth tick (event ticks are always kept)
  seekerSpeed: number; // units per second
  hiderSpeed: number;
  output: string;
}

export interface SessionSummary {
  phase: SessionPhase;
  winner: Winner | null;
  ticks: number;
  elapsedTime: number;
  caughtCount: number;
  totalHiders: number;
}

export interface ReplayDataset {
  seed: string | number;
  config: Omit<RunnerConfig, "output">;
  arena: {
    playAreaSize: number;
    obstacles: readonly Obstacle[];
    hidingSpots: readonly HidingSpot[];
  };
  summary: SessionSummary;
  frames: TelemetryFrame[];
}
