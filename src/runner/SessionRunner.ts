import * as fs from "fs";
import * as path from "path";
import { GameDirector } from "../simulation/GameDirector.js";
import { toTelemetryFrame } from "../simulation/telemetry.js";
import { AgentRole, SessionPhase } from "../simulation/types.js";
import { createConsoleLogger, Logger } from "../utils/logger.js";
import { KinematicMotion } from "./motion.js";
import { ReplayDataset, RunnerConfig } from "./types.js";

/** Drives one headless session at a fixed step and records it as a replay. */
export class SessionRunner {
  private readonly config: RunnerConfig;
  private readonly logger: Logger;

  constructor(config: RunnerConfig, logger: Logger = createConsoleLogger("runner")) {
    this.config = config;
    this.logger = logger;
  }

  run(gameLogger?: Logger): ReplayDataset {
    const { game, tickRate, maxTicks, snapshotInterval } = this.config;
    const director = GameDirector.fromConfig(game, gameLogger);
    const motion = new KinematicMotion(director.environment, {
      [AgentRole.Seeker]: this.config.seekerSpeed,
      [AgentRole.Hider]: this.config.hiderSpeed,
    });
    motion.place(director.snapshot().agents);

    director.start();
    const dt = 1 / tickRate;
    const frames = [toTelemetryFrame(director.snapshot())];

    let snapshot = director.snapshot();
    for (let i = 0; i < maxTicks && snapshot.phase === SessionPhase.Active; i++) {
      snapshot = director.tick(dt, motion.positions());
      if (snapshot.tick % snapshotInterval === 0 || snapshot.events.length > 0) {
        frames.push(toTelemetryFrame(snapshot));
      }
      motion.advance(snapshot.agents, dt);
    }

    if (snapshot.phase === SessionPhase.Active) {
      this.logger.warn(`tick budget of ${maxTicks} exhausted, stopping session`);
      snapshot = director.stop();
      frames.push(toTelemetryFrame(snapshot));
    }

    this.logger.info(
      `session finished after ${snapshot.tick} ticks: winner=${snapshot.winner ?? "none"} caught=${snapshot.caughtCount}/${snapshot.totalHiders} frames=${frames.length}`,
    );

    return {
      seed: game.obstacleSeed,
      config: {
        game,
        tickRate,
        maxTicks,
        snapshotInterval,
        seekerSpeed: this.config.seekerSpeed,
        hiderSpeed: this.config.hiderSpeed,
      },
      arena: director.environment.getArenaSnapshot(),
      summary: {
        phase: snapshot.phase,
        winner: snapshot.winner,
        ticks: snapshot.tick,
        elapsedTime: snapshot.elapsedTime,
        caughtCount: snapshot.caughtCount,
        totalHiders: snapshot.totalHiders,
      },
      frames,
    };
  }

  saveReplay(dataset: ReplayDataset) {
    const outputPath = this.config.output;
    const resolved = path.isAbsolute(outputPath) ? outputPath : path.resolve(process.cwd(), outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(dataset, null, 2), "utf-8");
    return resolved;
  }
}
