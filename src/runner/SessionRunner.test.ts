import assert from "node:assert/strict";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it } from "node:test";
import { Environment } from "../simulation/Environment.js";
import { ConfigurationError } from "../simulation/errors.js";
import { Vec3, vec3 } from "../simulation/geometry.js";
import { AgentRole, AgentSnapshot, HiderBehavior, SeekerBehavior, SessionPhase } from "../simulation/types.js";
import { Logger } from "../utils/logger.js";
import { parseRunnerConfig } from "./config.js";
import { KinematicMotion } from "./motion.js";
import { SessionRunner } from "./SessionRunner.js";

const silent: Logger = { info: () => {}, warn: () => {} };

function smallConfig(output = "unused.json") {
  return parseRunnerConfig({
    game: { seekerCount: 1, hiderCount: 2, gameDuration: 2, numObstacles: 3, obstacleSeed: "runner" },
    tickRate: 10,
    snapshotInterval: 5,
    output,
  });
}

function agent(id: number, role: AgentRole, position: Vec3, target: Vec3 | null, caught = false): AgentSnapshot {
  return {
    id,
    role,
    position,
    target,
    behaviorState: role === AgentRole.Seeker ? SeekerBehavior.Patrol : caught ? HiderBehavior.Caught : HiderBehavior.Hide,
    detected: caught,
    caught,
  };
}

describe("parseRunnerConfig", () => {
  it("fills runner defaults and derives the tick budget from the clock", () => {
    const config = parseRunnerConfig();
    assert.equal(config.tickRate, 60);
    assert.equal(config.snapshotInterval, 30);
    assert.equal(config.seekerSpeed, 6);
    assert.equal(config.hiderSpeed, 5);
    assert.equal(config.output, "dist/replays/session.json");
    assert.equal(config.maxTicks, 7201);
    assert.equal(config.game.gameDuration, 120);
  });

  it("keeps an explicit tick budget", () => {
    assert.equal(parseRunnerConfig({ maxTicks: 10 }).maxTicks, 10);
  });

  it("rejects a non-positive tick rate", () => {
    assert.throws(
      () => parseRunnerConfig({ tickRate: 0 }),
      (err: unknown) =>
        err instanceof ConfigurationError && err.issues.length === 1 && err.issues[0] === "tickRate: Number must be greater than 0",
    );
  });

  it("surfaces game configuration errors", () => {
    assert.throws(() => parseRunnerConfig({ game: { catchRadius: 6 } }), ConfigurationError);
  });
});

describe("KinematicMotion", () => {
  const speeds = { [AgentRole.Seeker]: 6, [AgentRole.Hider]: 5 };

  it("moves toward the target at the role speed", () => {
    const motion = new KinematicMotion(new Environment(50, [], 20, silent), speeds);
    const seeker = agent(0, AgentRole.Seeker, vec3(0, 5, 0), vec3(10, 5, 0));
    motion.place([seeker]);
    motion.advance([seeker], 1);
    assert.deepEqual(motion.positions().get(0), vec3(6, 5, 0));
  });

  it("stops on the target instead of overshooting", () => {
    const motion = new KinematicMotion(new Environment(50, [], 20, silent), speeds);
    const hider = agent(1, AgentRole.Hider, vec3(0, 5, 0), vec3(3, 5, 0));
    motion.place([hider]);
    motion.advance([hider], 1);
    assert.deepEqual(motion.positions().get(1), vec3(3, 5, 0));
  });

  it("refuses a step that would enter an obstacle", () => {
    const wall = { id: "wall", min: { x: 2, z: -5 }, max: { x: 4, z: 5 }, height: 10 };
    const motion = new KinematicMotion(new Environment(50, [wall], 20, silent), speeds);
    const seeker = agent(0, AgentRole.Seeker, vec3(0, 5, 0), vec3(10, 5, 0));
    motion.place([seeker]);
    motion.advance([seeker], 0.5);
    assert.deepEqual(motion.positions().get(0), vec3(0, 5, 0));
  });

  it("leaves caught and idle agents where they are", () => {
    const motion = new KinematicMotion(new Environment(50, [], 20, silent), speeds);
    const caught = agent(1, AgentRole.Hider, vec3(1, 2, 1), vec3(10, 2, 10), true);
    const idle = agent(2, AgentRole.Hider, vec3(-1, 2, -1), null);
    motion.place([caught, idle]);
    motion.advance([caught, idle], 1);
    assert.deepEqual(motion.positions().get(1), vec3(1, 2, 1));
    assert.deepEqual(motion.positions().get(2), vec3(-1, 2, -1));
  });
});

describe("SessionRunner", () => {
  it("runs a session to completion and records frames", () => {
    const config = smallConfig();
    const replay = new SessionRunner(config, silent).run(silent);

    assert.equal(replay.seed, "runner");
    assert.equal(replay.config.maxTicks, 21);
    assert.equal(replay.arena.playAreaSize, 50);
    assert.equal(replay.arena.obstacles.length, 3);
    assert.equal(replay.summary.phase, SessionPhase.Ended);
    assert.ok(replay.summary.ticks <= 21);
    assert.equal(replay.summary.totalHiders, 2);

    const first = replay.frames[0];
    assert.equal(first.tick, 0);
    assert.equal(first.phase, SessionPhase.Active);
    assert.equal(first.agents.length, 3);

    const last = replay.frames[replay.frames.length - 1];
    assert.equal(last.phase, SessionPhase.Ended);
    assert.equal(last.tick, replay.summary.ticks);
    assert.equal(last.events[last.events.length - 1].type, "ended");

    for (const frame of replay.frames.slice(1)) {
      assert.ok(frame.tick % 5 === 0 || frame.events.length > 0);
    }
  });

  it("is deterministic for a fixed seed", () => {
    const a = new SessionRunner(smallConfig(), silent).run(silent);
    const b = new SessionRunner(smallConfig(), silent).run(silent);
    assert.deepEqual(a, b);
  });

  it("writes the replay to the configured path", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "replay-"));
    const output = path.join(dir, "nested", "replay.json");
    const runner = new SessionRunner(smallConfig(output), silent);
    const replay = runner.run(silent);

    try {
      assert.equal(runner.saveReplay(replay), output);
      const stored: unknown = JSON.parse(fs.readFileSync(output, "utf-8"));
      assert.deepEqual(stored, JSON.parse(JSON.stringify(replay)));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
