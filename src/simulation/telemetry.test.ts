import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DEFAULT_GAME_CONFIG, rulesOf } from "./config.js";
import { Environment } from "./Environment.js";
import { GameDirector } from "./GameDirector.js";
import { vec3 } from "./geometry.js";
import { encodeTelemetryFrame, parseTelemetryFrame, toTelemetryFrame } from "./telemetry.js";
import { AgentRole } from "./types.js";

const silent = { info: () => undefined, warn: () => undefined };

function detectedSnapshot() {
  const environment = new Environment(
    50,
    [{ id: "W", min: { x: 10, z: 10 }, max: { x: 12, z: 13 }, height: 4 }],
    20,
    silent,
  );
  const director = new GameDirector(
    environment,
    rulesOf(DEFAULT_GAME_CONFIG),
    [
      { id: 0, role: AgentRole.Seeker },
      { id: 1, role: AgentRole.Hider },
    ],
    { logger: silent },
  );
  director.start();
  return director.tick(
    0.1,
    new Map([
      [0, vec3(0, 5, 0)],
      [1, vec3(4, 5, 0)],
    ]),
  );
}

describe("toTelemetryFrame", () => {
  it("maps the snapshot onto the wire schema", () => {
    const frame = toTelemetryFrame(detectedSnapshot());
    assert.equal(frame.tick, 1);
    assert.equal(frame.phase, "ACTIVE");
    assert.equal(frame.elapsed_time, 0.1);
    assert.equal(frame.caught_count, 0);
    assert.equal(frame.detected_count, 1);
    assert.equal(frame.total_hiders, 1);
    assert.equal(frame.winner, null);
    assert.deepEqual(frame.agents[1], {
      id: 1,
      role: "HIDER",
      position: [4, 5, 0],
      target: [19, 5, 0],
      behavior_state: "FLEE",
      detected: true,
      caught: false,
    });
    assert.deepEqual(frame.obstacles, [{ id: "W", min_corner: [10, 10], max_corner: [12, 13], height: 4 }]);
    assert.deepEqual(frame.events, [{ type: "detected", time: 0.1, seeker_id: 0, hider_id: 1 }]);
  });
});

describe("parseTelemetryFrame", () => {
  it("accepts an encoded frame", () => {
    const snapshot = detectedSnapshot();
    assert.deepEqual(parseTelemetryFrame(encodeTelemetryFrame(snapshot)), toTelemetryFrame(snapshot));
  });

  it("rejects malformed JSON", () => {
    assert.throws(() => parseTelemetryFrame("{"), /not valid JSON/);
  });

  it("rejects frames that break the schema", () => {
    const frame = { ...toTelemetryFrame(detectedSnapshot()), phase: "PAUSED" };
    assert.throws(() => parseTelemetryFrame(JSON.stringify(frame)), /Invalid telemetry frame: phase/);
  });
});
