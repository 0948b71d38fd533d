import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DEFAULT_GAME_CONFIG, parseGameConfig, parseGameRules, rulesOf } from "./config.js";
import { ConfigurationError } from "./errors.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  assert.fail("expected a ConfigurationError");
}

describe("parseGameConfig", () => {
  it("fills every field from the defaults", () => {
    assert.deepEqual(parseGameConfig(), DEFAULT_GAME_CONFIG);
  });

  it("merges overrides over the defaults", () => {
    const config = parseGameConfig({ hiderCount: 3, obstacleSeed: "arena" });
    assert.equal(config.hiderCount, 3);
    assert.equal(config.obstacleSeed, "arena");
    assert.equal(config.seekerCount, DEFAULT_GAME_CONFIG.seekerCount);
  });

  it("rejects zero or negative agent counts", () => {
    assert.deepEqual(issuesOf(() => parseGameConfig({ seekerCount: 0 })), [
      "seekerCount: Number must be greater than 0",
    ]);
    assert.deepEqual(issuesOf(() => parseGameConfig({ hiderCount: -2 })), [
      "hiderCount: Number must be greater than 0",
    ]);
  });

  it("rejects a non-positive duration", () => {
    assert.deepEqual(issuesOf(() => parseGameConfig({ gameDuration: 0 })), [
      "gameDuration: Number must be greater than 0",
    ]);
  });

  it("rejects a catch radius larger than the detection radius", () => {
    assert.deepEqual(issuesOf(() => parseGameConfig({ catchRadius: 6, detectionRadius: 5 })), [
      "catchRadius: must not exceed detectionRadius (6 > 5)",
    ]);
  });

  it("rejects a vision range shorter than the detection radius", () => {
    assert.deepEqual(issuesOf(() => parseGameConfig({ seekerVisionRange: 4 })), [
      "seekerVisionRange: must be at least detectionRadius (4 < 5)",
    ]);
  });

  it("rejects a negative obstacle count", () => {
    assert.deepEqual(issuesOf(() => parseGameConfig({ numObstacles: -1 })), [
      "numObstacles: Number must be greater than or equal to 0",
    ]);
  });

  it("rejects unknown keys and non-objects", () => {
    assert.equal(issuesOf(() => parseGameConfig({ hiders: 3 })).length, 1);
    assert.deepEqual(issuesOf(() => parseGameConfig(7)), ["config: expected an object"]);
  });

  it("reports every issue at once", () => {
    const issues = issuesOf(() => parseGameConfig({ seekerCount: 0, hiderCount: 0 }));
    assert.equal(issues.length, 2);
  });
});

describe("parseGameRules", () => {
  it("accepts the rules slice of a valid config", () => {
    const rules = rulesOf(DEFAULT_GAME_CONFIG);
    assert.deepEqual(parseGameRules(rules), rules);
  });

  it("rejects missing fields", () => {
    assert.ok(issuesOf(() => parseGameRules({})).length > 0);
  });
});
