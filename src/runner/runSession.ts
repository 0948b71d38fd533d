#!/usr/bin/env node
import { ConfigurationError } from "../simulation/errors.js";
import { parseCliArgs } from "./cli.js";
import { parseRunnerConfig } from "./config.js";
import { SessionRunner } from "./SessionRunner.js";

function main() {
  const config = parseRunnerConfig(parseCliArgs(process.argv.slice(2)));

  console.log("Starting session with config:", config);
  const runner = new SessionRunner(config);
  const replay = runner.run();
  const outputPath = runner.saveReplay(replay);
  console.log(`Session complete. Replay saved to ${outputPath}`);
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(err.message);
  } else {
    console.error("Session failed", err);
  }
  process.exit(1);
}
