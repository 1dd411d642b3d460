#!/usr/bin/env -S node --import tsx
import { createInterface } from "node:readline";
import { log, setLogLevel } from "@scoreboard/engine";
import { loadConfig, loadEnvFile } from "./config.js";
import { createSession, runScoreboard } from "./runner.js";

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  try {
    await runScoreboard(
      lines,
      (text) => process.stdout.write(text),
      createSession(config),
    );
  } finally {
    lines.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log("error", `Scoreboard stopped: ${message}`, undefined, "cli");
  process.exitCode = 1;
});
