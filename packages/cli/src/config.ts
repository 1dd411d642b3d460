import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { MAX_PROBLEM_COUNT } from "@scoreboard/contracts";
import type { LogLevel } from "@scoreboard/engine";

const envSchema = z.object({
  SCOREBOARD_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("warn"),
  /** Minutes charged per rejected attempt on a solved problem. */
  SCOREBOARD_PENALTY_MINUTES: z.coerce.number().int().min(0).default(20),
  SCOREBOARD_MAX_PROBLEMS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_PROBLEM_COUNT)
    .default(MAX_PROBLEM_COUNT),
});

export interface ScoreboardConfig {
  logLevel: LogLevel | "silent";
  penaltyPerWrongAttempt: number;
  maxProblemCount: number;
}

/**
 * Load `.env` from the working directory into process.env, if present.
 * Variables already set in the environment win.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.resolve(cwd, ".env") });
}

/**
 * Validate scoreboard settings from the environment.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScoreboardConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${issueText}`);
  }

  return {
    logLevel: parsed.data.SCOREBOARD_LOG_LEVEL,
    penaltyPerWrongAttempt: parsed.data.SCOREBOARD_PENALTY_MINUTES,
    maxProblemCount: parsed.data.SCOREBOARD_MAX_PROBLEMS,
  };
}
