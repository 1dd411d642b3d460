/**
 * @scoreboard/cli - text directives in, status and scoreboard lines out.
 */

export { loadConfig, loadEnvFile } from "./config.js";
export type { ScoreboardConfig } from "./config.js";

export { DirectiveParseError } from "./errors.js";
export type { DirectiveParseErrorCode } from "./errors.js";

export {
  FROZEN_RANKING_WARNING,
  NO_SUBMISSION_FOUND,
  deriveProblemDisplay,
  formatOutcome,
  formatRankChange,
  formatReportedEvents,
  formatSnapshot,
  formatStandingRow,
  renderProblemDisplay,
} from "./formatter.js";

export { parseLine } from "./parser.js";

export { createSession, handleLine, runScoreboard } from "./runner.js";
export type { LineResult, Session } from "./runner.js";
