/**
 * @scoreboard/engine - ranking, freeze and scroll for a live contest
 * scoreboard.
 *
 * - ScoreboardEngine: owns teams, records and the ranking list
 * - dispatchDirective: routes typed directives to the engine
 * - ScoreChangeReporter: sink for snapshots and rank changes
 */

export { ScoreboardEngine } from "./scoreboard.js";
export type { ScoreboardEngineOptions, ScrollSummary } from "./scoreboard.js";

export { dispatchDirective } from "./dispatch.js";
export type { DirectiveOutcome, DirectiveResultMap } from "./dispatch.js";

export { CollectingReporter, NOOP_REPORTER } from "./reporter.js";
export type { ReportedEvent, ScoreChangeReporter } from "./reporter.js";

export { compareTeamNames, compareTeams, ranksAbove } from "./rank-comparator.js";
export type { RankedTeam } from "./rank-comparator.js";

export { computeAggregate } from "./team-aggregate.js";

export {
  applyOutcome,
  createProblemRecord,
  fileSubmission,
  revealPending,
  toProblemCell,
} from "./problem-record.js";
export type { FileResult, RevealResult } from "./problem-record.js";

export { isLevelEnabled, log, setLogLevel } from "./logger.js";

export { ACCEPTED, DEFAULT_PENALTY_PER_WRONG_ATTEMPT } from "./constants.js";

export type {
  EngineOptions,
  LogContext,
  LogLevel,
  ProblemRecord,
  TeamAggregate,
} from "./types.js";
