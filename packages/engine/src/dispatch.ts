import type {
  CompetitionSettings,
  Directive,
  OperationResult,
  RankQueryResult,
  ScoreboardSnapshot,
  SubmissionRecord,
  TeamName,
} from "@scoreboard/contracts";
import type { FileResult } from "./problem-record.js";
import type { ScoreboardEngine, ScrollSummary } from "./scoreboard.js";

/**
 * Success value each directive produces.
 */
export interface DirectiveResultMap {
  ADD_TEAM: TeamName;
  START: CompetitionSettings;
  SUBMIT: FileResult;
  FLUSH: ScoreboardSnapshot;
  FREEZE: null;
  SCROLL: ScrollSummary;
  QUERY_RANKING: RankQueryResult;
  QUERY_SUBMISSION: SubmissionRecord | null;
  END: null;
}

export type DirectiveOutcome = {
  [K in keyof DirectiveResultMap]: {
    type: K;
    result: OperationResult<DirectiveResultMap[K]>;
  };
}[keyof DirectiveResultMap];

/**
 * Route one directive to the engine. Each call runs to completion before
 * the next directive is accepted.
 */
export function dispatchDirective(
  engine: ScoreboardEngine,
  directive: Directive,
): DirectiveOutcome {
  switch (directive.type) {
    case "ADD_TEAM":
      return { type: "ADD_TEAM", result: engine.addTeam(directive.payload.teamName) };
    case "START":
      return { type: "START", result: engine.start(directive.payload) };
    case "SUBMIT": {
      const { teamName, problemId, outcome, timestamp } = directive.payload;
      return {
        type: "SUBMIT",
        result: engine.applySubmission(teamName, problemId, outcome, timestamp),
      };
    }
    case "FLUSH":
      return { type: "FLUSH", result: engine.flush() };
    case "FREEZE":
      return { type: "FREEZE", result: engine.freeze() };
    case "SCROLL":
      return { type: "SCROLL", result: engine.scroll() };
    case "QUERY_RANKING":
      return {
        type: "QUERY_RANKING",
        result: engine.rankOf(directive.payload.teamName),
      };
    case "QUERY_SUBMISSION": {
      const { teamName, problemId, outcome } = directive.payload;
      return {
        type: "QUERY_SUBMISSION",
        result: engine.lastMatchingSubmission(teamName, problemId, outcome),
      };
    }
    case "END":
      return { type: "END", result: engine.end() };
  }
}
