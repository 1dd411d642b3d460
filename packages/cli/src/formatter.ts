import type {
  DirectiveType,
  ProblemCell,
  ProblemDisplay,
  RankChangeEvent,
  ScoreboardErrorCode,
  ScoreboardSnapshot,
  StandingRow,
} from "@scoreboard/contracts";
import type { DirectiveOutcome, ReportedEvent } from "@scoreboard/engine";

// ============================================================================
// Problem Cells
// ============================================================================

/**
 * Display state of one cell. Held submissions show only while the board is
 * frozen and the problem is still unsolved.
 */
export function deriveProblemDisplay(cell: ProblemCell, frozen: boolean): ProblemDisplay {
  if (frozen && !cell.solved && cell.pendingCount > 0) {
    return {
      kind: "hidden",
      wrongAttempts: cell.wrongAttempts,
      pendingCount: cell.pendingCount,
    };
  }
  if (cell.solved) {
    return { kind: "solved", wrongAttempts: cell.wrongAttempts };
  }
  if (cell.wrongAttempts === 0) {
    return { kind: "unattempted" };
  }
  return { kind: "unsolved", wrongAttempts: cell.wrongAttempts };
}

export function renderProblemDisplay(display: ProblemDisplay): string {
  switch (display.kind) {
    case "unattempted":
      return ".";
    case "solved":
      return display.wrongAttempts === 0 ? "+" : `+${display.wrongAttempts}`;
    case "unsolved":
      return `-${display.wrongAttempts}`;
    case "hidden":
      return display.wrongAttempts === 0
        ? `0/${display.pendingCount}`
        : `-${display.wrongAttempts}/${display.pendingCount}`;
  }
}

// ============================================================================
// Standings
// ============================================================================

export function formatStandingRow(row: StandingRow, frozen: boolean): string {
  const cells = row.problems.map((cell) =>
    renderProblemDisplay(deriveProblemDisplay(cell, frozen)),
  );
  return [row.teamName, row.rank, row.solvedCount, row.penaltyTime, ...cells].join(" ");
}

export function formatSnapshot(snapshot: ScoreboardSnapshot): string[] {
  return snapshot.rows.map((row) => formatStandingRow(row, snapshot.frozen));
}

export function formatRankChange(event: RankChangeEvent): string {
  return `${event.teamName} ${event.overtakenTeamName} ${event.solvedCount} ${event.penaltyTime}`;
}

/**
 * Lines for events reported by the engine. Flush snapshots are silent;
 * scroll prints both of its snapshots and every rank change between them.
 */
export function formatReportedEvents(events: ReportedEvent[]): string[] {
  const lines: string[] = [];
  for (const event of events) {
    if (event.kind === "rankChange") {
      lines.push(formatRankChange(event.event));
    } else if (event.snapshot.reason !== "flush") {
      lines.push(...formatSnapshot(event.snapshot));
    }
  }
  return lines;
}

// ============================================================================
// Status Lines
// ============================================================================

const OPERATION_NAMES: Record<DirectiveType, string> = {
  ADD_TEAM: "Add",
  START: "Start",
  SUBMIT: "Submit",
  FLUSH: "Flush",
  FREEZE: "Freeze",
  SCROLL: "Scroll",
  QUERY_RANKING: "Query ranking",
  QUERY_SUBMISSION: "Query submission",
  END: "End",
};

const FAILURE_REASONS: Record<Exclude<ScoreboardErrorCode, "BAD_REQUEST">, string> = {
  DUPLICATE_TEAM: "duplicated team name",
  COMPETITION_STARTED: "competition has started",
  COMPETITION_NOT_STARTED: "competition has not started",
  COMPETITION_ENDED: "competition has ended",
  ALREADY_FROZEN: "scoreboard has been frozen",
  NOT_FROZEN: "scoreboard has not been frozen",
  TEAM_NOT_FOUND: "cannot find the team",
  PROBLEM_NOT_FOUND: "cannot find the problem",
};

export const FROZEN_RANKING_WARNING =
  "[Warning]Scoreboard is frozen. The ranking may be inaccurate until it were scrolled.";

export const NO_SUBMISSION_FOUND = "Cannot find any submission.";

function failureLine(
  type: DirectiveType,
  code: ScoreboardErrorCode,
  message: string,
): string {
  const reason = code === "BAD_REQUEST" ? message.toLowerCase() : FAILURE_REASONS[code];
  return `[Error]${OPERATION_NAMES[type]} failed: ${reason}.`;
}

/**
 * Status lines for one processed directive. Scoreboard lines reported
 * during the same directive follow these.
 */
export function formatOutcome(outcome: DirectiveOutcome): string[] {
  if (!outcome.result.ok) {
    const { code, message } = outcome.result.error;
    return [failureLine(outcome.type, code, message)];
  }

  switch (outcome.type) {
    case "ADD_TEAM":
      return ["[Info]Add successfully."];
    case "START":
      return ["[Info]Competition starts."];
    case "SUBMIT":
      return [];
    case "FLUSH":
      return ["[Info]Flush scoreboard."];
    case "FREEZE":
      return ["[Info]Freeze scoreboard."];
    case "SCROLL":
      return ["[Info]Scroll scoreboard."];
    case "QUERY_RANKING": {
      const { teamName, rank, frozen } = outcome.result.value;
      return [
        "[Info]Complete query ranking.",
        ...(frozen ? [FROZEN_RANKING_WARNING] : []),
        `${teamName} NOW AT RANKING ${rank}`,
      ];
    }
    case "QUERY_SUBMISSION": {
      const found = outcome.result.value;
      return [
        "[Info]Complete query submission.",
        found
          ? `${found.teamName} ${found.problemId} ${found.outcome} ${found.timestamp}`
          : NO_SUBMISSION_FOUND,
      ];
    }
    case "END":
      return ["[Info]Competition ends."];
  }
}
