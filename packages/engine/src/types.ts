import type {
  ProblemId,
  Submission,
  TeamName,
} from "@scoreboard/contracts";

// ============================================================================
// Logging Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  teamName?: string;
  problemId?: string;
  code?: string;
  [key: string]: unknown;
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface EngineOptions {
  /** Minutes added per rejected attempt on a solved problem (default: 20) */
  penaltyPerWrongAttempt?: number;
  /** Largest problem count START accepts (default: 26) */
  maxProblemCount?: number;
}

// ============================================================================
// Internal State
// ============================================================================

/**
 * Per (team, problem) state. `pending` holds submissions received while
 * frozen on a still-unsolved problem, in arrival order.
 */
export interface ProblemRecord {
  problemId: ProblemId;
  solved: boolean;
  /** Meaningful only when `solved` */
  solveTime: number;
  wrongAttempts: number;
  /** Every submission filed against this problem, frozen or not */
  submissions: Submission[];
  pending: Submission[];
}

export interface TeamAggregate {
  solvedCount: number;
  penaltyTime: number;
  /** Solve times, latest first */
  solveTimes: number[];
}

export interface TeamState {
  name: TeamName;
  /** Keyed by problem id, inserted in letter order at start */
  problems: Map<ProblemId, ProblemRecord>;
  /** Null when a record changed since the last read */
  cachedAggregate: TeamAggregate | null;
}
