import { z } from "zod";
import {
  ProblemIdSchema,
  SubmissionOutcomeSchema,
  TeamNameSchema,
} from "./contest.js";

// ============================================================================
// Problem Cells
// ============================================================================

/**
 * Read-only view of one team's record for one problem.
 */
export const ProblemCellSchema = z.object({
  problemId: ProblemIdSchema,
  solved: z.boolean(),
  solveTime: z.number().int().min(0).nullable(),
  wrongAttempts: z.number().int().min(0),
  pendingCount: z.number().int().min(0),
});
export type ProblemCell = z.infer<typeof ProblemCellSchema>;

export const ProblemDisplaySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("unattempted") }),
  z.object({
    kind: z.literal("solved"),
    wrongAttempts: z.number().int().min(0),
  }),
  z.object({
    kind: z.literal("unsolved"),
    wrongAttempts: z.number().int().min(1),
  }),
  z.object({
    kind: z.literal("hidden"),
    wrongAttempts: z.number().int().min(0),
    pendingCount: z.number().int().min(1),
  }),
]);
export type ProblemDisplay = z.infer<typeof ProblemDisplaySchema>;

// ============================================================================
// Standings
// ============================================================================

export const StandingRowSchema = z.object({
  teamName: TeamNameSchema,
  rank: z.number().int().min(1),
  solvedCount: z.number().int().min(0),
  penaltyTime: z.number().int().min(0),
  problems: z.array(ProblemCellSchema),
});
export type StandingRow = z.infer<typeof StandingRowSchema>;

export const SnapshotReasonSchema = z.enum([
  "flush",
  "scroll-frozen",
  "scroll-final",
]);
export type SnapshotReason = z.infer<typeof SnapshotReasonSchema>;

export const ScoreboardSnapshotSchema = z.object({
  reason: SnapshotReasonSchema,
  frozen: z.boolean(),
  rows: z.array(StandingRowSchema),
});
export type ScoreboardSnapshot = z.infer<typeof ScoreboardSnapshotSchema>;

// ============================================================================
// Scroll Events
// ============================================================================

export const RankChangeEventSchema = z.object({
  teamName: TeamNameSchema,
  /** Team now directly below the mover. */
  overtakenTeamName: TeamNameSchema,
  solvedCount: z.number().int().min(0),
  penaltyTime: z.number().int().min(0),
  fromRank: z.number().int().min(1),
  toRank: z.number().int().min(1),
});
export type RankChangeEvent = z.infer<typeof RankChangeEventSchema>;

// ============================================================================
// Query Results
// ============================================================================

export const RankQueryResultSchema = z.object({
  teamName: TeamNameSchema,
  rank: z.number().int().min(1),
  /** Set while unrevealed results may still move this team. */
  frozen: z.boolean(),
});
export type RankQueryResult = z.infer<typeof RankQueryResultSchema>;

export const SubmissionRecordSchema = z.object({
  teamName: TeamNameSchema,
  problemId: ProblemIdSchema,
  outcome: SubmissionOutcomeSchema,
  timestamp: z.number().int().min(0),
});
export type SubmissionRecord = z.infer<typeof SubmissionRecordSchema>;
