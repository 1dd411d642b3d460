import { z } from "zod";

// ============================================================================
// Problems
// ============================================================================

/** Problems are lettered `A` onwards; 26 is the hard ceiling. */
export const MAX_PROBLEM_COUNT = 26;

export const ProblemIdSchema = z
  .string()
  .regex(/^[A-Z]$/, "Problem id must be a single letter A-Z");
export type ProblemId = z.infer<typeof ProblemIdSchema>;

/**
 * Problem ids for a contest with `count` problems, in display order.
 */
export function problemIdsFor(count: number): ProblemId[] {
  const ids: ProblemId[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(String.fromCharCode(65 + i));
  }
  return ids;
}

// ============================================================================
// Teams
// ============================================================================

export const TeamNameSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/, "Team name must not contain whitespace");
export type TeamName = z.infer<typeof TeamNameSchema>;

// ============================================================================
// Submissions
// ============================================================================

export const SubmissionOutcomeSchema = z.enum([
  "Accepted",
  "Wrong_Answer",
  "Runtime_Error",
  "Time_Limit_Exceed",
]);
export type SubmissionOutcome = z.infer<typeof SubmissionOutcomeSchema>;

export const SubmissionSchema = z.object({
  problemId: ProblemIdSchema,
  outcome: SubmissionOutcomeSchema,
  timestamp: z.number().int().min(0),
});
export type Submission = z.infer<typeof SubmissionSchema>;

// ============================================================================
// Competition Settings
// ============================================================================

export const CompetitionSettingsSchema = z.object({
  durationMinutes: z.number().int().min(0),
  problemCount: z.number().int().min(1).max(MAX_PROBLEM_COUNT),
});
export type CompetitionSettings = z.infer<typeof CompetitionSettingsSchema>;

export const CompetitionPhaseSchema = z.enum(["registration", "running", "ended"]);
export type CompetitionPhase = z.infer<typeof CompetitionPhaseSchema>;
