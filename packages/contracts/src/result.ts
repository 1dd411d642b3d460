import { z } from "zod";

// ============================================================================
// Error Codes
// ============================================================================

export const ScoreboardErrorCodeSchema = z.enum([
  "DUPLICATE_TEAM",
  "COMPETITION_STARTED",
  "COMPETITION_NOT_STARTED",
  "COMPETITION_ENDED",
  "ALREADY_FROZEN",
  "NOT_FROZEN",
  "TEAM_NOT_FOUND",
  "PROBLEM_NOT_FOUND",
  "BAD_REQUEST",
]);
export type ScoreboardErrorCode = z.infer<typeof ScoreboardErrorCodeSchema>;

export const ScoreboardErrorSchema = z.object({
  code: ScoreboardErrorCodeSchema,
  message: z.string(),
});
export type ScoreboardError = z.infer<typeof ScoreboardErrorSchema>;

// ============================================================================
// Result Envelope
// ============================================================================

/**
 * Outcome of a single directive. Failures leave engine state untouched.
 */
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ScoreboardError };

export function succeed<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  code: ScoreboardErrorCode,
  message: string,
): OperationResult<T> {
  return { ok: false, error: { code, message } };
}
