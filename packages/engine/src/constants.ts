import type { SubmissionOutcome } from "@scoreboard/contracts";

// ============================================================================
// Scoring
// ============================================================================

/** Minutes charged per rejected attempt on a problem that is later solved */
export const DEFAULT_PENALTY_PER_WRONG_ATTEMPT = 20;

/** The only outcome that solves a problem */
export const ACCEPTED: SubmissionOutcome = "Accepted";
