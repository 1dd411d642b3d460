import { z } from "zod";
import {
  CompetitionSettingsSchema,
  ProblemIdSchema,
  SubmissionOutcomeSchema,
  TeamNameSchema,
} from "./contest.js";
import type { OperationResult } from "./result.js";

// ============================================================================
// Registration & Lifecycle
// ============================================================================

// ADD_TEAM (registration only)
export const AddTeamPayloadSchema = z.object({
  teamName: TeamNameSchema,
});
export type AddTeamPayload = z.infer<typeof AddTeamPayloadSchema>;

// START
export const StartPayloadSchema = CompetitionSettingsSchema;
export type StartPayload = z.infer<typeof StartPayloadSchema>;

// END
export const EndPayloadSchema = z.object({});

// ============================================================================
// Submissions
// ============================================================================

// SUBMIT
export const SubmitPayloadSchema = z.object({
  problemId: ProblemIdSchema,
  teamName: TeamNameSchema,
  outcome: SubmissionOutcomeSchema,
  timestamp: z.number().int().min(0),
});
export type SubmitPayload = z.infer<typeof SubmitPayloadSchema>;

// ============================================================================
// Scoreboard Control
// ============================================================================

export const FlushPayloadSchema = z.object({});
export const FreezePayloadSchema = z.object({});
export const ScrollPayloadSchema = z.object({});

// ============================================================================
// Queries
// ============================================================================

// QUERY_RANKING
export const QueryRankingPayloadSchema = z.object({
  teamName: TeamNameSchema,
});
export type QueryRankingPayload = z.infer<typeof QueryRankingPayloadSchema>;

// QUERY_SUBMISSION (null filters mean "ALL"). Filters are free text: a
// value no submission carries simply matches nothing.
export const SubmissionFilterSchema = z.string().min(1);

export const QuerySubmissionPayloadSchema = z.object({
  teamName: TeamNameSchema,
  problemId: SubmissionFilterSchema.nullable(),
  outcome: SubmissionFilterSchema.nullable(),
});
export type QuerySubmissionPayload = z.infer<
  typeof QuerySubmissionPayloadSchema
>;

// ============================================================================
// Directive Union
// ============================================================================

export const DirectiveSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ADD_TEAM"), payload: AddTeamPayloadSchema }),
  z.object({ type: z.literal("START"), payload: StartPayloadSchema }),
  z.object({ type: z.literal("SUBMIT"), payload: SubmitPayloadSchema }),
  z.object({ type: z.literal("FLUSH"), payload: FlushPayloadSchema }),
  z.object({ type: z.literal("FREEZE"), payload: FreezePayloadSchema }),
  z.object({ type: z.literal("SCROLL"), payload: ScrollPayloadSchema }),
  z.object({
    type: z.literal("QUERY_RANKING"),
    payload: QueryRankingPayloadSchema,
  }),
  z.object({
    type: z.literal("QUERY_SUBMISSION"),
    payload: QuerySubmissionPayloadSchema,
  }),
  z.object({ type: z.literal("END"), payload: EndPayloadSchema }),
]);
export type Directive = z.infer<typeof DirectiveSchema>;
export type DirectiveType = Directive["type"];

/**
 * Validate an untrusted value as a directive.
 */
export function parseDirective(value: unknown): OperationResult<Directive> {
  const parsed = DirectiveSchema.safeParse(value);
  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "directive"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: { code: "BAD_REQUEST", message: issueText } };
  }
  return { ok: true, value: parsed.data };
}
