/**
 * Pure helpers over a single (team, problem) record.
 * The record is mutated in place; callers own invalidating the team cache.
 */

import type {
  ProblemCell,
  ProblemId,
  Submission,
} from "@scoreboard/contracts";
import { ACCEPTED } from "./constants.js";
import type { ProblemRecord } from "./types.js";

export type FileResult = "applied" | "queued" | "ignored";

export interface RevealResult {
  revealed: number;
  newlySolved: boolean;
}

export function createProblemRecord(problemId: ProblemId): ProblemRecord {
  return {
    problemId,
    solved: false,
    solveTime: 0,
    wrongAttempts: 0,
    submissions: [],
    pending: [],
  };
}

/**
 * Apply one outcome with first-accepted-wins semantics.
 * Returns true when this submission solved the problem.
 */
export function applyOutcome(
  record: ProblemRecord,
  submission: Submission,
): boolean {
  if (record.solved) return false;

  if (submission.outcome === ACCEPTED) {
    record.solved = true;
    record.solveTime = submission.timestamp;
    return true;
  }

  record.wrongAttempts += 1;
  return false;
}

/**
 * File a submission against the record.
 *
 * - Solved problems only keep it for the audit trail ("ignored").
 * - While frozen it is held until the next reveal ("queued").
 * - Otherwise it takes effect immediately ("applied").
 */
export function fileSubmission(
  record: ProblemRecord,
  submission: Submission,
  frozen: boolean,
): FileResult {
  record.submissions.push(submission);

  if (record.solved) return "ignored";

  if (frozen) {
    record.pending.push(submission);
    return "queued";
  }

  applyOutcome(record, submission);
  return "applied";
}

export function hasPending(record: ProblemRecord): boolean {
  return record.pending.length > 0;
}

/**
 * Apply every held submission in arrival order, then clear the queue.
 */
export function revealPending(record: ProblemRecord): RevealResult {
  const wasSolved = record.solved;
  const revealed = record.pending.length;

  for (const submission of record.pending) {
    applyOutcome(record, submission);
  }
  record.pending = [];

  return { revealed, newlySolved: !wasSolved && record.solved };
}

export function toProblemCell(record: ProblemRecord): ProblemCell {
  return {
    problemId: record.problemId,
    solved: record.solved,
    solveTime: record.solved ? record.solveTime : null,
    wrongAttempts: record.wrongAttempts,
    pendingCount: record.pending.length,
  };
}
