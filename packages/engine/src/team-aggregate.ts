import type { ProblemRecord, TeamAggregate, TeamState } from "./types.js";

/**
 * Derive solved count, penalty and latest-first solve times from a team's
 * records. Held submissions stay in `pending` and never touch `solved` or
 * `wrongAttempts`, so they stay out of the aggregate.
 */
export function computeAggregate(
  records: Iterable<ProblemRecord>,
  penaltyPerWrongAttempt: number,
): TeamAggregate {
  let solvedCount = 0;
  let penaltyTime = 0;
  const solveTimes: number[] = [];

  for (const record of records) {
    if (!record.solved) continue;
    solvedCount += 1;
    penaltyTime += record.solveTime + penaltyPerWrongAttempt * record.wrongAttempts;
    solveTimes.push(record.solveTime);
  }

  solveTimes.sort((a, b) => b - a);

  return { solvedCount, penaltyTime, solveTimes };
}

/**
 * Read the team's aggregate, rebuilding it if a record changed since the
 * last read.
 */
export function getAggregate(
  team: TeamState,
  penaltyPerWrongAttempt: number,
): TeamAggregate {
  if (!team.cachedAggregate) {
    team.cachedAggregate = computeAggregate(
      team.problems.values(),
      penaltyPerWrongAttempt,
    );
  }
  return team.cachedAggregate;
}

export function invalidateAggregate(team: TeamState): void {
  team.cachedAggregate = null;
}
