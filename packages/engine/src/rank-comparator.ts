import type { TeamAggregate } from "./types.js";

export interface RankedTeam {
  name: string;
  aggregate: TeamAggregate;
}

/**
 * Code-unit order, independent of the host locale.
 */
export function compareTeamNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over teams. Negative when `a` ranks above `b`.
 *
 * 1. More solved problems first
 * 2. Lower penalty first
 * 3. Latest-first solve times compared position by position, smaller wins
 * 4. Team name ascending
 */
export function compareTeams(a: RankedTeam, b: RankedTeam): number {
  const left = a.aggregate;
  const right = b.aggregate;

  if (left.solvedCount !== right.solvedCount) {
    return right.solvedCount - left.solvedCount;
  }

  if (left.penaltyTime !== right.penaltyTime) {
    return left.penaltyTime - right.penaltyTime;
  }

  const length = Math.min(left.solveTimes.length, right.solveTimes.length);
  for (let i = 0; i < length; i++) {
    const l = left.solveTimes[i];
    const r = right.solveTimes[i];
    if (l !== r) return l - r;
  }

  return compareTeamNames(a.name, b.name);
}

/**
 * True when `a` strictly ranks above `b`.
 */
export function ranksAbove(a: RankedTeam, b: RankedTeam): boolean {
  return compareTeams(a, b) < 0;
}
