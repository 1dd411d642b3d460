import type {
  CompetitionPhase,
  CompetitionSettings,
  OperationResult,
  ProblemId,
  RankChangeEvent,
  RankQueryResult,
  ScoreboardErrorCode,
  ScoreboardSnapshot,
  SnapshotReason,
  StandingRow,
  Submission,
  SubmissionOutcome,
  SubmissionRecord,
  TeamName,
} from "@scoreboard/contracts";
import { MAX_PROBLEM_COUNT, fail, problemIdsFor, succeed } from "@scoreboard/contracts";
import { DEFAULT_PENALTY_PER_WRONG_ATTEMPT } from "./constants.js";
import { log } from "./logger.js";
import {
  createProblemRecord,
  fileSubmission,
  hasPending,
  revealPending,
  toProblemCell,
  type FileResult,
} from "./problem-record.js";
import {
  compareTeamNames,
  compareTeams,
  ranksAbove,
  type RankedTeam,
} from "./rank-comparator.js";
import { NOOP_REPORTER, type ScoreChangeReporter } from "./reporter.js";
import { getAggregate, invalidateAggregate } from "./team-aggregate.js";
import type {
  EngineOptions,
  LogContext,
  ProblemRecord,
  TeamAggregate,
  TeamState,
} from "./types.js";

export interface ScoreboardEngineOptions extends EngineOptions {
  reporter?: ScoreChangeReporter;
}

export interface ScrollSummary {
  /** Problems whose held submissions were revealed */
  revealedProblems: number;
  /** Rank changes reported during the pass */
  rankChanges: number;
}

interface RevealTarget {
  team: TeamState;
  record: ProblemRecord;
  index: number;
}

/**
 * Live contest scoreboard with freeze and scroll.
 *
 * Owns every team, its per-problem records and the ranking list. The ranking
 * only moves on flush and scroll; submissions update records alone.
 * Expected failures come back as `{ ok: false }` and leave state unchanged.
 */
export class ScoreboardEngine {
  private readonly teams = new Map<TeamName, TeamState>();
  private ranking: TeamName[] = [];
  private phase: CompetitionPhase = "registration";
  private frozen = false;
  private settings: CompetitionSettings | null = null;

  private readonly reporter: ScoreChangeReporter;
  private readonly penaltyPerWrongAttempt: number;
  private readonly maxProblemCount: number;

  constructor(options: ScoreboardEngineOptions = {}) {
    this.reporter = options.reporter ?? NOOP_REPORTER;
    this.penaltyPerWrongAttempt =
      options.penaltyPerWrongAttempt ?? DEFAULT_PENALTY_PER_WRONG_ATTEMPT;
    this.maxProblemCount = Math.min(
      options.maxProblemCount ?? MAX_PROBLEM_COUNT,
      MAX_PROBLEM_COUNT,
    );
  }

  // ==========================================================================
  // State accessors
  // ==========================================================================

  get isFrozen(): boolean {
    return this.frozen;
  }

  get currentPhase(): CompetitionPhase {
    return this.phase;
  }

  get competitionSettings(): CompetitionSettings | null {
    return this.settings;
  }

  /** Team names in current ranking order */
  get currentRanking(): readonly TeamName[] {
    return [...this.ranking];
  }

  hasTeam(teamName: TeamName): boolean {
    return this.teams.has(teamName);
  }

  aggregateOf(teamName: TeamName): TeamAggregate | undefined {
    const team = this.teams.get(teamName);
    return team ? this.aggregate(team) : undefined;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  addTeam(teamName: TeamName): OperationResult<TeamName> {
    if (this.phase !== "registration") {
      return this.reject("addTeam", "COMPETITION_STARTED", "Competition has started", {
        teamName,
      });
    }
    if (this.teams.has(teamName)) {
      return this.reject("addTeam", "DUPLICATE_TEAM", "Duplicated team name", {
        teamName,
      });
    }

    this.teams.set(teamName, {
      name: teamName,
      problems: new Map(),
      cachedAggregate: null,
    });

    // Before the first flush the ranking is alphabetical
    let index = this.ranking.length;
    while (index > 0 && compareTeamNames(teamName, this.ranking[index - 1]) < 0) {
      index--;
    }
    this.ranking.splice(index, 0, teamName);

    log("debug", "Team added", { teamName, teams: this.teams.size });
    return succeed(teamName);
  }

  start(settings: CompetitionSettings): OperationResult<CompetitionSettings> {
    if (this.phase !== "registration") {
      return this.reject("start", "COMPETITION_STARTED", "Competition has started");
    }
    if (
      !Number.isInteger(settings.problemCount) ||
      settings.problemCount < 1 ||
      settings.problemCount > this.maxProblemCount
    ) {
      return this.reject(
        "start",
        "BAD_REQUEST",
        `Problem count must be between 1 and ${this.maxProblemCount}`,
        { problemCount: settings.problemCount },
      );
    }

    const accepted = { ...settings };
    this.phase = "running";
    this.settings = accepted;
    const problemIds = problemIdsFor(settings.problemCount);

    for (const team of this.teams.values()) {
      for (const problemId of problemIds) {
        team.problems.set(problemId, createProblemRecord(problemId));
      }
      invalidateAggregate(team);
    }

    log("info", "Competition started", {
      teams: this.teams.size,
      durationMinutes: settings.durationMinutes,
      problemCount: settings.problemCount,
    });
    return succeed(accepted);
  }

  end(): OperationResult<null> {
    if (this.phase === "ended") {
      return this.reject("end", "COMPETITION_ENDED", "Competition has ended");
    }
    this.phase = "ended";
    log("info", "Competition ended", { teams: this.teams.size });
    return succeed(null);
  }

  // ==========================================================================
  // Submission ingestion
  // ==========================================================================

  /**
   * File a judged submission. Never re-ranks; the ranking moves only on
   * flush or scroll.
   */
  applySubmission(
    teamName: TeamName,
    problemId: ProblemId,
    outcome: SubmissionOutcome,
    timestamp: number,
  ): OperationResult<FileResult> {
    const context = { teamName, problemId };

    if (this.phase === "registration") {
      return this.reject("submit", "COMPETITION_NOT_STARTED", "Competition has not started", context);
    }
    if (this.phase === "ended") {
      return this.reject("submit", "COMPETITION_ENDED", "Competition has ended", context);
    }

    const team = this.teams.get(teamName);
    if (!team) {
      return this.reject("submit", "TEAM_NOT_FOUND", "Cannot find the team", context);
    }

    const record = team.problems.get(problemId);
    if (!record) {
      return this.reject("submit", "PROBLEM_NOT_FOUND", "Cannot find the problem", context);
    }

    if (!Number.isInteger(timestamp) || timestamp < 0) {
      return this.reject("submit", "BAD_REQUEST", "Timestamp must be a non-negative integer", {
        ...context,
        timestamp,
      });
    }

    const submission: Submission = { problemId, outcome, timestamp };
    const filed = fileSubmission(record, submission, this.frozen);

    if (filed === "applied") {
      invalidateAggregate(team);
    }

    log("debug", "Submission filed", { ...context, outcome, timestamp, filed });
    return succeed(filed);
  }

  // ==========================================================================
  // Ranking
  // ==========================================================================

  /**
   * Re-sort every team on its revealed results and report the standings.
   */
  flush(): OperationResult<ScoreboardSnapshot> {
    if (this.phase === "ended") {
      return this.reject("flush", "COMPETITION_ENDED", "Competition has ended");
    }
    this.resort();
    const snapshot = this.snapshot("flush");
    this.reporter.onSnapshot(snapshot);
    log("debug", "Scoreboard flushed", { teams: this.ranking.length });
    return succeed(snapshot);
  }

  freeze(): OperationResult<null> {
    if (this.phase === "ended") {
      return this.reject("freeze", "COMPETITION_ENDED", "Competition has ended");
    }
    if (this.frozen) {
      return this.reject("freeze", "ALREADY_FROZEN", "Scoreboard has been frozen");
    }
    this.frozen = true;
    log("info", "Scoreboard frozen");
    return succeed(null);
  }

  /**
   * Reveal held results one problem at a time, lowest-ranked team first,
   * reporting every rank change, then unfreeze.
   */
  scroll(): OperationResult<ScrollSummary> {
    if (this.phase === "ended") {
      return this.reject("scroll", "COMPETITION_ENDED", "Competition has ended");
    }
    if (!this.frozen) {
      return this.reject("scroll", "NOT_FROZEN", "Scoreboard has not been frozen");
    }

    this.resort();
    this.reporter.onSnapshot(this.snapshot("scroll-frozen"));

    const summary: ScrollSummary = { revealedProblems: 0, rankChanges: 0 };

    for (
      let target = this.findRevealTarget();
      target !== null;
      target = this.findRevealTarget()
    ) {
      const { team, record, index } = target;
      const { revealed, newlySolved } = revealPending(record);
      invalidateAggregate(team);
      summary.revealedProblems += 1;

      log("debug", "Revealed held submissions", {
        teamName: team.name,
        problemId: record.problemId,
        revealed,
        newlySolved,
      });

      // Rejections alone never move a team: only solved problems count
      if (!newlySolved) continue;

      const newIndex = this.climb(team, index);
      if (newIndex === index) continue;

      this.ranking.splice(index, 1);
      this.ranking.splice(newIndex, 0, team.name);
      summary.rankChanges += 1;

      const aggregate = this.aggregate(team);
      const event: RankChangeEvent = {
        teamName: team.name,
        overtakenTeamName: this.ranking[newIndex + 1],
        solvedCount: aggregate.solvedCount,
        penaltyTime: aggregate.penaltyTime,
        fromRank: index + 1,
        toRank: newIndex + 1,
      };
      this.reporter.onRankChange(event);
      log("info", "Rank changed", { ...event });
    }

    this.frozen = false;
    this.reporter.onSnapshot(this.snapshot("scroll-final"));

    log("info", "Scoreboard scrolled", { ...summary });
    return succeed(summary);
  }

  /**
   * Current standings in ranking order.
   */
  snapshot(reason: SnapshotReason): ScoreboardSnapshot {
    const rows: StandingRow[] = this.ranking.map((teamName, index) => {
      const team = this.requireTeam(teamName);
      const aggregate = this.aggregate(team);
      return {
        teamName,
        rank: index + 1,
        solvedCount: aggregate.solvedCount,
        penaltyTime: aggregate.penaltyTime,
        problems: [...team.problems.values()].map(toProblemCell),
      };
    });

    return { reason, frozen: this.frozen, rows };
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  rankOf(teamName: TeamName): OperationResult<RankQueryResult> {
    const index = this.ranking.indexOf(teamName);
    if (index === -1) {
      return this.reject("queryRanking", "TEAM_NOT_FOUND", "Cannot find the team", {
        teamName,
      });
    }
    return succeed({ teamName, rank: index + 1, frozen: this.frozen });
  }

  /**
   * Latest submission of a team matching the optional filters; null when
   * nothing matches, including filters naming no known problem or outcome.
   * Ties on timestamp keep the earlier problem letter, then
   * the earlier arrival.
   */
  lastMatchingSubmission(
    teamName: TeamName,
    problemId: string | null,
    outcome: string | null,
  ): OperationResult<SubmissionRecord | null> {
    const team = this.teams.get(teamName);
    if (!team) {
      return this.reject("querySubmission", "TEAM_NOT_FOUND", "Cannot find the team", {
        teamName,
      });
    }

    let latest: Submission | null = null;
    for (const record of team.problems.values()) {
      if (problemId !== null && record.problemId !== problemId) continue;
      for (const submission of record.submissions) {
        if (outcome !== null && submission.outcome !== outcome) continue;
        if (!latest || submission.timestamp > latest.timestamp) {
          latest = submission;
        }
      }
    }

    return succeed(latest ? { teamName, ...latest } : null);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private aggregate(team: TeamState): TeamAggregate {
    return getAggregate(team, this.penaltyPerWrongAttempt);
  }

  private ranked(teamName: TeamName): RankedTeam {
    return { name: teamName, aggregate: this.aggregate(this.requireTeam(teamName)) };
  }

  private requireTeam(teamName: TeamName): TeamState {
    const team = this.teams.get(teamName);
    if (!team) {
      throw new Error(`Ranking references unknown team "${teamName}"`);
    }
    return team;
  }

  private resort(): void {
    const entries = [...this.teams.keys()].map((name) => this.ranked(name));
    entries.sort(compareTeams);
    this.ranking = entries.map((entry) => entry.name);
  }

  /**
   * Lowest-ranked team holding any submissions, and its earliest such
   * problem. Rescanned from the bottom after every reveal.
   */
  private findRevealTarget(): RevealTarget | null {
    for (let index = this.ranking.length - 1; index >= 0; index--) {
      const team = this.requireTeam(this.ranking[index]);
      for (const record of team.problems.values()) {
        if (hasPending(record)) {
          return { team, record, index };
        }
      }
    }
    return null;
  }

  /**
   * Walk upward while the team beats the one directly above it.
   */
  private climb(team: TeamState, index: number): number {
    const mover = this.ranked(team.name);
    let position = index;
    while (position > 0 && ranksAbove(mover, this.ranked(this.ranking[position - 1]))) {
      position--;
    }
    return position;
  }

  private reject(
    operation: string,
    code: ScoreboardErrorCode,
    message: string,
    context?: LogContext,
  ): OperationResult<never> {
    log("info", `${operation} rejected: ${message}`, { ...context, code });
    return fail(code, message);
  }
}
