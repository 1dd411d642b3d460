import type {
  RankChangeEvent,
  ScoreboardSnapshot,
} from "@scoreboard/contracts";

/**
 * Sink for everything the engine publishes while ranking: one snapshot per
 * flush, and during a scroll the frozen snapshot, every rank change, then
 * the final snapshot.
 */
export interface ScoreChangeReporter {
  onSnapshot(snapshot: ScoreboardSnapshot): void;
  onRankChange(event: RankChangeEvent): void;
}

export type ReportedEvent =
  | { kind: "snapshot"; snapshot: ScoreboardSnapshot }
  | { kind: "rankChange"; event: RankChangeEvent };

/**
 * Keeps reported events in emission order until drained.
 */
export class CollectingReporter implements ScoreChangeReporter {
  private events: ReportedEvent[] = [];

  onSnapshot(snapshot: ScoreboardSnapshot): void {
    this.events.push({ kind: "snapshot", snapshot });
  }

  onRankChange(event: RankChangeEvent): void {
    this.events.push({ kind: "rankChange", event });
  }

  /** Events reported since the last drain, oldest first */
  drain(): ReportedEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  get size(): number {
    return this.events.length;
  }
}

export const NOOP_REPORTER: ScoreChangeReporter = {
  onSnapshot: () => {},
  onRankChange: () => {},
};
