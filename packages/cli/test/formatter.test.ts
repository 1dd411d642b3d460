import test from "node:test";
import assert from "node:assert/strict";

import type { ProblemCell, ScoreboardSnapshot } from "@scoreboard/contracts";
import type { DirectiveOutcome } from "@scoreboard/engine";
import {
  FROZEN_RANKING_WARNING,
  deriveProblemDisplay,
  formatOutcome,
  formatRankChange,
  formatReportedEvents,
  formatStandingRow,
  renderProblemDisplay,
} from "../src/formatter.js";

function cell(overrides: Partial<ProblemCell>): ProblemCell {
  return {
    problemId: "A",
    solved: false,
    solveTime: null,
    wrongAttempts: 0,
    pendingCount: 0,
    ...overrides,
  };
}

function render(overrides: Partial<ProblemCell>, frozen: boolean): string {
  return renderProblemDisplay(deriveProblemDisplay(cell(overrides), frozen));
}

test("Problem cells", async (t) => {
  await t.test("unattempted", () => {
    assert.deepEqual(deriveProblemDisplay(cell({}), false), { kind: "unattempted" });
    assert.equal(render({}, false), ".");
  });

  await t.test("solved", () => {
    assert.equal(render({ solved: true, solveTime: 10 }, false), "+");
    assert.equal(render({ solved: true, solveTime: 10, wrongAttempts: 3 }, false), "+3");
  });

  await t.test("unsolved with rejections", () => {
    assert.equal(render({ wrongAttempts: 2 }, false), "-2");
  });

  await t.test("hidden while frozen", () => {
    assert.deepEqual(deriveProblemDisplay(cell({ wrongAttempts: 1, pendingCount: 2 }), true), {
      kind: "hidden",
      wrongAttempts: 1,
      pendingCount: 2,
    });
    assert.equal(render({ pendingCount: 4 }, true), "0/4");
    assert.equal(render({ wrongAttempts: 1, pendingCount: 2 }, true), "-1/2");
  });

  await t.test("held submissions are invisible once unfrozen", () => {
    assert.equal(render({ wrongAttempts: 1, pendingCount: 2 }, false), "-1");
  });

  await t.test("frozen board shows solved problems normally", () => {
    assert.equal(render({ solved: true, solveTime: 5, wrongAttempts: 1 }, true), "+1");
  });
});

test("standing rows list rank, totals and cells", () => {
  const line = formatStandingRow(
    {
      teamName: "alpha",
      rank: 2,
      solvedCount: 1,
      penaltyTime: 30,
      problems: [
        cell({ problemId: "A", solved: true, solveTime: 10, wrongAttempts: 1 }),
        cell({ problemId: "B" }),
        cell({ problemId: "C", pendingCount: 1 }),
      ],
    },
    true,
  );

  assert.equal(line, "alpha 2 1 30 +1 . 0/1");
});

test("rank change lines", () => {
  assert.equal(
    formatRankChange({
      teamName: "charlie",
      overtakenTeamName: "bravo",
      solvedCount: 2,
      penaltyTime: 150,
      fromRank: 3,
      toRank: 1,
    }),
    "charlie bravo 2 150",
  );
});

test("flush snapshots print nothing", () => {
  const snapshot: ScoreboardSnapshot = {
    reason: "flush",
    frozen: false,
    rows: [{ teamName: "alpha", rank: 1, solvedCount: 0, penaltyTime: 0, problems: [] }],
  };

  assert.deepEqual(formatReportedEvents([{ kind: "snapshot", snapshot }]), []);
  assert.deepEqual(
    formatReportedEvents([
      { kind: "snapshot", snapshot: { ...snapshot, reason: "scroll-final" } },
    ]),
    ["alpha 1 0 0"],
  );
});

test("Status lines", async (t) => {
  await t.test("failures name the operation and reason", () => {
    const cases: Array<[DirectiveOutcome, string]> = [
      [
        {
          type: "ADD_TEAM",
          result: { ok: false, error: { code: "DUPLICATE_TEAM", message: "Duplicated team name" } },
        },
        "[Error]Add failed: duplicated team name.",
      ],
      [
        {
          type: "START",
          result: { ok: false, error: { code: "COMPETITION_STARTED", message: "x" } },
        },
        "[Error]Start failed: competition has started.",
      ],
      [
        {
          type: "FREEZE",
          result: { ok: false, error: { code: "ALREADY_FROZEN", message: "x" } },
        },
        "[Error]Freeze failed: scoreboard has been frozen.",
      ],
      [
        {
          type: "SCROLL",
          result: { ok: false, error: { code: "NOT_FROZEN", message: "x" } },
        },
        "[Error]Scroll failed: scoreboard has not been frozen.",
      ],
      [
        {
          type: "QUERY_RANKING",
          result: { ok: false, error: { code: "TEAM_NOT_FOUND", message: "x" } },
        },
        "[Error]Query ranking failed: cannot find the team.",
      ],
      [
        {
          type: "SUBMIT",
          result: {
            ok: false,
            error: { code: "BAD_REQUEST", message: "Timestamp must be a non-negative integer" },
          },
        },
        "[Error]Submit failed: timestamp must be a non-negative integer.",
      ],
    ];

    for (const [outcome, expected] of cases) {
      assert.deepEqual(formatOutcome(outcome), [expected]);
    }
  });

  await t.test("accepted submissions are silent", () => {
    assert.deepEqual(formatOutcome({ type: "SUBMIT", result: { ok: true, value: "queued" } }), []);
  });

  await t.test("rank query warns while frozen", () => {
    assert.deepEqual(
      formatOutcome({
        type: "QUERY_RANKING",
        result: { ok: true, value: { teamName: "alpha", rank: 3, frozen: true } },
      }),
      ["[Info]Complete query ranking.", FROZEN_RANKING_WARNING, "alpha NOW AT RANKING 3"],
    );
  });

  await t.test("submission query", () => {
    assert.deepEqual(
      formatOutcome({
        type: "QUERY_SUBMISSION",
        result: {
          ok: true,
          value: { teamName: "alpha", problemId: "B", outcome: "Accepted", timestamp: 77 },
        },
      }),
      ["[Info]Complete query submission.", "alpha B Accepted 77"],
    );
    assert.deepEqual(
      formatOutcome({ type: "QUERY_SUBMISSION", result: { ok: true, value: null } }),
      ["[Info]Complete query submission.", "Cannot find any submission."],
    );
  });
});
