import test from "node:test";
import assert from "node:assert/strict";

import { createProblemRecord, fileSubmission } from "../src/problem-record.js";
import {
  computeAggregate,
  getAggregate,
  invalidateAggregate,
} from "../src/team-aggregate.js";
import type { ProblemRecord, TeamState } from "../src/types.js";

function makeRecords(): ProblemRecord[] {
  const a = createProblemRecord("A");
  fileSubmission(a, { problemId: "A", outcome: "Wrong_Answer", timestamp: 4 }, false);
  fileSubmission(a, { problemId: "A", outcome: "Accepted", timestamp: 10 }, false);

  const b = createProblemRecord("B");
  fileSubmission(b, { problemId: "B", outcome: "Accepted", timestamp: 50 }, false);

  const c = createProblemRecord("C");
  for (const timestamp of [1, 2, 3]) {
    fileSubmission(c, { problemId: "C", outcome: "Wrong_Answer", timestamp }, false);
  }

  return [a, b, c];
}

function makeTeam(records: ProblemRecord[]): TeamState {
  return {
    name: "alpha",
    problems: new Map(records.map((r) => [r.problemId, r])),
    cachedAggregate: null,
  };
}

test("computeAggregate", async (t) => {
  await t.test("counts only solved problems", () => {
    const aggregate = computeAggregate(makeRecords(), 20);

    assert.equal(aggregate.solvedCount, 2);
    // 10 + 20 * 1 + 50; unsolved C contributes nothing
    assert.equal(aggregate.penaltyTime, 80);
    assert.deepEqual(aggregate.solveTimes, [50, 10]);
  });

  await t.test("uses the configured penalty", () => {
    assert.equal(computeAggregate(makeRecords(), 5).penaltyTime, 65);
  });

  await t.test("ignores held submissions", () => {
    const d = createProblemRecord("D");
    fileSubmission(d, { problemId: "D", outcome: "Accepted", timestamp: 90 }, true);

    const aggregate = computeAggregate([d], 20);

    assert.deepEqual(aggregate, { solvedCount: 0, penaltyTime: 0, solveTimes: [] });
  });
});

test("getAggregate caches until invalidated", () => {
  const records = makeRecords();
  const team = makeTeam(records);

  const first = getAggregate(team, 20);
  assert.equal(getAggregate(team, 20), first);

  const c = team.problems.get("C");
  assert.ok(c);
  fileSubmission(c, { problemId: "C", outcome: "Accepted", timestamp: 100 }, false);
  invalidateAggregate(team);

  const second = getAggregate(team, 20);
  assert.notEqual(second, first);
  assert.equal(second.solvedCount, 3);
  // 80 + 100 + 20 * 3
  assert.equal(second.penaltyTime, 240);
  assert.deepEqual(second.solveTimes, [100, 50, 10]);
});
