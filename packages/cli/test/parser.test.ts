import test from "node:test";
import assert from "node:assert/strict";

import { DirectiveParseError } from "../src/errors.js";
import { parseLine } from "../src/parser.js";

test("Parsing directives", async (t) => {
  await t.test("ADDTEAM", () => {
    assert.deepEqual(parseLine("ADDTEAM alpha"), {
      type: "ADD_TEAM",
      payload: { teamName: "alpha" },
    });
  });

  await t.test("START", () => {
    assert.deepEqual(parseLine("START DURATION 300 PROBLEM 12"), {
      type: "START",
      payload: { durationMinutes: 300, problemCount: 12 },
    });
  });

  await t.test("SUBMIT", () => {
    assert.deepEqual(parseLine("SUBMIT C BY team_7 WITH Runtime_Error AT 42"), {
      type: "SUBMIT",
      payload: {
        problemId: "C",
        teamName: "team_7",
        outcome: "Runtime_Error",
        timestamp: 42,
      },
    });
  });

  await t.test("bare commands", () => {
    for (const command of ["FLUSH", "FREEZE", "SCROLL", "END"] as const) {
      assert.deepEqual(parseLine(command), { type: command, payload: {} });
    }
  });

  await t.test("QUERY_RANKING", () => {
    assert.deepEqual(parseLine("QUERY_RANKING alpha"), {
      type: "QUERY_RANKING",
      payload: { teamName: "alpha" },
    });
  });

  await t.test("QUERY_SUBMISSION with ALL filters", () => {
    assert.deepEqual(
      parseLine("QUERY_SUBMISSION alpha WHERE PROBLEM=ALL AND STATUS=ALL"),
      {
        type: "QUERY_SUBMISSION",
        payload: { teamName: "alpha", problemId: null, outcome: null },
      },
    );
  });

  await t.test("QUERY_SUBMISSION with concrete filters", () => {
    assert.deepEqual(
      parseLine("QUERY_SUBMISSION alpha WHERE PROBLEM=B AND STATUS=Wrong_Answer"),
      {
        type: "QUERY_SUBMISSION",
        payload: { teamName: "alpha", problemId: "B", outcome: "Wrong_Answer" },
      },
    );
  });

  await t.test("QUERY_SUBMISSION keeps unrecognised filter values", () => {
    assert.deepEqual(
      parseLine("QUERY_SUBMISSION alpha WHERE PROBLEM=AB AND STATUS=Compile_Error"),
      {
        type: "QUERY_SUBMISSION",
        payload: { teamName: "alpha", problemId: "AB", outcome: "Compile_Error" },
      },
    );
  });

  await t.test("surrounding whitespace is ignored", () => {
    assert.deepEqual(parseLine("  FLUSH \r"), { type: "FLUSH", payload: {} });
  });

  await t.test("blank lines yield nothing", () => {
    assert.equal(parseLine(""), null);
    assert.equal(parseLine("   "), null);
  });
});

test("Rejecting malformed lines", async (t) => {
  await t.test("unknown command", () => {
    assert.throws(() => parseLine("RESET now"), {
      name: "DirectiveParseError",
      code: "UNKNOWN_COMMAND",
      message: 'Unknown command "RESET"',
      line: "RESET now",
    });
  });

  await t.test("missing arguments", () => {
    assert.throws(() => parseLine("SUBMIT A BY alpha"), {
      code: "MALFORMED_DIRECTIVE",
      message: "SUBMIT expects 7 argument(s), got 3",
    });
  });

  await t.test("misplaced keyword", () => {
    assert.throws(() => parseLine("START DURATION 300 PROBLEMS 3"), {
      code: "MALFORMED_DIRECTIVE",
      message: "Expected PROBLEM at position 4",
    });
  });

  await t.test("non-numeric time", () => {
    assert.throws(
      () => parseLine("SUBMIT A BY alpha WITH Accepted AT soon"),
      (error: unknown) =>
        error instanceof DirectiveParseError &&
        error.code === "MALFORMED_DIRECTIVE" &&
        error.message.startsWith("payload.timestamp:"),
    );
  });

  await t.test("lower-case problem letter", () => {
    assert.throws(() => parseLine("SUBMIT a BY alpha WITH Accepted AT 1"), {
      code: "MALFORMED_DIRECTIVE",
      message: "payload.problemId: Problem id must be a single letter A-Z",
    });
  });

  await t.test("empty filter value", () => {
    assert.throws(
      () => parseLine("QUERY_SUBMISSION alpha WHERE PROBLEM= AND STATUS=ALL"),
      { code: "MALFORMED_DIRECTIVE", message: "Missing value for PROBLEM" },
    );
  });

  await t.test("filter without key", () => {
    assert.throws(
      () => parseLine("QUERY_SUBMISSION alpha WHERE A AND STATUS=ALL"),
      { code: "MALFORMED_DIRECTIVE", message: "Expected PROBLEM=<value>" },
    );
  });
});
