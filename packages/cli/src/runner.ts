import type { Directive } from "@scoreboard/contracts";
import {
  CollectingReporter,
  ScoreboardEngine,
  dispatchDirective,
  log,
} from "@scoreboard/engine";
import type { ScoreboardConfig } from "./config.js";
import { DirectiveParseError } from "./errors.js";
import { formatOutcome, formatReportedEvents } from "./formatter.js";
import { parseLine } from "./parser.js";

export interface Session {
  engine: ScoreboardEngine;
  reporter: CollectingReporter;
  ended: boolean;
}

export interface LineResult {
  output: string[];
  ended: boolean;
}

export function createSession(
  config: Pick<ScoreboardConfig, "penaltyPerWrongAttempt" | "maxProblemCount">,
): Session {
  const reporter = new CollectingReporter();
  const engine = new ScoreboardEngine({
    reporter,
    penaltyPerWrongAttempt: config.penaltyPerWrongAttempt,
    maxProblemCount: config.maxProblemCount,
  });
  return { engine, reporter, ended: false };
}

/**
 * Process one line of input: status lines first, then whatever the engine
 * reported while handling it. Unparseable lines are logged and skipped.
 */
export function handleLine(session: Session, line: string): LineResult {
  let directive: Directive | null;
  try {
    directive = parseLine(line);
  } catch (error) {
    if (error instanceof DirectiveParseError) {
      log("warn", `Skipping line: ${error.message}`, { code: error.code, line: error.line }, "cli");
      return { output: [], ended: session.ended };
    }
    throw error;
  }

  if (!directive) return { output: [], ended: session.ended };

  const outcome = dispatchDirective(session.engine, directive);
  const output = [
    ...formatOutcome(outcome),
    ...formatReportedEvents(session.reporter.drain()),
  ];

  if (outcome.type === "END" && outcome.result.ok) {
    session.ended = true;
  }

  return { output, ended: session.ended };
}

/**
 * Feed lines to a session until input runs out or END is accepted.
 */
export async function runScoreboard(
  input: AsyncIterable<string> | Iterable<string>,
  write: (text: string) => void,
  session: Session,
): Promise<void> {
  for await (const line of input) {
    const { output, ended } = handleLine(session, line);
    if (output.length > 0) {
      write(`${output.join("\n")}\n`);
    }
    if (ended) break;
  }
}
