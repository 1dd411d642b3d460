import { parseDirective, type Directive } from "@scoreboard/contracts";
import { DirectiveParseError } from "./errors.js";

// ============================================================================
// Directive Grammar
// ============================================================================
//
//   ADDTEAM <team>
//   START DURATION <minutes> PROBLEM <count>
//   SUBMIT <problem> BY <team> WITH <status> AT <time>
//   FLUSH | FREEZE | SCROLL | END
//   QUERY_RANKING <team>
//   QUERY_SUBMISSION <team> WHERE PROBLEM=<problem|ALL> AND STATUS=<status|ALL>

const ALL = "ALL";

function malformed(line: string, message: string): DirectiveParseError {
  return new DirectiveParseError("MALFORMED_DIRECTIVE", message, line);
}

function expectLength(tokens: string[], length: number, line: string): void {
  if (tokens.length !== length) {
    throw malformed(
      line,
      `${tokens[0]} expects ${length - 1} argument(s), got ${tokens.length - 1}`,
    );
  }
}

function expectKeyword(
  tokens: string[],
  index: number,
  keyword: string,
  line: string,
): void {
  if (tokens[index] !== keyword) {
    throw malformed(line, `Expected ${keyword} at position ${index + 1}`);
  }
}

/**
 * Read the value of a `KEY=value` filter; "ALL" becomes null.
 */
function readFilter(token: string | undefined, key: string, line: string): string | null {
  const prefix = `${key}=`;
  if (!token || !token.startsWith(prefix)) {
    throw malformed(line, `Expected ${prefix}<value>`);
  }
  const value = token.slice(prefix.length);
  if (value === "") {
    throw malformed(line, `Missing value for ${key}`);
  }
  return value === ALL ? null : value;
}

/**
 * Map tokens to an unvalidated directive candidate.
 */
function toCandidate(tokens: string[], line: string): unknown {
  const [command] = tokens;

  switch (command) {
    case "ADDTEAM":
      expectLength(tokens, 2, line);
      return { type: "ADD_TEAM", payload: { teamName: tokens[1] } };

    case "START":
      expectLength(tokens, 5, line);
      expectKeyword(tokens, 1, "DURATION", line);
      expectKeyword(tokens, 3, "PROBLEM", line);
      return {
        type: "START",
        payload: {
          durationMinutes: Number(tokens[2]),
          problemCount: Number(tokens[4]),
        },
      };

    case "SUBMIT":
      expectLength(tokens, 8, line);
      expectKeyword(tokens, 2, "BY", line);
      expectKeyword(tokens, 4, "WITH", line);
      expectKeyword(tokens, 6, "AT", line);
      return {
        type: "SUBMIT",
        payload: {
          problemId: tokens[1],
          teamName: tokens[3],
          outcome: tokens[5],
          timestamp: Number(tokens[7]),
        },
      };

    case "FLUSH":
    case "FREEZE":
    case "SCROLL":
    case "END":
      expectLength(tokens, 1, line);
      return { type: command, payload: {} };

    case "QUERY_RANKING":
      expectLength(tokens, 2, line);
      return { type: "QUERY_RANKING", payload: { teamName: tokens[1] } };

    case "QUERY_SUBMISSION":
      expectLength(tokens, 6, line);
      expectKeyword(tokens, 2, "WHERE", line);
      expectKeyword(tokens, 4, "AND", line);
      return {
        type: "QUERY_SUBMISSION",
        payload: {
          teamName: tokens[1],
          problemId: readFilter(tokens[3], "PROBLEM", line),
          outcome: readFilter(tokens[5], "STATUS", line),
        },
      };

    default:
      throw new DirectiveParseError(
        "UNKNOWN_COMMAND",
        `Unknown command "${command}"`,
        line,
      );
  }
}

/**
 * Parse one line of directive text. Returns null for blank lines.
 *
 * @throws DirectiveParseError when the line is not a valid directive
 */
export function parseLine(line: string): Directive | null {
  const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) return null;

  const parsed = parseDirective(toCandidate(tokens, line));
  if (!parsed.ok) {
    throw malformed(line, parsed.error.message);
  }
  return parsed.value;
}
