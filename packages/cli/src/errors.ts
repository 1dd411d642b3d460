export type DirectiveParseErrorCode = "UNKNOWN_COMMAND" | "MALFORMED_DIRECTIVE";

/**
 * Raised when a line of directive text cannot be turned into a directive.
 *
 * Error codes:
 * - UNKNOWN_COMMAND: the first word is not a known directive
 * - MALFORMED_DIRECTIVE: known directive, wrong shape or invalid values
 *
 * @example
 * ```ts
 * try {
 *   parseLine("SUBMIT A BY alpha WITH Accepted");
 * } catch (error) {
 *   if (error instanceof DirectiveParseError) {
 *     log("warn", error.message, { code: error.code, line: error.line }, "cli");
 *   }
 * }
 * ```
 */
export class DirectiveParseError extends Error {
  /**
   * @param code - Error code ("UNKNOWN_COMMAND" or "MALFORMED_DIRECTIVE")
   * @param message - Human-readable error message
   * @param line - The offending input line
   */
  constructor(
    public code: DirectiveParseErrorCode,
    message: string,
    public line: string,
  ) {
    super(message);
    this.name = "DirectiveParseError";
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DirectiveParseError);
    }
  }
}
