// ============================================================================
// @scoreboard/contracts - Source of Truth for Types and Schemas
// ============================================================================

// Teams, problems, submissions
export * from "./contest.js";

// Result envelope and error codes
export * from "./result.js";

// Directive types
export * from "./directive.js";

// Standings, snapshots, rank-change events
export * from "./scoreboard.js";
