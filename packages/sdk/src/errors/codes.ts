/**
 * Stable error codes carried by every CommandryError.
 */
export const ErrorCode = {
  INVALID_SCHEMA: "INVALID_SCHEMA",
  DUPLICATE_COMMAND: "DUPLICATE_COMMAND",
  DANGLING_AGENT_REFERENCE: "DANGLING_AGENT_REFERENCE",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  MISSING_ARGUMENT: "MISSING_ARGUMENT",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  UNEXPECTED_ARGUMENT: "UNEXPECTED_ARGUMENT",
  TYPE_COERCION: "TYPE_COERCION",
  INVALID_CHOICE: "INVALID_CHOICE",
  MANIFEST_ERROR: "MANIFEST_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
