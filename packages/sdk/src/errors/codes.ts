/**
 * Error codes carried by every CliError.
 */
export const ErrorCode = {
  UNSUPPORTED_TYPE: "UNSUPPORTED_TYPE",
  MALFORMED_VALUE: "MALFORMED_VALUE",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  INSUFFICIENT_ARGS: "INSUFFICIENT_ARGS",
  ARG_COUNT_MISMATCH: "ARG_COUNT_MISMATCH",
  MISSING_OPTION_VALUE: "MISSING_OPTION_VALUE",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  INVALID_REGISTRATION: "INVALID_REGISTRATION",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
