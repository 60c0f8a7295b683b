export const ErrorCode = {
  SCHEMA_ERROR: "SCHEMA_ERROR",
  REGISTRATION_ERROR: "REGISTRATION_ERROR",
  SPEC_COLLISION: "SPEC_COLLISION",
  PARSE_ERROR: "PARSE_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  HANDLER_FAILURE: "HANDLER_FAILURE",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
