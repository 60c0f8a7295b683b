// Types
export type {
  ScalarKind,
  FieldType,
  Bound,
  FieldConstraints,
  FieldDescriptor,
  FieldMeta,
} from "./types/field.js";

export { unwrapOptional } from "./types/field.js";

export type {
  ParameterTypeTag,
  Multiplicity,
  ParameterSpec,
  ParsedValues,
  ParseOutcome,
  FieldViolation,
  ValidationOutcome,
} from "./types/parameter.js";

export type {
  FailureKind,
  Diagnostic,
  Success,
  Failure,
  ExecutionResult,
} from "./types/result.js";

export {
  ExitCode,
  success,
  failure,
  usageFailure,
  interrupted,
  isSuccess,
  exitCodeOf,
} from "./types/result.js";

export type {
  HandlerLogger,
  HandlerContext,
  CommandHandler,
  RegisterOptions,
  CommandRegistration,
} from "./types/command.js";

// Collaborators
export type { OutputFormat, OutputFormatter, DiagnosticsSink } from "./interfaces/output.js";
export { outputFormats } from "./interfaces/output.js";

// Errors
export {
  ParamCliError,
  SchemaError,
  RegistrationError,
  SpecCollisionError,
  ParseError,
  ValidationError,
  HandlerFailure,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
