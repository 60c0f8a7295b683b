/**
 * Error hierarchy for schema-driven commands.
 *
 * Startup errors (SchemaError, RegistrationError, SpecCollisionError) are
 * thrown out of registration and never recovered. Invocation errors
 * (ParseError, ValidationError, HandlerFailure) are converted to results at
 * the dispatcher boundary.
 */

import { ErrorCode } from "./codes.js";
import type { FieldViolation } from "../types/parameter.js";

export class ParamCliError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "ParamCliError";
  }
}

/** A schema field cannot be mapped to a supported CLI type. */
export class SchemaError extends ParamCliError {
  constructor(
    public readonly field: string,
    message: string,
    options?: { cause?: Error },
  ) {
    super(`Field "${field}": ${message}`, ErrorCode.SCHEMA_ERROR, options);
    this.name = "SchemaError";
  }
}

export class RegistrationError extends ParamCliError {
  constructor(
    public readonly command: string,
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.REGISTRATION_ERROR, options);
    this.name = "RegistrationError";
  }
}

/**
 * Two parameters synthesize the same flag token, or a command name is
 * registered twice.
 */
export class SpecCollisionError extends RegistrationError {
  constructor(
    command: string,
    public readonly token: string,
    public readonly owners: string[],
  ) {
    super(
      command,
      owners.length > 0
        ? `Command "${command}": flag ${token} is claimed by ${owners.map((o) => `"${o}"`).join(" and ")}`
        : `Command "${command}" is already registered`,
      { code: ErrorCode.SPEC_COLLISION },
    );
    this.name = "SpecCollisionError";
  }
}

/** First malformed token of an invocation. */
export class ParseError extends ParamCliError {
  constructor(
    public readonly token: string,
    message: string,
    public readonly field?: string,
  ) {
    super(message, ErrorCode.PARSE_ERROR);
    this.name = "ParseError";
  }
}

/** Every constraint violation of an invocation, collected. */
export class ValidationError extends ParamCliError {
  constructor(public readonly violations: FieldViolation[]) {
    super(violations.map((v) => v.message).join("; "), ErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/**
 * Thrown by handler code that prefers exceptions over returning
 * `failure()`; the dispatcher turns it into a handler failure verbatim.
 */
export class HandlerFailure extends ParamCliError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    options?: { cause?: Error },
  ) {
    super(message, ErrorCode.HANDLER_FAILURE, options);
    this.name = "HandlerFailure";
  }
}
