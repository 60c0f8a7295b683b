import { describe, it, expect } from "vitest";
import {
  ParamCliError,
  SchemaError,
  RegistrationError,
  SpecCollisionError,
  ParseError,
  ValidationError,
  HandlerFailure,
} from "./base.js";
import { ErrorCode } from "./codes.js";

describe("Error System", () => {
  describe("ParamCliError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new ParamCliError("test error", "TEST_CODE", { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("TEST_CODE");
      expect(err.message).toBe("test error");
    });

    it("should work without cause", () => {
      const err = new ParamCliError("test error", "TEST_CODE");
      expect(err.cause).toBeUndefined();
      expect(err.name).toBe("ParamCliError");
    });
  });

  describe("SchemaError", () => {
    it("should prefix the message with the field name", () => {
      const err = new SchemaError("limits.cpu", "type ZodUnion cannot be mapped to a CLI parameter");
      expect(err.name).toBe("SchemaError");
      expect(err.code).toBe(ErrorCode.SCHEMA_ERROR);
      expect(err.field).toBe("limits.cpu");
      expect(err.message).toBe('Field "limits.cpu": type ZodUnion cannot be mapped to a CLI parameter');
      expect(err).toBeInstanceOf(ParamCliError);
    });
  });

  describe("RegistrationError", () => {
    it("should carry the command and accept a custom code", () => {
      const err = new RegistrationError("deploy", "registry is sealed");
      expect(err.command).toBe("deploy");
      expect(err.code).toBe(ErrorCode.REGISTRATION_ERROR);

      const custom = new RegistrationError("deploy", "bad", { code: "CUSTOM" });
      expect(custom.code).toBe("CUSTOM");
    });
  });

  describe("SpecCollisionError", () => {
    it("should name the token and both owners", () => {
      const err = new SpecCollisionError("deploy", "--dry-run", ["dry_run", "dryRun"]);
      expect(err.name).toBe("SpecCollisionError");
      expect(err.code).toBe(ErrorCode.SPEC_COLLISION);
      expect(err.command).toBe("deploy");
      expect(err.message).toBe('Command "deploy": flag --dry-run is claimed by "dry_run" and "dryRun"');
      expect(err).toBeInstanceOf(RegistrationError);
    });

    it("should describe a duplicate command without owners", () => {
      const err = new SpecCollisionError("config", "config", []);
      expect(err.message).toBe('Command "config" is already registered');
    });
  });

  describe("ParseError", () => {
    it("should keep the offending token and field", () => {
      const err = new ParseError("XML", 'Invalid value "XML" for format', "format");
      expect(err.code).toBe(ErrorCode.PARSE_ERROR);
      expect(err.token).toBe("XML");
      expect(err.field).toBe("format");
    });

    it("should allow a token without field", () => {
      expect(new ParseError("--nope", 'Unknown option "--nope"').field).toBeUndefined();
    });
  });

  describe("ValidationError", () => {
    it("should join every violation message", () => {
      const err = new ValidationError([
        { field: "name", constraint: "required", message: "name is required" },
        { field: "retries", constraint: "max", message: "retries must be <= 10" },
      ]);
      expect(err.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(err.violations).toHaveLength(2);
      expect(err.message).toBe("name is required; retries must be <= 10");
    });
  });

  describe("HandlerFailure", () => {
    it("should carry an optional exit code and cause", () => {
      const cause = new Error("EACCES");
      const err = new HandlerFailure("cannot write config", 3, { cause });
      expect(err.name).toBe("HandlerFailure");
      expect(err.code).toBe(ErrorCode.HANDLER_FAILURE);
      expect(err.exitCode).toBe(3);
      expect(err.cause).toBe(cause);
      expect(new HandlerFailure("failed").exitCode).toBeUndefined();
    });
  });
});
