import { describe, it, expect } from "vitest";
import { ExitCode, exitCodeOf, failure, interrupted, isSuccess, success, usageFailure } from "./result.js";

describe("result helpers", () => {
  it("builds successes with an optional exit code", () => {
    expect(success({ id: 1 })).toEqual({ ok: true, payload: { id: 1 } });
    expect(success("partial", 3)).toEqual({ ok: true, payload: "partial", exitCode: 3 });
  });

  it("builds handler failures", () => {
    expect(failure("disk full")).toEqual({ ok: false, kind: "handler", message: "disk full" });
    expect(failure("not found", 4).exitCode).toBe(4);
  });

  it("builds usage failures with exit code 2", () => {
    expect(usageFailure("bad input", [{ field: "name", message: "name is required" }])).toEqual({
      ok: false,
      kind: "usage",
      message: "bad input",
      exitCode: 2,
      diagnostics: [{ field: "name", message: "name is required" }],
    });
    expect(usageFailure("bad input").diagnostics).toEqual([]);
  });

  it("builds interrupted results", () => {
    expect(interrupted().message).toBe("interrupted");
    expect(interrupted("SIGINT")).toEqual({
      ok: false,
      kind: "interrupted",
      message: "interrupted: SIGINT",
      exitCode: 130,
    });
  });

  it("maps results to exit codes", () => {
    expect(exitCodeOf(success(null))).toBe(ExitCode.SUCCESS);
    expect(exitCodeOf(failure("x"))).toBe(ExitCode.FAILURE);
    expect(exitCodeOf({ ok: false, kind: "usage", message: "x" })).toBe(ExitCode.USAGE);
    expect(exitCodeOf({ ok: false, kind: "interrupted", message: "x" })).toBe(ExitCode.INTERRUPTED);
    expect(exitCodeOf(success(null, 5))).toBe(5);
  });

  it("narrows with isSuccess", () => {
    const result = success(42);
    expect(isSuccess(result)).toBe(true);
    expect(isSuccess(failure("x"))).toBe(false);
  });
});
