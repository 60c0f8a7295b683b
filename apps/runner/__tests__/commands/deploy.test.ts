import { describe, it, expect } from "vitest";
import { DeployCommand, DeploySchema } from "../../src/commands/deploy.js";
import { createTestContext } from "../helpers/cli-helper.js";

const input = (overrides: Record<string, unknown> = {}) => DeploySchema.parse({ name: "billing", db: {}, ...overrides });

describe("DeployCommand", () => {
  it("should fill defaults through the schema", () => {
    expect(input()).toEqual({
      name: "billing",
      environment: "dev",
      replicas: 1,
      retries: 3,
      dry_run: false,
      confirm: false,
      tag: [],
      db: { host: "localhost", port: 5432 },
    });
  });

  it("should return the rollout plan", () => {
    const command = new DeployCommand();
    const result = command.handle(input({ tag: ["v2"], timeout: 30 }), createTestContext("deploy"));

    expect(result).toEqual({
      ok: true,
      payload: {
        service: "billing",
        environment: "dev",
        replicas: 1,
        retries: 3,
        timeout: 30,
        tags: ["v2"],
        database: "localhost:5432",
        status: "deployed",
      },
    });
  });

  it("should only plan on a dry run", () => {
    const result = new DeployCommand().handle(input({ dry_run: true }), createTestContext("deploy"));
    expect(result.ok && result.payload).toMatchObject({ status: "planned" });
  });

  it("should refuse production without --confirm", () => {
    const command = new DeployCommand();
    const ctx = createTestContext("deploy");

    expect(command.handle(input({ environment: "production" }), ctx)).toEqual({
      ok: false,
      kind: "handler",
      message: 'Refusing to deploy "billing" to production without --confirm',
    });
    expect(command.handle(input({ environment: "production", confirm: true }), ctx).ok).toBe(true);
    expect(command.handle(input({ environment: "production", dry_run: true }), ctx).ok).toBe(true);
  });

  it("should stop when the invocation was interrupted", () => {
    const controller = new AbortController();
    controller.abort();
    const result = new DeployCommand().handle(input(), createTestContext("deploy", controller.signal));

    expect(result).toEqual({ ok: false, kind: "interrupted", message: "interrupted: deploy cancelled", exitCode: 130 });
  });
});
