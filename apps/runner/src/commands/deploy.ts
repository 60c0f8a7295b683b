/**
 * Deploy command - plan or record a service rollout.
 *
 * Nothing leaves the process; the payload describes what would be applied.
 */

import { z } from "zod";
import { failure, interrupted, success } from "@paramcli/sdk";
import type { ExecutionResult, HandlerContext } from "@paramcli/sdk";
import { cliField } from "@paramcli/core";
import type { CliCommand } from "./base.js";

export const environments = ["dev", "staging", "production"] as const;

export const DeploySchema = z.object({
  name: cliField(
    z.string().min(2).max(40).regex(/^[a-z][a-z0-9-]*$/),
    { short: "n", help: "Service name" },
  ),
  environment: cliField(z.enum(environments).default("dev"), { short: "e", help: "Target environment" }),
  replicas: z.number().int().min(1).max(20).default(1).describe("Instances to run"),
  retries: z.number().int().min(0).max(10).default(3).describe("Retry attempts per instance"),
  timeout: z.number().gt(0).optional().describe("Rollout timeout in seconds"),
  tag: z.array(z.string().min(1)).max(5).default([]).describe("Image tag to roll out"),
  dry_run: z.boolean().default(false).describe("Print the plan without applying it"),
  confirm: z.boolean().default(false).describe("Required for production"),
  db: cliField(
    z.object({
      host: z.string().default("localhost").describe("Database host"),
      port: z.number().int().min(1).max(65535).default(5432).describe("Database port"),
    }),
    { flatten: true },
  ),
});

export type DeployInput = z.infer<typeof DeploySchema>;

export interface DeployPlan {
  service: string;
  environment: (typeof environments)[number];
  replicas: number;
  retries: number;
  timeout: number | null;
  tags: string[];
  database: string;
  status: "planned" | "deployed";
}

export class DeployCommand implements CliCommand<DeployInput> {
  readonly name = "deploy";
  readonly description = "Deploy a service";
  readonly schema = DeploySchema;

  handle(input: Readonly<DeployInput>, ctx: HandlerContext): ExecutionResult {
    if (input.environment === "production" && !input.confirm && !input.dry_run) {
      return failure(`Refusing to deploy "${input.name}" to production without --confirm`);
    }
    if (ctx.signal.aborted) {
      return interrupted("deploy cancelled");
    }

    const plan: DeployPlan = {
      service: input.name,
      environment: input.environment,
      replicas: input.replicas,
      retries: input.retries,
      timeout: input.timeout ?? null,
      tags: [...input.tag],
      database: `${input.db.host}:${input.db.port}`,
      status: input.dry_run ? "planned" : "deployed",
    };

    ctx.logger.info(input.dry_run ? "Deployment planned" : "Deployment recorded", {
      service: plan.service,
      environment: plan.environment,
    });
    return success(plan);
  }
}
