/**
 * CommandRegistry: maps command names (possibly hierarchical, e.g.
 * "config show") to their synthesized parameters and handler.
 *
 * Extraction and synthesis run inside `register`, so schema problems and
 * flag collisions surface at startup rather than on first use. A name can
 * be registered once; the first registration always stays.
 */

import type { z } from "zod";
import { RegistrationError, SpecCollisionError } from "@paramcli/sdk";
import type { CommandHandler, CommandRegistration, RegisterOptions } from "@paramcli/sdk";
import { createLogger } from "@paramcli/shared";
import { extractFields } from "../schema/extractor.js";
import { synthesizeParameters } from "../synthesis/synthesizer.js";

const logger = createLogger("CommandRegistry");

const SEGMENT = /^[a-z0-9][a-z0-9-]*$/;

export interface ResolvedCommand {
  registration: CommandRegistration;
  /** Tokens after the command name. */
  rest: string[];
}

export interface CommandRegistry {
  register<T>(
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: CommandHandler<T>,
    options?: RegisterOptions,
  ): CommandRegistration<T>;
  get(name: string): CommandRegistration | undefined;
  has(name: string): boolean;
  /** All registrations, sorted by name. */
  list(): CommandRegistration[];
  /** Longest registered name formed by the leading non-flag tokens. */
  resolve(argv: readonly string[]): ResolvedCommand | undefined;
  /** True when some registered command lives under `name`. */
  isGroup(name: string): boolean;
  /** Registrations under a group, sorted by name. */
  children(group: string): CommandRegistration[];
  /** Refuse further registrations. */
  seal(): void;
  readonly sealed: boolean;
}

/** Collapse whitespace and validate each segment of a command name. */
export function normalizeCommandName(name: string): string {
  const segments = name.trim().split(/\s+/);
  for (const segment of segments) {
    if (!SEGMENT.test(segment)) {
      throw new RegistrationError(
        name,
        `Invalid command name "${name}": segments must be lowercase letters, digits or "-"`,
      );
    }
  }
  return segments.join(" ");
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, CommandRegistration>();
  let sealed = false;

  const sorted = (registrations: Iterable<CommandRegistration>): CommandRegistration[] =>
    [...registrations].sort((a, b) => a.name.localeCompare(b.name));

  return {
    register<T>(
      name: string,
      schema: z.ZodType<T, z.ZodTypeDef, unknown>,
      handler: CommandHandler<T>,
      options: RegisterOptions = {},
    ): CommandRegistration<T> {
      const normalized = normalizeCommandName(name);
      if (sealed) {
        throw new RegistrationError(normalized, `Cannot register "${normalized}": registry is sealed`);
      }
      if (commands.has(normalized)) {
        throw new SpecCollisionError(normalized, normalized, []);
      }

      const fields = extractFields(schema);
      const parameters = synthesizeParameters(normalized, fields);
      const segments = normalized.split(" ");

      const registration: CommandRegistration<T> = Object.freeze({
        name: normalized,
        description: options.description ?? "",
        group: segments.length > 1 ? segments.slice(0, -1).join(" ") : undefined,
        schema,
        fields,
        parameters,
        handle: handler,
      });

      commands.set(normalized, registration);
      logger.debug(`Registered command: ${normalized}`, { parameters: parameters.length });
      return registration;
    },

    get(name: string): CommandRegistration | undefined {
      return commands.get(name.trim().split(/\s+/).join(" "));
    },

    has(name: string): boolean {
      return this.get(name) !== undefined;
    },

    list(): CommandRegistration[] {
      return sorted(commands.values());
    },

    resolve(argv: readonly string[]): ResolvedCommand | undefined {
      const words: string[] = [];
      for (const token of argv) {
        if (token.startsWith("-")) break;
        words.push(token);
      }

      for (let count = words.length; count > 0; count--) {
        const registration = commands.get(words.slice(0, count).join(" "));
        if (registration) {
          return { registration, rest: argv.slice(count) };
        }
      }
      return undefined;
    },

    isGroup(name: string): boolean {
      const prefix = `${name} `;
      for (const key of commands.keys()) {
        if (key.startsWith(prefix)) return true;
      }
      return false;
    },

    children(group: string): CommandRegistration[] {
      const prefix = `${group} `;
      return sorted([...commands.values()].filter((registration) => registration.name.startsWith(prefix)));
    },

    seal(): void {
      sealed = true;
    },

    get sealed(): boolean {
      return sealed;
    },
  };
}
