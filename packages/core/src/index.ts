// Schema introspection
export { cliField, getFieldMeta } from "./schema/field-meta.js";
export { extractFields, flagFor } from "./schema/extractor.js";

// Synthesis
export { synthesizeParameters, HELP_FLAGS } from "./synthesis/synthesizer.js";
export { renderArgv } from "./synthesis/argv-writer.js";

// Parsing & validation
export { parseArgv } from "./parsing/parser.js";
export { parseInput } from "./parsing/parse-input.js";
export { validateValues } from "./validation/validator.js";

// Help
export { renderHelp, renderGroupHelp, renderOverview } from "./help/help.js";

// Infrastructure
export { createCommandRegistry, normalizeCommandName } from "./infrastructure/index.js";
export type { CommandRegistry, ResolvedCommand } from "./infrastructure/index.js";

// Dispatch
export { createDispatcher } from "./dispatch/dispatcher.js";
export type { Dispatcher, DispatcherOptions } from "./dispatch/dispatcher.js";

export { createCli } from "./cli.js";
export type { CliOptions, ParamCli } from "./cli.js";
