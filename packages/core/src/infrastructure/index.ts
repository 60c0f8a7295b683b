export { createCommandRegistry, normalizeCommandName } from "./command-registry.js";
export type { CommandRegistry, ResolvedCommand } from "./command-registry.js";
