export { createLogger, isLogLevel, logFormats, logLevels } from "./logger/index.js";
export type { Logger, LogLevel, LogFormat, LogContext, LoggerOptions } from "./logger/index.js";

export { generateInvocationId } from "./utils/ids.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CliSettingsSchema, loadSettings } from "./utils/settings.js";
export type { CliSettings } from "./utils/settings.js";
