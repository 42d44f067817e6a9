export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CommandDeclarationSchema, ManifestSchema } from "./utils/declaration-schema.js";
export type { ValidatedManifest } from "./utils/declaration-schema.js";
