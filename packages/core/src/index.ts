// Schema
export { parseCommandSchema, parseCommandDeclaration, COMMAND_NAME_PATTERN } from "./schema/parser.js";
export { matchesType, describeType } from "./schema/value-types.js";

// Registry
export { createCommandRegistry, createRegistryHolder } from "./infrastructure/index.js";
export type {
  CommandRegistry,
  RegistrySnapshot,
  FinalizeResult,
  RegistryHolder,
} from "./infrastructure/index.js";

// Resolver
export { createResolver } from "./resolver/resolver.js";
export type { Resolver, ResolveResult } from "./resolver/resolver.js";
export { coerceValue } from "./resolver/coerce.js";
