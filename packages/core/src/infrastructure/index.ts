export { createCommandRegistry } from "./command-registry.js";
export type { CommandRegistry, RegistrySnapshot, FinalizeResult } from "./command-registry.js";

export { createRegistryHolder } from "./registry-holder.js";
export type { RegistryHolder } from "./registry-holder.js";
