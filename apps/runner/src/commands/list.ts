/**
 * List command - print usage for every declared command.
 *
 * Usage:
 *   commandry list [--manifest <path>] [--verbose]
 */

import type { CliCommand, ParsedArgs } from "./base.js";
import { openRegistry } from "./load.js";
import { resolveManifestPath } from "../utils/manifest.js";
import { formatUsage } from "../utils/usage.js";

export class ListCommand implements CliCommand {
  name = "list";
  description = "Show usage for every declared command";

  async execute(args: ParsedArgs): Promise<number> {
    const registry = await openRegistry(resolveManifestPath(args.flags.manifest));
    if (!registry) return 1;

    if (registry.size === 0) {
      console.log("No commands declared.");
      return 0;
    }

    for (const schema of registry.list()) {
      console.log(`  ${formatUsage(schema)}`);
      if (args.flags.verbose !== true) continue;
      if (schema.description) console.log(`      ${schema.description}`);
      if (schema.agentRefs.size > 0) console.log(`      agents: ${[...schema.agentRefs].join(", ")}`);
    }
    return 0;
  }
}
