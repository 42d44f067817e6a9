/**
 * Validate command - check a manifest's declarations and agent references.
 *
 * Usage:
 *   commandry validate [--manifest <path>]
 */

import type { CliCommand, ParsedArgs } from "./base.js";
import { openRegistry } from "./load.js";
import { resolveManifestPath } from "../utils/manifest.js";

export class ValidateCommand implements CliCommand {
  name = "validate";
  description = "Check command declarations and agent references in a manifest";

  async execute(args: ParsedArgs): Promise<number> {
    const manifestPath = resolveManifestPath(args.flags.manifest);
    const registry = await openRegistry(manifestPath);
    if (!registry) return 1;

    console.log(
      `${manifestPath}: ${registry.size} command(s), ${registry.knownAgents.size} agent(s), no problems found`,
    );
    return 0;
  }
}
