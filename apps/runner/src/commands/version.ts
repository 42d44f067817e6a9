/**
 * Version command - display version information.
 */

import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { z } from "zod";
import type { CliCommand, ParsedArgs } from "./base.js";

const localRequire = createRequire(import.meta.url);

const PackageJsonSchema = z.object({ version: z.string() });

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  async execute(args: ParsedArgs): Promise<number> {
    let version: string;
    try {
      // Through the workspace link, from src/ or dist/
      const pkgPath = localRequire.resolve("@commandry/runner/package.json");
      version = PackageJsonSchema.parse(JSON.parse(readFileSync(pkgPath, "utf-8"))).version;
    } catch (err) {
      console.error(`Failed to read version information: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }

    console.log(`commandry v${version}`);
    if (args.flags.verbose) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }
    return 0;
  }
}
