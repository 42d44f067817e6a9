/**
 * Shared manifest loading for commands that need a registry.
 * Prints every load-time problem and yields undefined when there is one.
 */

import { ManifestError } from "@commandry/sdk";
import type { RegistrySnapshot } from "@commandry/core";
import { loadRegistry } from "../utils/manifest.js";
import type { BuildResult } from "../utils/manifest.js";
import { formatError } from "../utils/output.js";

export async function openRegistry(manifestPath: string): Promise<RegistrySnapshot | undefined> {
  let result: BuildResult;
  try {
    result = await loadRegistry(manifestPath);
  } catch (err) {
    if (err instanceof ManifestError) {
      console.error(formatError(err));
      return undefined;
    }
    throw err;
  }

  if (!result.ok) {
    console.error(`${result.errors.length} problem(s) in ${manifestPath}:`);
    for (const error of result.errors) {
      console.error(`  ${formatError(error)}`);
    }
    return undefined;
  }
  return result.registry;
}
