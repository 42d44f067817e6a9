/**
 * Manifest loading - reads a commandry.json and builds a validated registry.
 *
 * Manifest shape:
 *   { "agents": ["release-manager", ...], "commands": [CommandDeclaration, ...] }
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { CommandryError, ManifestError } from "@commandry/sdk";
import type { RegistrySnapshot } from "@commandry/core";
import { createCommandRegistry, parseCommandDeclaration } from "@commandry/core";
import { ManifestSchema, createLogger, validateInput } from "@commandry/shared";
import type { ValidatedManifest } from "@commandry/shared";

const logger = createLogger("Manifest");

export const DEFAULT_MANIFEST_FILE = "commandry.json";
export const MANIFEST_ENV_VAR = "COMMANDRY_MANIFEST";

export type BuildResult =
  | { ok: true; registry: RegistrySnapshot }
  | { ok: false; errors: CommandryError[] };

/**
 * Where to read the manifest from: --manifest, then COMMANDRY_MANIFEST,
 * then ./commandry.json.
 */
export function resolveManifestPath(
  flag: string | boolean | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  if (typeof flag === "string" && flag.length > 0) return resolve(cwd, flag);
  const fromEnv = env[MANIFEST_ENV_VAR];
  if (fromEnv) return resolve(cwd, fromEnv);
  return resolve(cwd, DEFAULT_MANIFEST_FILE);
}

export async function loadManifest(path: string): Promise<ValidatedManifest> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ManifestError(path, "cannot read file", { cause: toError(err) });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError(path, "invalid JSON", { cause: toError(err) });
  }

  const result = validateInput(ManifestSchema, parsed);
  if (!result.success) {
    throw new ManifestError(path, result.error);
  }
  logger.debug(`Loaded manifest`, {
    path,
    agents: result.data.agents.length,
    commands: result.data.commands.length,
  });
  return result.data;
}

/**
 * Parse, register and validate every declaration, collecting all load-time
 * errors: invalid declarations and duplicates first, in manifest order, then
 * dangling agent references of the commands that did register.
 */
export function buildRegistry(manifest: ValidatedManifest): BuildResult {
  const registry = createCommandRegistry();
  const errors: CommandryError[] = [];

  for (const declaration of manifest.commands) {
    try {
      registry.register(parseCommandDeclaration(declaration));
    } catch (err) {
      if (!(err instanceof CommandryError)) throw err;
      errors.push(err);
    }
  }

  const result = registry.finalizeAndValidate(manifest.agents);
  if (!result.ok) {
    errors.push(...result.errors);
  }
  if (!result.ok || errors.length > 0) {
    logger.debug(`Manifest rejected with ${errors.length} error(s)`);
    return { ok: false, errors };
  }
  return { ok: true, registry: result.registry };
}

/** Load a manifest file and build its registry in one step. */
export async function loadRegistry(path: string): Promise<BuildResult> {
  const stop = logger.time("load-registry");
  const manifest = await loadManifest(path);
  const result = buildRegistry(manifest);
  stop();
  return result;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
