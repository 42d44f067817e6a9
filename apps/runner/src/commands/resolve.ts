/**
 * Resolve command - bind an invocation to its declared command and print the result.
 *
 * Usage:
 *   commandry resolve [--manifest <path>] [--json] -- <command> [args...] [--option value...]
 *
 * Everything after "--" is the invocation being resolved.
 */

import { createResolver } from "@commandry/core";
import { createLogger } from "@commandry/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { openRegistry } from "./load.js";
import { parseInvocation } from "../utils/args.js";
import { resolveManifestPath } from "../utils/manifest.js";
import { formatContextLines, formatError, toInvocationJson } from "../utils/output.js";

const logger = createLogger("cli:resolve");

export class ResolveCommand implements CliCommand {
  name = "resolve";
  description = "Resolve an invocation against the manifest";

  async execute(args: ParsedArgs): Promise<number> {
    const asJson = args.flags.json === true;
    const invocation = parseInvocation(args.rest.length > 0 ? args.rest : args.positional);
    if (!invocation) {
      console.error("Usage: commandry resolve [--manifest <path>] [--json] -- <command> [args...]");
      return 1;
    }

    const manifestPath = resolveManifestPath(args.flags.manifest);
    const registry = await openRegistry(manifestPath);
    if (!registry) return 1;

    logger.setContext({ commandName: invocation.command, manifestPath });
    const result = createResolver(registry).resolve(invocation);

    if (!result.ok) {
      logger.debug("Resolution failed", { code: result.error.code });
      if (asJson) {
        console.log(JSON.stringify({ error: { code: result.error.code, message: result.error.message } }, null, 2));
      } else {
        console.error(formatError(result.error));
      }
      return 1;
    }

    if (asJson) {
      console.log(JSON.stringify(toInvocationJson(result.context), null, 2));
    } else {
      console.log(`Resolved "${result.context.command}":`);
      for (const line of formatContextLines(result.context)) {
        console.log(line);
      }
    }
    return 0;
  }
}
