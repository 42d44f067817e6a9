/**
 * CLI argument parsing.
 *
 * Two layers:
 *   - parseArgs: the runner's own argv (subcommand, --manifest, --json, ...)
 *   - parseInvocation: the tokens after "--", turned into a RawInvocation
 *     for the resolver
 */

import type { RawInvocation, RawOptionValue } from "@commandry/sdk";
import type { ParsedArgs } from "../commands/base.js";

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --manifest ./commandry.json
 *   - Boolean flag: --verbose
 *   - Short flag: -v (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments
 *   - Passthrough: everything after a bare "--" lands in `rest`
 *
 * Examples:
 *   parseArgs(["validate", "--manifest", "./m.json"]) → { command: "validate", flags: { manifest: "./m.json" }, positional: [], rest: [] }
 *   parseArgs(["resolve", "--", "build", "--platform", "ios"]) → { command: "resolve", flags: {}, positional: [], rest: ["build", "--platform", "ios"] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let rest: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      rest = argv.slice(i + 1);
      break;
    }

    // Long flag with value: --manifest ./commandry.json
    const next = argv[i + 1];
    if (arg.startsWith("--") && next !== undefined && !next.startsWith("-")) {
      flags[arg.slice(2)] = next;
      i++; // Skip next
      continue;
    }

    // Boolean flag: --verbose
    if (arg.startsWith("--")) {
      flags[arg.slice(2)] = true;
      continue;
    }

    // Short flag: -v
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    // First non-flag = command
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Remaining non-flags = positional
    if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { command, flags, positional, rest };
}

/**
 * Tokenize an invocation of a declared command.
 *
 * Unlike parseArgs, every flag value stays a string and repeats are kept:
 *   - --platform ios     → { platform: "ios" }
 *   - --platform=ios     → { platform: "ios" }
 *   - --coverage         → { coverage: "true" } (bare flag, or followed by another flag)
 *   - --tag a --tag b    → { tag: ["a", "b"] }
 *   - a lone "--" ends flag parsing; later tokens are positionals
 *
 * Returns undefined when there is no command token.
 */
export function parseInvocation(tokens: string[]): RawInvocation | undefined {
  const [command, ...args] = tokens;
  if (command === undefined || command.startsWith("-")) return undefined;

  const positionals: string[] = [];
  // A Map, so "--constructor" or "--__proto__" are ordinary flag names
  const options = new Map<string, RawOptionValue>();
  let flagsDone = false;

  const record = (name: string, value: string): void => {
    const existing = options.get(name);
    if (existing === undefined) {
      options.set(name, value);
    } else {
      options.set(name, typeof existing === "string" ? [existing, value] : [...existing, value]);
    }
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (flagsDone || !arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    if (arg === "--") {
      flagsDone = true;
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq >= 0) {
      record(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      record(body, next);
      i++;
    } else {
      record(body, "true");
    }
  }

  return { command, positionals, options: Object.fromEntries(options) };
}
