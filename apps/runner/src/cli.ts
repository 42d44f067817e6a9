/**
 * CLI subcommand router.
 *
 * Supports:
 *   - commandry validate [--manifest <path>]
 *   - commandry list [--manifest <path>] [--verbose]
 *   - commandry resolve [--manifest <path>] [--json] -- <command> [args...]
 *   - commandry version [--verbose]
 */

import { parseArgs } from "./utils/args.js";
import type { CliCommand } from "./commands/base.js";
import { ValidateCommand } from "./commands/validate.js";
import { ListCommand } from "./commands/list.js";
import { ResolveCommand } from "./commands/resolve.js";
import { VersionCommand } from "./commands/version.js";

export function createCommands(): CliCommand[] {
  return [new ValidateCommand(), new ListCommand(), new ResolveCommand(), new VersionCommand()];
}

export function printHelp(commands: CliCommand[]): void {
  console.log("Commandry: command schema registry and invocation resolver");
  console.log("");
  console.log("Usage: commandry <command> [options]");
  console.log("");
  console.log("Commands:");
  for (const command of commands) {
    console.log(`  ${command.name.padEnd(10)} ${command.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log("  --manifest <path>  Manifest file (default: $COMMANDRY_MANIFEST or ./commandry.json)");
  console.log("  --json             Print resolution results as JSON");
  console.log("  --verbose          Show detailed output");
  console.log("  --help, -h         Show this help message");
}

export async function main(argv: string[]): Promise<number> {
  const parsed = parseArgs(argv);
  const commands = createCommands();

  if (parsed.flags.help === true || parsed.flags.h === true || parsed.command === "") {
    printHelp(commands);
    return 0;
  }

  const command = commands.find((cmd) => cmd.name === parsed.command);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}
