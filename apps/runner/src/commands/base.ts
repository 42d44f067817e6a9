/**
 * Base command interface for all CLI subcommands.
 */

export interface ParsedArgs {
  /** Command name (e.g., "resolve") */
  command: string;

  /** Named flags (e.g., { manifest: "./commandry.json", json: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments (e.g., ["arg1", "arg2"]) */
  positional: string[];

  /** Tokens after a bare "--", passed through untouched */
  rest: string[];
}

export interface CliCommand {
  /** Command name (e.g., "validate", "resolve", "version") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Execute the command with parsed arguments */
  execute(args: ParsedArgs): Promise<number>; // Exit code: 0 = success, 1+ = error
}
