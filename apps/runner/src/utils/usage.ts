/**
 * One-line usage strings for command schemas.
 *
 *   build --platform <ios|android>
 *   create <name> [template] [--org <string>] [--offline]
 *   lint <level> [files...]
 */

import type { ArgumentSpec, CommandSchema } from "@commandry/sdk";
import { describeType } from "@commandry/core";

export function formatUsage(schema: CommandSchema): string {
  const positionals = schema.arguments.filter((spec) => spec.kind === "positional").map(formatPositional);
  const options = schema.arguments.filter((spec) => spec.kind === "option").map(formatOption);
  return [schema.name, ...positionals, ...options].join(" ");
}

function formatPositional(spec: ArgumentSpec): string {
  const label = spec.variadic ? `${spec.name}...` : spec.name;
  return spec.required ? `<${label}>` : `[${label}]`;
}

function formatOption(spec: ArgumentSpec): string {
  const flag = spec.type.name === "boolean" ? `--${spec.name}` : `--${spec.name} <${describeType(spec.type)}>`;
  return spec.required ? flag : `[${flag}]`;
}
