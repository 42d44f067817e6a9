/**
 * Presentation of resolution results and load-time errors.
 */

import type { CommandryError, InvocationContext, RawOptionValue, ResolvedValue } from "@commandry/sdk";
import { isSet } from "@commandry/sdk";

export interface InvocationJson {
  command: string;
  values: Record<string, ResolvedValue>;
  unset: string[];
  rawOptions: Record<string, RawOptionValue>;
}

/** JSON-safe view of a context: UNSET values move to `unset`. */
export function toInvocationJson(context: InvocationContext): InvocationJson {
  const values: Array<[string, ResolvedValue]> = [];
  const unset: string[] = [];
  for (const [name, value] of Object.entries(context.values)) {
    if (isSet(value)) {
      values.push([name, value]);
    } else {
      unset.push(name);
    }
  }
  return {
    command: context.command,
    values: Object.fromEntries(values),
    unset,
    rawOptions: Object.fromEntries(Object.entries(context.rawOptions)),
  };
}

/** `name = value` lines, one per declared argument. */
export function formatContextLines(context: InvocationContext): string[] {
  return Object.entries(context.values).map(([name, value]) => {
    if (!isSet(value)) return `  ${name} = (unset)`;
    return `  ${name} = ${JSON.stringify(value)}`;
  });
}

export function formatError(error: CommandryError): string {
  return `${error.code}: ${error.message}`;
}
