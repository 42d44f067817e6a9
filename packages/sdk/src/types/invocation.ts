import type { ScalarValue } from "./schema.js";

/**
 * Marks an optional argument that was neither provided nor defaulted.
 * Distinct from every falsy value so consumers can tell "not given" from "false".
 */
export const UNSET: unique symbol = Symbol.for("commandry.unset");
export type Unset = typeof UNSET;

export type ResolvedValue = ScalarValue | readonly ScalarValue[];

/** Raw option values; an array records a flag given more than once, in order. */
export type RawOptionValue = string | readonly string[];

/** An already-tokenized invocation. */
export interface RawInvocation {
  command: string;
  positionals: readonly string[];
  options: Readonly<Record<string, RawOptionValue>>;
}

/** The typed, validated result of resolving one invocation. */
export interface InvocationContext {
  readonly command: string;
  /** Every declared argument, either typed or UNSET */
  readonly values: Readonly<Record<string, ResolvedValue | Unset>>;
  /** Copy of the original option map, for audit */
  readonly rawOptions: Readonly<Record<string, RawOptionValue>>;
}

export function isSet<T>(value: T | Unset): value is T {
  return value !== UNSET;
}
