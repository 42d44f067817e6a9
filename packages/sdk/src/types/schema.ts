/**
 * Command schema types - the declared argument contract of a command.
 */

/** Where an argument's value comes from in an invocation. */
export type ArgumentKind = "positional" | "option";

/** Value type names accepted in declarations. */
export type ArgumentTypeName = "string" | "boolean" | "integer" | "choice";

export type ArgumentType =
  | { readonly name: "string" }
  | { readonly name: "boolean" }
  | { readonly name: "integer" }
  | { readonly name: "choice"; readonly options: readonly string[] };

/** A single typed value after coercion. Integers are numbers, choices are strings. */
export type ScalarValue = string | boolean | number;

export interface ArgumentSpec {
  /** Unique within the command */
  readonly name: string;
  readonly kind: ArgumentKind;
  readonly required: boolean;
  readonly type: ArgumentType;
  /** Already typed; never coerced at resolution time */
  readonly default?: ScalarValue;
  readonly description: string;
  /** Positional only: collects every remaining token into an array */
  readonly variadic: boolean;
}

export interface CommandSchema {
  /** Matches ^[a-z][a-z0-9-]*$ */
  readonly name: string;
  readonly description: string;
  readonly arguments: readonly ArgumentSpec[];
  /** Names of the agents this command references */
  readonly agentRefs: ReadonlySet<string>;
}

/** One argument as written in a declaration, before validation. */
export interface ArgumentDeclaration {
  name: string;
  type: ArgumentTypeName;
  required?: boolean;
  default?: ScalarValue;
  choices?: string[];
  /** Defaults to "option" */
  kind?: ArgumentKind;
  description?: string;
  variadic?: boolean;
}

/** Already-parsed structured form of a command definition. */
export interface CommandDeclaration {
  name: string;
  description?: string;
  arguments: ArgumentDeclaration[];
  agents?: string[];
}
