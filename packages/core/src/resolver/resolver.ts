/**
 * Resolver - binds a raw invocation to its CommandSchema.
 *
 * Order of checks (first failure wins):
 *   1. unknown command
 *   2. positional binding (missing required, surplus tokens)
 *   3. option binding (missing required)
 *   4. coercion, in declaration order
 *   5. unknown flags
 *
 * Invocation errors come back as `{ ok: false }` results. The context is
 * built only after every argument has bound and coerced.
 */

import type {
  ArgumentSpec,
  CommandSchema,
  InvocationContext,
  RawInvocation,
  RawOptionValue,
  ResolvedValue,
  ScalarValue,
  Unset,
} from "@commandry/sdk";
import {
  InvocationError,
  MissingArgumentError,
  UNSET,
  UnexpectedArgumentError,
  UnknownOptionError,
} from "@commandry/sdk";
import type { RegistrySnapshot } from "../infrastructure/command-registry.js";
import type { RegistryHolder } from "../infrastructure/registry-holder.js";
import { coerceValue } from "./coerce.js";

export type ResolveResult =
  | { ok: true; context: InvocationContext }
  | { ok: false; error: InvocationError };

export interface Resolver {
  resolve(invocation: RawInvocation): ResolveResult;
}

/** What an argument bound to before coercion. */
type Binding =
  | { source: "tokens"; tokens: readonly string[] }
  | { source: "default"; value: ScalarValue }
  | { source: "unset" };

export function createResolver(source: RegistrySnapshot | RegistryHolder): Resolver {
  const currentRegistry = (): RegistrySnapshot => ("current" in source ? source.current() : source);

  return {
    resolve(invocation: RawInvocation): ResolveResult {
      try {
        const schema = currentRegistry().lookup(invocation.command);
        return { ok: true, context: bindInvocation(schema, invocation) };
      } catch (err) {
        if (err instanceof InvocationError) {
          return { ok: false, error: err };
        }
        throw err;
      }
    },
  };
}

function bindInvocation(schema: CommandSchema, invocation: RawInvocation): InvocationContext {
  const options = schema.arguments.filter((spec) => spec.kind === "option");
  const positionals = schema.arguments.filter((spec) => spec.kind === "positional");

  const bindings = new Map<string, Binding>();

  let cursor = 0;
  for (const spec of positionals) {
    const remaining = invocation.positionals.slice(cursor);
    if (remaining.length === 0) {
      bindings.set(spec.name, fallback(schema.name, spec));
      continue;
    }
    const tokens = spec.variadic ? remaining : remaining.slice(0, 1);
    cursor += tokens.length;
    bindings.set(spec.name, { source: "tokens", tokens });
  }
  if (cursor < invocation.positionals.length) {
    throw new UnexpectedArgumentError(schema.name, invocation.positionals[cursor], cursor);
  }

  for (const spec of options) {
    const raw = lastValue(ownOption(invocation.options, spec.name));
    bindings.set(spec.name, raw === undefined ? fallback(schema.name, spec) : { source: "tokens", tokens: [raw] });
  }

  // fromEntries defines own properties, so "__proto__" stays a key
  const values: Record<string, ResolvedValue | Unset> = Object.fromEntries(
    schema.arguments.map((spec): [string, ResolvedValue | Unset] => [
      spec.name,
      toValue(schema.name, spec, bindings.get(spec.name) ?? { source: "unset" }),
    ]),
  );

  const optionNames = new Set(options.map((spec) => spec.name));
  for (const flag of Object.keys(invocation.options)) {
    if (!optionNames.has(flag)) {
      throw new UnknownOptionError(schema.name, flag);
    }
  }

  return Object.freeze({
    command: schema.name,
    values: Object.freeze(values),
    rawOptions: copyOptions(invocation.options),
  });
}

function fallback(commandName: string, spec: ArgumentSpec): Binding {
  if (spec.default !== undefined) return { source: "default", value: spec.default };
  if (spec.required) throw new MissingArgumentError(commandName, spec.name);
  return { source: "unset" };
}

function toValue(commandName: string, spec: ArgumentSpec, binding: Binding): ResolvedValue | Unset {
  switch (binding.source) {
    case "unset":
      return UNSET;
    case "default":
      return spec.variadic ? Object.freeze([binding.value]) : binding.value;
    case "tokens": {
      const coerced = binding.tokens.map((token) => coerceValue(commandName, spec, token));
      return spec.variadic ? Object.freeze(coerced) : coerced[0];
    }
  }
}

/** Inherited members such as "constructor" are not flags. */
function ownOption(options: Readonly<Record<string, RawOptionValue>>, name: string): RawOptionValue | undefined {
  return Object.hasOwn(options, name) ? options[name] : undefined;
}

/** Repeated flags: last value wins. */
function lastValue(raw: RawOptionValue | undefined): string | undefined {
  if (raw === undefined || typeof raw === "string") return raw;
  return raw.at(-1);
}

function copyOptions(options: Readonly<Record<string, RawOptionValue>>): Readonly<Record<string, RawOptionValue>> {
  const copy: Record<string, RawOptionValue> = Object.fromEntries(
    Object.entries(options).map(([name, value]): [string, RawOptionValue] => [
      name,
      typeof value === "string" ? value : Object.freeze([...value]),
    ]),
  );
  return Object.freeze(copy);
}
