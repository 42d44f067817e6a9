/**
 * Schema parser - turns a command declaration into a frozen CommandSchema.
 *
 * Rules run in a fixed order; the first failure is thrown:
 *   1. BadName  2. DuplicateArgument  3. MissingChoices
 *   4. DefaultTypeMismatch  5. PositionalOrder  6. VariadicPosition
 */

import type {
  ArgumentDeclaration,
  ArgumentSpec,
  ArgumentType,
  CommandDeclaration,
  CommandSchema,
} from "@commandry/sdk";
import { InvalidSchemaError } from "@commandry/sdk";
import { CommandDeclarationSchema, validateInput } from "@commandry/shared";
import { describeType, matchesType } from "./value-types.js";

export const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * Validate the structure of an untrusted declaration, then parse it.
 * Structural problems surface as InvalidSchemaError("MalformedDeclaration").
 */
export function parseCommandDeclaration(input: unknown): CommandSchema {
  const result = validateInput(CommandDeclarationSchema, input);
  if (!result.success) {
    throw new InvalidSchemaError("MalformedDeclaration", declaredName(input), result.error);
  }
  return parseCommandSchema(result.data);
}

export function parseCommandSchema(declaration: CommandDeclaration): CommandSchema {
  const commandName = declaration.name;

  if (!COMMAND_NAME_PATTERN.test(commandName)) {
    throw new InvalidSchemaError(
      "BadName",
      commandName,
      `command names must match ${COMMAND_NAME_PATTERN.source}`,
    );
  }

  const seen = new Set<string>();
  for (const arg of declaration.arguments) {
    if (seen.has(arg.name)) {
      throw new InvalidSchemaError("DuplicateArgument", commandName, `argument "${arg.name}" is declared twice`, arg.name);
    }
    seen.add(arg.name);
  }

  const types = declaration.arguments.map((arg) => toArgumentType(commandName, arg));

  declaration.arguments.forEach((arg, i) => {
    if (arg.default !== undefined && !matchesType(types[i], arg.default)) {
      throw new InvalidSchemaError(
        "DefaultTypeMismatch",
        commandName,
        `default ${JSON.stringify(arg.default)} of "${arg.name}" does not match ${describeType(types[i])}`,
        arg.name,
      );
    }
  });

  const specs = declaration.arguments.map((arg, i) => toArgumentSpec(arg, types[i]));
  checkPositionalOrder(commandName, specs);
  checkVariadic(commandName, specs);

  return Object.freeze({
    name: commandName,
    description: declaration.description ?? "",
    arguments: Object.freeze(specs),
    agentRefs: new Set(declaration.agents ?? []),
  });
}

function toArgumentType(commandName: string, arg: ArgumentDeclaration): ArgumentType {
  if (arg.type !== "choice") {
    const scalar: ArgumentType = { name: arg.type };
    return Object.freeze(scalar);
  }
  // Duplicates collapse; declared order is kept for messages and usage lines.
  const options = [...new Set(arg.choices ?? [])];
  if (options.length === 0) {
    throw new InvalidSchemaError(
      "MissingChoices",
      commandName,
      `choice argument "${arg.name}" declares no choices`,
      arg.name,
    );
  }
  return Object.freeze({ name: "choice", options: Object.freeze(options) });
}

function toArgumentSpec(arg: ArgumentDeclaration, type: ArgumentType): ArgumentSpec {
  const spec: ArgumentSpec = {
    name: arg.name,
    kind: arg.kind ?? "option",
    required: arg.required ?? false,
    type,
    description: arg.description ?? "",
    variadic: arg.variadic ?? false,
    ...(arg.default !== undefined ? { default: arg.default } : {}),
  };
  return Object.freeze(spec);
}

function checkPositionalOrder(commandName: string, specs: readonly ArgumentSpec[]): void {
  let firstOptional: ArgumentSpec | undefined;
  for (const spec of specs) {
    if (spec.kind !== "positional") continue;
    if (!spec.required) {
      firstOptional ??= spec;
    } else if (firstOptional) {
      throw new InvalidSchemaError(
        "PositionalOrder",
        commandName,
        `required positional "${spec.name}" follows optional positional "${firstOptional.name}"`,
        spec.name,
      );
    }
  }
}

function checkVariadic(commandName: string, specs: readonly ArgumentSpec[]): void {
  const positionals = specs.filter((spec) => spec.kind === "positional");
  let variadicCount = 0;

  for (const spec of specs) {
    if (!spec.variadic) continue;
    if (spec.kind !== "positional") {
      throw new InvalidSchemaError(
        "VariadicPosition",
        commandName,
        `option "${spec.name}" cannot be variadic`,
        spec.name,
      );
    }
    variadicCount++;
    if (variadicCount > 1) {
      throw new InvalidSchemaError(
        "VariadicPosition",
        commandName,
        `only one positional may be variadic; "${spec.name}" is the second`,
        spec.name,
      );
    }
    if (positionals[positionals.length - 1] !== spec) {
      throw new InvalidSchemaError(
        "VariadicPosition",
        commandName,
        `variadic positional "${spec.name}" must be the last positional`,
        spec.name,
      );
    }
  }
}

function declaredName(input: unknown): string {
  if (typeof input === "object" && input !== null && "name" in input && typeof input.name === "string") {
    return input.name;
  }
  return "<unnamed>";
}
