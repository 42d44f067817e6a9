/**
 * Error hierarchy for schema loading and invocation resolution.
 */

import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class CommandryError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeValue,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CommandryError";
  }
}

// --- Load-time ---

export type InvalidSchemaKind =
  | "MalformedDeclaration"
  | "BadName"
  | "DuplicateArgument"
  | "MissingChoices"
  | "DefaultTypeMismatch"
  | "PositionalOrder"
  | "VariadicPosition";

export class InvalidSchemaError extends CommandryError {
  constructor(
    public readonly kind: InvalidSchemaKind,
    public readonly commandName: string,
    message: string,
    public readonly argumentName?: string,
  ) {
    super(`Invalid schema for command "${commandName}" (${kind}): ${message}`, ErrorCode.INVALID_SCHEMA);
    this.name = "InvalidSchemaError";
  }
}

export class DuplicateCommandError extends CommandryError {
  constructor(public readonly commandName: string) {
    super(`Command "${commandName}" is already registered`, ErrorCode.DUPLICATE_COMMAND);
    this.name = "DuplicateCommandError";
  }
}

export class DanglingAgentReferenceError extends CommandryError {
  constructor(
    public readonly commandName: string,
    public readonly agentName: string,
  ) {
    super(`Command "${commandName}" references unknown agent "${agentName}"`, ErrorCode.DANGLING_AGENT_REFERENCE);
    this.name = "DanglingAgentReferenceError";
  }
}

/**
 * Error thrown when a manifest file cannot be read or does not match its schema.
 */
export class ManifestError extends CommandryError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: Error },
  ) {
    super(`Manifest "${path}": ${message}`, ErrorCode.MANIFEST_ERROR, options);
    this.name = "ManifestError";
  }
}

// --- Invocation-time ---

/**
 * Base for every error the resolver returns instead of throwing.
 */
export class InvocationError extends CommandryError {
  constructor(
    public readonly commandName: string,
    message: string,
    code: ErrorCodeValue,
  ) {
    super(message, code);
    this.name = "InvocationError";
  }
}

export class UnknownCommandError extends InvocationError {
  constructor(commandName: string) {
    super(commandName, `Unknown command "${commandName}"`, ErrorCode.UNKNOWN_COMMAND);
    this.name = "UnknownCommandError";
  }
}

export class MissingArgumentError extends InvocationError {
  constructor(
    commandName: string,
    public readonly argumentName: string,
  ) {
    super(commandName, `Command "${commandName}" requires argument "${argumentName}"`, ErrorCode.MISSING_ARGUMENT);
    this.name = "MissingArgumentError";
  }
}

export class UnknownOptionError extends InvocationError {
  constructor(
    commandName: string,
    public readonly optionName: string,
  ) {
    super(commandName, `Command "${commandName}" has no option "--${optionName}"`, ErrorCode.UNKNOWN_OPTION);
    this.name = "UnknownOptionError";
  }
}

export class UnexpectedArgumentError extends InvocationError {
  constructor(
    commandName: string,
    public readonly token: string,
    public readonly position: number,
  ) {
    super(
      commandName,
      `Command "${commandName}" got unexpected argument "${token}" at position ${position}`,
      ErrorCode.UNEXPECTED_ARGUMENT,
    );
    this.name = "UnexpectedArgumentError";
  }
}

export class TypeCoercionError extends InvocationError {
  constructor(
    commandName: string,
    public readonly argumentName: string,
    public readonly value: string,
    public readonly expectedType: "boolean" | "integer",
  ) {
    super(
      commandName,
      `Argument "${argumentName}" expects ${expectedType}, got "${value}"`,
      ErrorCode.TYPE_COERCION,
    );
    this.name = "TypeCoercionError";
  }
}

export class InvalidChoiceError extends InvocationError {
  constructor(
    commandName: string,
    public readonly argumentName: string,
    public readonly value: string,
    public readonly allowed: readonly string[],
  ) {
    super(
      commandName,
      `Argument "${argumentName}" must be one of ${allowed.join(", ")}; got "${value}"`,
      ErrorCode.INVALID_CHOICE,
    );
    this.name = "InvalidChoiceError";
  }
}
