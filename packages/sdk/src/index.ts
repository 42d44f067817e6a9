// Types
export type {
  ArgumentKind,
  ArgumentTypeName,
  ArgumentType,
  ScalarValue,
  ArgumentSpec,
  CommandSchema,
  ArgumentDeclaration,
  CommandDeclaration,
} from "./types/schema.js";

export type {
  Unset,
  ResolvedValue,
  RawOptionValue,
  RawInvocation,
  InvocationContext,
} from "./types/invocation.js";

export { UNSET, isSet } from "./types/invocation.js";

// Errors
export {
  CommandryError,
  InvalidSchemaError,
  DuplicateCommandError,
  DanglingAgentReferenceError,
  ManifestError,
  InvocationError,
  UnknownCommandError,
  MissingArgumentError,
  UnknownOptionError,
  UnexpectedArgumentError,
  TypeCoercionError,
  InvalidChoiceError,
} from "./errors/base.js";
export type { InvalidSchemaKind } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
