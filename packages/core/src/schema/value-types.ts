import type { ArgumentType, ScalarValue } from "@commandry/sdk";

/** Whether an already-typed value (a declared default) satisfies an argument type. */
export function matchesType(type: ArgumentType, value: ScalarValue): boolean {
  switch (type.name) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "integer":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "choice":
      return typeof value === "string" && type.options.includes(value);
  }
}

/** Short label for usage lines and messages, e.g. "<ios|android>". */
export function describeType(type: ArgumentType): string {
  return type.name === "choice" ? type.options.join("|") : type.name;
}
