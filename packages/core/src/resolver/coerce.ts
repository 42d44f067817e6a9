/**
 * Raw token → typed value coercion.
 */

import type { ArgumentSpec, ScalarValue } from "@commandry/sdk";
import { InvalidChoiceError, TypeCoercionError } from "@commandry/sdk";

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function coerceValue(commandName: string, spec: ArgumentSpec, raw: string): ScalarValue {
  const type = spec.type;
  switch (type.name) {
    case "string":
      return raw;

    case "boolean": {
      const lowered = raw.toLowerCase();
      if (lowered === "true") return true;
      if (lowered === "false") return false;
      throw new TypeCoercionError(commandName, spec.name, raw, "boolean");
    }

    case "integer": {
      const parsed = INTEGER_PATTERN.test(raw) ? Number(raw) : Number.NaN;
      if (!Number.isSafeInteger(parsed)) {
        throw new TypeCoercionError(commandName, spec.name, raw, "integer");
      }
      // "-0" reads as 0
      return parsed === 0 ? 0 : parsed;
    }

    case "choice":
      // Exact match; "iOS" is not "ios".
      if (type.options.includes(raw)) return raw;
      throw new InvalidChoiceError(commandName, spec.name, raw, type.options);
  }
}
