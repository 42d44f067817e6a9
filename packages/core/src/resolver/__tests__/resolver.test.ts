import { describe, it, expect } from "vitest";
import type { CommandDeclaration, InvocationContext, InvocationError, RawInvocation } from "@commandry/sdk";
import {
  InvalidChoiceError,
  MissingArgumentError,
  TypeCoercionError,
  UNSET,
  UnexpectedArgumentError,
  UnknownCommandError,
  UnknownOptionError,
} from "@commandry/sdk";
import { parseCommandSchema } from "../../schema/parser.js";
import { createCommandRegistry } from "../../infrastructure/command-registry.js";
import type { RegistrySnapshot } from "../../infrastructure/command-registry.js";
import { createRegistryHolder } from "../../infrastructure/registry-holder.js";
import { createResolver } from "../resolver.js";
import type { Resolver } from "../resolver.js";

const DECLARATIONS: CommandDeclaration[] = [
  {
    name: "build",
    arguments: [{ name: "platform", type: "choice", choices: ["ios", "android"], required: true }],
  },
  {
    name: "test",
    arguments: [{ name: "coverage", type: "boolean", required: false, default: false }],
  },
  {
    name: "create",
    arguments: [
      { name: "name", type: "string", kind: "positional", required: true },
      { name: "template", type: "choice", choices: ["app", "package"], kind: "positional", default: "app" },
      { name: "org", type: "string" },
      { name: "jobs", type: "integer" },
      { name: "offline", type: "boolean" },
    ],
  },
  {
    name: "lint",
    arguments: [
      { name: "level", type: "integer", kind: "positional", required: true },
      { name: "files", type: "string", kind: "positional", variadic: true },
    ],
  },
  {
    name: "deploy",
    arguments: [
      { name: "env", type: "choice", choices: ["dev", "prod"], required: true },
      { name: "replicas", type: "integer", required: true },
    ],
  },
];

function snapshotOf(declarations: CommandDeclaration[]): RegistrySnapshot {
  const registry = createCommandRegistry();
  for (const declaration of declarations) registry.register(parseCommandSchema(declaration));
  const result = registry.finalizeAndValidate([]);
  if (!result.ok) throw new Error("expected a valid registry");
  return result.registry;
}

function invocation(
  command: string,
  positionals: string[] = [],
  options: Record<string, string | string[]> = {},
): RawInvocation {
  return { command, positionals, options };
}

function expectContext(resolver: Resolver, input: RawInvocation): InvocationContext {
  const result = resolver.resolve(input);
  if (!result.ok) throw new Error(`expected success, got ${result.error.message}`);
  return result.context;
}

function expectError(resolver: Resolver, input: RawInvocation): InvocationError {
  const result = resolver.resolve(input);
  if (result.ok) throw new Error("expected an invocation error");
  return result.error;
}

describe("Resolver", () => {
  const resolver = createResolver(snapshotOf(DECLARATIONS));

  describe("choice options", () => {
    it("resolves a valid choice", () => {
      const ctx = expectContext(resolver, invocation("build", [], { platform: "ios" }));
      expect(ctx.command).toBe("build");
      expect(ctx.values.platform).toBe("ios");
    });

    it("rejects a value outside the choices", () => {
      const error = expectError(resolver, invocation("build", [], { platform: "windows" }));
      expect(error).toBeInstanceOf(InvalidChoiceError);
      if (error instanceof InvalidChoiceError) {
        expect(error.value).toBe("windows");
        expect(error.allowed).toEqual(["ios", "android"]);
        expect(error.argumentName).toBe("platform");
      }
    });

    it("matches choices case-sensitively", () => {
      const error = expectError(resolver, invocation("build", [], { platform: "IOS" }));
      expect(error).toBeInstanceOf(InvalidChoiceError);
    });

    it.each(["web", "", " ios", "android ", "Android"])("never coerces %j into a choice", (value) => {
      const result = resolver.resolve(invocation("build", [], { platform: value }));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(InvalidChoiceError);
    });
  });

  describe("boolean options", () => {
    it("applies the default when the flag is absent", () => {
      const ctx = expectContext(resolver, invocation("test"));
      expect(ctx.values.coverage).toBe(false);
    });

    it.each<[string, boolean]>([
      ["true", true],
      ["TRUE", true],
      ["False", false],
    ])("coerces %j", (raw, expected) => {
      const ctx = expectContext(resolver, invocation("test", [], { coverage: raw }));
      expect(ctx.values.coverage).toBe(expected);
    });

    it("rejects other spellings", () => {
      const error = expectError(resolver, invocation("test", [], { coverage: "yes" }));
      expect(error).toBeInstanceOf(TypeCoercionError);
      if (error instanceof TypeCoercionError) {
        expect(error.argumentName).toBe("coverage");
        expect(error.value).toBe("yes");
        expect(error.expectedType).toBe("boolean");
      }
    });
  });

  describe("positionals and optional values", () => {
    it("binds positionals in declaration order", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app", "package"]));
      expect(ctx.values.name).toBe("my_app");
      expect(ctx.values.template).toBe("package");
    });

    it("defaults an omitted optional positional", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app"]));
      expect(ctx.values.template).toBe("app");
    });

    it("marks optional values without defaults as UNSET", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app"]));
      expect(ctx.values.org).toBe(UNSET);
      expect(ctx.values.jobs).toBe(UNSET);
      expect(ctx.values.offline).toBe(UNSET);
      expect(Object.keys(ctx.values)).toEqual(["name", "template", "org", "jobs", "offline"]);
    });

    it("keeps an explicit false distinct from UNSET", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app"], { offline: "false" }));
      expect(ctx.values.offline).toBe(false);
    });

    it("keeps an empty string value", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app"], { org: "" }));
      expect(ctx.values.org).toBe("");
    });

    it("reports the first missing required positional", () => {
      const error = expectError(resolver, invocation("create"));
      expect(error).toBeInstanceOf(MissingArgumentError);
      if (error instanceof MissingArgumentError) expect(error.argumentName).toBe("name");
    });

    it("rejects surplus positional tokens", () => {
      const error = expectError(resolver, invocation("create", ["my_app", "app", "extra"]));
      expect(error).toBeInstanceOf(UnexpectedArgumentError);
      if (error instanceof UnexpectedArgumentError) {
        expect(error.token).toBe("extra");
        expect(error.position).toBe(2);
      }
    });

    it("coerces positionals by type", () => {
      const error = expectError(resolver, invocation("create", ["my_app", "plugin"]));
      expect(error).toBeInstanceOf(InvalidChoiceError);
    });
  });

  describe("integer values", () => {
    it.each<[string, number]>([
      ["4", 4],
      ["+7", 7],
      ["-3", -3],
      ["007", 7],
      ["-0", 0],
    ])("parses %j", (raw, expected) => {
      const ctx = expectContext(resolver, invocation("create", ["x"], { jobs: raw }));
      expect(ctx.values.jobs).toBe(expected);
    });

    it.each(["4.0", "4x", " 4", "", "1e3", "0x10", "99999999999999999999"])("rejects %j", (raw) => {
      const error = expectError(resolver, invocation("create", ["x"], { jobs: raw }));
      expect(error).toBeInstanceOf(TypeCoercionError);
    });
  });

  describe("variadic positionals", () => {
    it("collects the remaining tokens", () => {
      const ctx = expectContext(resolver, invocation("lint", ["2", "a.dart", "b.dart"]));
      expect(ctx.values.level).toBe(2);
      expect(ctx.values.files).toEqual(["a.dart", "b.dart"]);
    });

    it("is UNSET when no tokens remain", () => {
      const ctx = expectContext(resolver, invocation("lint", ["1"]));
      expect(ctx.values.files).toBe(UNSET);
    });

    it("applies a default as a single-element list", () => {
      const local = createResolver(
        snapshotOf([
          {
            name: "fmt",
            arguments: [{ name: "paths", type: "string", kind: "positional", variadic: true, default: "." }],
          },
        ]),
      );
      const ctx = expectContext(local, invocation("fmt"));
      expect(ctx.values.paths).toEqual(["."]);
    });
  });

  describe("required options", () => {
    it("names the exact missing option", () => {
      const error = expectError(resolver, invocation("deploy", [], { env: "dev" }));
      expect(error).toBeInstanceOf(MissingArgumentError);
      if (error instanceof MissingArgumentError) {
        expect(error.argumentName).toBe("replicas");
        expect(error.commandName).toBe("deploy");
      }
    });

    it("reports the first missing option in declaration order", () => {
      const error = expectError(resolver, invocation("deploy"));
      expect(error).toBeInstanceOf(MissingArgumentError);
      if (error instanceof MissingArgumentError) expect(error.argumentName).toBe("env");
    });

    it("reports binding errors before coercion errors", () => {
      const error = expectError(resolver, invocation("deploy", [], { env: "staging" }));
      expect(error).toBeInstanceOf(MissingArgumentError);
    });
  });

  describe("flags", () => {
    it("rejects unknown flags", () => {
      const error = expectError(resolver, invocation("build", [], { platform: "ios", releese: "true" }));
      expect(error).toBeInstanceOf(UnknownOptionError);
      if (error instanceof UnknownOptionError) expect(error.optionName).toBe("releese");
    });

    it("does not accept positional names as flags", () => {
      const error = expectError(resolver, invocation("create", ["x"], { name: "y" }));
      expect(error).toBeInstanceOf(UnknownOptionError);
    });

    it("reports a missing option rather than its misspelled flag", () => {
      const error = expectError(resolver, invocation("build", [], { platfrom: "ios" }));
      expect(error).toBeInstanceOf(MissingArgumentError);
      if (error instanceof MissingArgumentError) expect(error.argumentName).toBe("platform");
    });

    it("checks coercion before unknown flags", () => {
      const error = expectError(resolver, invocation("create", ["x"], { jobs: "many", verbose: "true" }));
      expect(error).toBeInstanceOf(TypeCoercionError);
    });

    it("does not read inherited members as flags", () => {
      const local = createResolver(
        snapshotOf([{ name: "inspect", arguments: [{ name: "constructor", type: "string" }, { name: "toString", type: "boolean", default: false }] }]),
      );
      const ctx = expectContext(local, invocation("inspect"));
      expect(ctx.values.constructor).toBe(UNSET);
      expect(ctx.values.toString).toBe(false);
    });

    it("keeps an argument named __proto__ as a value", () => {
      const local = createResolver(snapshotOf([{ name: "inspect", arguments: [{ name: "__proto__", type: "string" }] }]));
      const ctx = expectContext(local, invocation("inspect", [], Object.fromEntries([["__proto__", "v"]])));
      expect(Object.keys(ctx.values)).toEqual(["__proto__"]);
      expect(Object.getOwnPropertyDescriptor(ctx.values, "__proto__")?.value).toBe("v");
      expect(Object.keys(ctx.rawOptions)).toEqual(["__proto__"]);
    });

    it("takes the last value of a repeated flag", () => {
      const ctx = expectContext(resolver, invocation("build", [], { platform: ["ios", "android"] }));
      expect(ctx.values.platform).toBe("android");
      expect(ctx.rawOptions.platform).toEqual(["ios", "android"]);
    });

    it("treats an empty repetition list as absent", () => {
      const ctx = expectContext(resolver, invocation("test", [], { coverage: [] }));
      expect(ctx.values.coverage).toBe(false);
    });
  });

  describe("context", () => {
    it("copies the raw option map for audit", () => {
      const options: Record<string, string | string[]> = { platform: ["android", "ios"] };
      const ctx = expectContext(resolver, invocation("build", [], options));
      options.platform = "android";
      expect(ctx.rawOptions).toEqual({ platform: ["android", "ios"] });
    });

    it("is frozen", () => {
      const ctx = expectContext(resolver, invocation("create", ["x"]));
      expect(Object.isFrozen(ctx)).toBe(true);
      expect(Object.isFrozen(ctx.values)).toBe(true);
      expect(Object.isFrozen(ctx.rawOptions)).toBe(true);
    });

    it("is structurally equal across repeated resolutions", () => {
      const input = invocation("create", ["my_app"], { jobs: "3", org: "acme" });
      const first = resolver.resolve(input);
      const second = resolver.resolve(input);
      expect(first).toEqual(second);
      expect(first.ok).toBe(true);
    });

    it("produces values whose runtime types match their declarations", () => {
      const ctx = expectContext(resolver, invocation("create", ["my_app", "package"], { org: "acme", jobs: "2", offline: "true" }));
      expect(typeof ctx.values.name).toBe("string");
      expect(typeof ctx.values.template).toBe("string");
      expect(typeof ctx.values.org).toBe("string");
      expect(typeof ctx.values.jobs).toBe("number");
      expect(typeof ctx.values.offline).toBe("boolean");
    });
  });

  describe("unknown commands", () => {
    it("returns UnknownCommandError", () => {
      const error = expectError(resolver, invocation("publish"));
      expect(error).toBeInstanceOf(UnknownCommandError);
      expect(error.commandName).toBe("publish");
    });
  });

  describe("with a RegistryHolder", () => {
    it("reads the snapshot current at each call", () => {
      const holder = createRegistryHolder(snapshotOf([DECLARATIONS[0]]));
      const held = createResolver(holder);

      expect(held.resolve(invocation("test")).ok).toBe(false);
      holder.replace(snapshotOf(DECLARATIONS));
      expect(held.resolve(invocation("test")).ok).toBe(true);
    });
  });
});
