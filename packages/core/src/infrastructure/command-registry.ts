/**
 * CommandRegistry - indexes command schemas and checks their agent references.
 *
 * The registry is a builder. `finalizeAndValidate` is the only way to obtain a
 * RegistrySnapshot, which is what the resolver reads from; a registry whose
 * references do not resolve never produces one.
 */

import type { CommandSchema } from "@commandry/sdk";
import {
  DanglingAgentReferenceError,
  DuplicateCommandError,
  UnknownCommandError,
} from "@commandry/sdk";
import { createLogger } from "@commandry/shared";

const logger = createLogger("CommandRegistry");

/** Read-only view shared by every resolution after load. */
export interface RegistrySnapshot {
  readonly size: number;
  readonly knownAgents: ReadonlySet<string>;
  get(name: string): CommandSchema | undefined;
  has(name: string): boolean;
  /** Throws UnknownCommandError when absent. */
  lookup(name: string): CommandSchema;
  list(): readonly CommandSchema[];
}

export type FinalizeResult =
  | { ok: true; registry: RegistrySnapshot }
  | { ok: false; errors: DanglingAgentReferenceError[] };

export interface CommandRegistry {
  register(schema: CommandSchema): void;
  get(name: string): CommandSchema | undefined;
  has(name: string): boolean;
  lookup(name: string): CommandSchema;
  list(): CommandSchema[];
  finalizeAndValidate(knownAgents: Iterable<string>): FinalizeResult;
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, CommandSchema>();

  function lookup(name: string): CommandSchema {
    const schema = commands.get(name);
    if (!schema) throw new UnknownCommandError(name);
    return schema;
  }

  return {
    register(schema: CommandSchema): void {
      if (commands.has(schema.name)) {
        throw new DuplicateCommandError(schema.name);
      }
      logger.debug(`Registering command: ${schema.name}`, {
        arguments: schema.arguments.length,
        agents: schema.agentRefs.size,
      });
      commands.set(schema.name, schema);
    },

    get: (name) => commands.get(name),
    has: (name) => commands.has(name),
    lookup,
    list: () => [...commands.values()],

    finalizeAndValidate(knownAgents: Iterable<string>): FinalizeResult {
      const agents = new Set(knownAgents);
      const errors: DanglingAgentReferenceError[] = [];

      for (const schema of commands.values()) {
        for (const agentName of schema.agentRefs) {
          if (!agents.has(agentName)) {
            errors.push(new DanglingAgentReferenceError(schema.name, agentName));
          }
        }
      }

      if (errors.length > 0) {
        errors.sort(
          (a, b) => compare(a.commandName, b.commandName) || compare(a.agentName, b.agentName),
        );
        logger.debug(`Validation failed with ${errors.length} dangling agent reference(s)`);
        return { ok: false, errors };
      }

      logger.debug(`Validated ${commands.size} command(s) against ${agents.size} agent(s)`);
      return { ok: true, registry: createSnapshot(new Map(commands), agents) };
    },
  };
}

function createSnapshot(
  commands: ReadonlyMap<string, CommandSchema>,
  knownAgents: ReadonlySet<string>,
): RegistrySnapshot {
  const listed = Object.freeze([...commands.values()]);

  return Object.freeze({
    size: commands.size,
    knownAgents,
    get: (name: string) => commands.get(name),
    has: (name: string) => commands.has(name),
    lookup(name: string): CommandSchema {
      const schema = commands.get(name);
      if (!schema) throw new UnknownCommandError(name);
      return schema;
    },
    list: () => listed,
  });
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
