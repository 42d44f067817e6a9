/**
 * RegistryHolder - points at the live RegistrySnapshot.
 *
 * Reloading builds and validates a new snapshot elsewhere, then swaps the
 * reference here. Snapshots are never mutated, so a resolution that already
 * read `current()` finishes against a consistent registry.
 */

import { createLogger } from "@commandry/shared";
import type { RegistrySnapshot } from "./command-registry.js";

const logger = createLogger("RegistryHolder");

export interface RegistryHolder {
  current(): RegistrySnapshot;
  /** Swap in a validated snapshot; returns the one it replaced. */
  replace(next: RegistrySnapshot): RegistrySnapshot;
}

export function createRegistryHolder(initial: RegistrySnapshot): RegistryHolder {
  let snapshot = initial;

  return {
    current: () => snapshot,
    replace(next: RegistrySnapshot): RegistrySnapshot {
      const previous = snapshot;
      snapshot = next;
      logger.debug(`Registry replaced: ${previous.size} -> ${next.size} command(s)`);
      return previous;
    },
  };
}
