#!/usr/bin/env node

/**
 * Runner Entry Point.
 */

import { main } from "./cli.js";

// CLI entry point
main(process.argv.slice(2))
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
