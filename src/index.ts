#!/usr/bin/env node

/**
 * bucketc - Main entry point
 *
 * Oclif-based command-line interface for the bucket descriptor compiler.
 *
 */

import { execute } from "@oclif/core";

/**
 * CLI application entry point
 *
 * Initializes the Oclif CLI framework and executes the requested command.
 */
async function run(): Promise<void> {
  await execute({ dir: import.meta.url });
}

/**
 * Execute the CLI, routing anything that escapes Oclif's own error
 * handling through its handler for a clean exit
 */
try {
  await run();
} catch (error: unknown) {
  const { handle } = await import("@oclif/core/handle");
  await handle(error instanceof Error ? error : new Error(String(error)));
}
