#!/usr/bin/env node

/**
 * tactica command-line entry point
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './version.js';

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    const program = createProgram();
    await program.parseAsync(argv);
  } catch (error) {
    handleError(error);
  }
}

main().catch(handleError);
