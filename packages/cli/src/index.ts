#!/usr/bin/env node

/**
 * `tiercache` executable: parses argv and turns failures into exit codes.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Parse `argv` and run the selected command, exiting non-zero on failure
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram()
    .parseAsync([...argv])
    .catch(handleError);
}

main().catch(handleError);
