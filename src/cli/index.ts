/**
 * CLI Entry Point
 *
 * Usage:
 * ```bash
 * npm run cli -- migrate
 * npm run cli -- learner create "Ada Lovelace" ada@example.com
 * npm run cli -- due lr_...
 * npm run cli -- review lr_... fc_... 4
 * npm run cli -- proficiency lr_...
 * ```
 *
 * Reads DATABASE_PATH (and the rest of the environment) through loadConfig.
 * Domain errors are printed without a stack trace; set DEBUG to see one.
 */

import { loadConfig } from '../config';
import { createCliContext } from './context';
import { createProgram } from './program';
import { dim, red } from './utils/terminal';

async function main(): Promise<void> {
  const ctx = createCliContext(loadConfig(process.env));
  try {
    await createProgram(ctx).parseAsync(process.argv);
  } finally {
    ctx.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(red(`Error: ${message}`));

  if (process.env.DEBUG && error instanceof Error && error.stack) {
    console.error(dim(error.stack));
  }

  process.exit(1);
});
