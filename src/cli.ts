#!/usr/bin/env node
import { env } from './env.js';
import { createProgram } from './cli/program.js';
import { getLogger } from './shared/logger.js';
import { ConfigurationError, errorMessage, isOperationalError } from './shared/errors.js';

const log = getLogger('cli');

const program = createProgram({
  env,
  out: (line) => process.stdout.write(`${line}\n`),
  progress: (line) => process.stderr.write(`${line}\n`),
});

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (isOperationalError(error)) {
    process.stderr.write(`${error.message}\n`);
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) {
        process.stderr.write(`  - ${issue}\n`);
      }
    }
    process.exitCode = 2;
  } else {
    log.fatal({ err: error }, `Command failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
