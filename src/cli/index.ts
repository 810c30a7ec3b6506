#!/usr/bin/env node
import { createProgram } from './program.js';

const SIGINT_EXIT_CODE = 130;

async function main(): Promise<void> {
  process.once('SIGINT', () => {
    console.error('Interrupted');
    process.exit(SIGINT_EXIT_CODE);
  });

  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
