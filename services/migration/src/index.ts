#!/usr/bin/env node
import { createInterface } from './program';

async function main(): Promise<void> {
  await createInterface().parseAsync(process.argv);
}

main().catch((err) => {
  const reason = err instanceof Error ? err.message : String(err);
  console.error(`loadgrid: ${reason}`);
  process.exitCode = 1;
});
