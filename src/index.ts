#!/usr/bin/env node
import { run } from './cli';
import { describeError } from './errors';

async function main() {
  await run(process.argv.slice(2));
}

main().catch(err => {
  console.error(`Error: ${describeError(err)}`);
  process.exitCode = 1;
});
