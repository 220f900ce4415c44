#!/usr/bin/env -S node --import tsx
import { run } from './cli';

async function main() {
  process.exitCode = await run(process.argv, { cwd: process.cwd(), env: process.env });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
