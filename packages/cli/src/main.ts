#!/usr/bin/env node

import { run } from './index';
import { setColorsEnabled } from './format';

if (!process.stdout.isTTY || process.env['NO_COLOR'] !== undefined) {
  setColorsEnabled(false);
}

run(process.argv.slice(2)).then(
  (result) => {
    if (result.stdout) process.stdout.write(result.stdout + '\n');
    if (result.stderr) process.stderr.write(result.stderr + '\n');
    process.exitCode = result.exitCode;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
