#!/usr/bin/env node
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { CommanderError } from 'commander';
import { rootCauseMessage } from '../error/unwrapErrorType.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { createProgram } from './program.js';

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question(`${question} [y/N]: `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

const program = createProgram({ stdout: process.stdout, stderr: process.stderr, confirm });

const [err] = await safeWrapAsync(() => program.parseAsync(process.argv));
if (err instanceof CommanderError) {
  process.exitCode = err.exitCode;
} else if (err) {
  process.stderr.write(`Unexpected error: ${rootCauseMessage(err)}\n`);
  process.exitCode = 1;
}
