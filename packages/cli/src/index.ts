#!/usr/bin/env -S node --import tsx
import dotenv from 'dotenv';
import { createProgram } from './program.js';

dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[QuizCast]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
