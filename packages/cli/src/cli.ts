#!/usr/bin/env node
import { createProgram } from './program.js';
import { createDefaultRegistry } from './registry.js';

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  process.exit(1);
});

const program = createProgram({
  registry: createDefaultRegistry(),
  env: process.env,
  write: (line) => console.log(line),
  writeError: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
