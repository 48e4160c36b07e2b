#!/usr/bin/env tsx
import { CommanderError } from 'commander';
import { createProgram } from './cli.js';
import { formatUpdateError } from './format-update-error.js';
import { runUpdate } from './run-update.js';

const program = createProgram(async (siteUrl, options) => {
  const result = await runUpdate(siteUrl, options);
  console.log(
    `${options.output}: ${result.pages} pages (${result.added} new, ${result.changed} changed, ` +
      `${result.unchanged} unchanged, ${result.removed} removed)`,
  );
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  console.error(formatUpdateError(error));
  process.exitCode = 1;
});
