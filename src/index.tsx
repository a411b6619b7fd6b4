#!/usr/bin/env node

import React from 'react';
import { render } from 'ink';
import { App } from './app.js';
import { runCli } from './cli.js';
import { resolveConfig } from './core/config.js';
import { formatUnknownError } from './core/errors.js';
import { createRunLogger } from './core/logger.js';

async function main(argv: string[]): Promise<number> {
  if (argv.length > 0) return runCli(argv);

  const config = await resolveConfig();
  const { logger } = createRunLogger({ dataDir: config.dataDir });
  if (process.stdout.isTTY) {
    process.stdout.write('\x1B[2J\x1B[H');
  }
  const { waitUntilExit } = render(<App config={config} logger={logger} />);
  await waitUntilExit();
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`indystats: ${formatUnknownError(err)}`);
    process.exitCode = 1;
  },
);
