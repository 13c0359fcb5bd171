#!/usr/bin/env node
// src/cli.ts

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { runSelfTest } from './self-test.js';
import TranslatorServer from './translator-server.js';
import { toPrintable } from './utils/utils.js';

function selfTest(): number {
  const report = runSelfTest();
  console.log('Testing RT21 command formatting:');
  console.log('-'.repeat(30));
  for (const result of report.results) {
    const status = result.passed ? '✓' : '✗';
    const actual = toPrintable(result.actual);
    const expected = toPrintable(result.expected);
    console.log(`${status} ${result.input} -> ${actual} (expected: ${expected})`);
  }
  return report.passed ? 0 : 1;
}

async function start(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  if (!process.stdout.isTTY) logger.disableColors();

  const server = new TranslatorServer(config);
  if (config.probeOnStart) await server.probeDevice();
  await server.listen();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, stopping translator`);
    server
      .close({ terminateSessions: true })
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

const command = process.argv[2];
if (command === 'self-test') {
  process.exitCode = selfTest();
} else {
  start().catch((err: unknown) => {
    logger.error(`Failed to start translator: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
