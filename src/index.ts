#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { Logger } from './utils/logger.js';

/**
 * submeta-dl - download submeta.io courses with yt-dlp
 */

export async function main(args: string[]): Promise<void> {
  await run(cli, args);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  const logger = new Logger();

  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });

  main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}
