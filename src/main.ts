#!/usr/bin/env node

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install();

import { formatCliError, huffcMain } from './lib/huffc';
import { logger } from './lib/logger';
import { HUFFC_PROC_NAME } from './constants';

(async () => {
  try {
    await main();
  } catch(e) {
    console.error(formatCliError(e));
    logger.error(e);
    process.exitCode = 1;
  }
})();

async function main() {
  setProcName();

  process.on('unhandledRejection', (reason) => {
    console.error(formatCliError(reason));
    logger.error('unhandledRejection:');
    logger.error(reason);
    process.exitCode = 1;
  });

  process.on('uncaughtException', (err, origin) => {
    console.error(formatCliError(err));
    logger.error(`uncaughtException (${origin}):`);
    logger.error(err);
    process.exitCode = 1;
  });

  await huffcMain(process.argv);
}

function setProcName() {
  process.title = HUFFC_PROC_NAME;
}
