
import path from 'path';

import pino, { Logger, LoggerOptions } from 'pino';

import { config } from '../config';
import { LOG_DIR_PATH } from '../constants';
import { mkdirIfNotExist } from './util/files';

const APP_LOG_FILE_NAME = 'app.log';
const APP_LOG_FILE_PATH = [
  LOG_DIR_PATH,
  APP_LOG_FILE_NAME,
].join(path.sep);

const APP_ERROR_LOG_FILE_NAME = 'app.error.log';
const APP_ERROR_LOG_FILE_PATH = [
  LOG_DIR_PATH,
  APP_ERROR_LOG_FILE_NAME,
].join(path.sep);

export const logger = initLogger();

/*
  see: https://github.com/fastify/fastify/blob/ac462b2b4d859e88d029019869a9cb4b8626e6fd/lib/logger.js
*/
function initLogger(): Logger {
  let opts: LoggerOptions;
  mkdirIfNotExist(LOG_DIR_PATH);
  let streams = [
    {
      stream: pino.destination(APP_LOG_FILE_PATH),
      level: 'trace' as const,
    },
    {
      stream: pino.destination(APP_ERROR_LOG_FILE_PATH),
      level: 'error' as const,
    },
  ];
  let stream = pino.multistream(streams);
  opts = {
    level: config.LOG_LEVEL,
  };
  return pino(opts, stream);
}
