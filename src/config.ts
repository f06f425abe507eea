
import dotenv from 'dotenv';
import { z } from 'zod';

import { isPositiveInt, isString } from './lib/util/validate-primitives';

dotenv.config();

const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const ENVIRONMENT = getEnvironment();

const config = {
  ENVIRONMENT,
  LOG_LEVEL: getLogLevel(ENVIRONMENT),
  HUFF_MAX_ALLOC_BYTES: getMaxAllocBytes(),
} as const;

export {
  config,
};

function getEnvVar(envKey: string): string | undefined {
  let rawEnvVar: string | undefined;
  rawEnvVar = process.env[envKey];
  if(
    !isString(rawEnvVar)
    || (rawEnvVar.trim().length === 0)
  ) {
    return undefined;
  }
  return rawEnvVar.trim();
}

function getEnvironment(): string {
  return getEnvVar('ENVIRONMENT') ?? 'development';
}

function getLogLevel(environment: string): LogLevel {
  let rawLogLevel: string | undefined;
  rawLogLevel = getEnvVar('LOG_LEVEL');
  if(rawLogLevel === undefined) {
    return (environment === 'development')
      ? 'debug'
      : 'info'
    ;
  }
  return LogLevelSchema.parse(rawLogLevel);
}

function getMaxAllocBytes(): number | undefined {
  let rawMaxBytes: string | undefined;
  rawMaxBytes = getEnvVar('HUFF_MAX_ALLOC_BYTES');
  if(rawMaxBytes === undefined) {
    return undefined;
  }
  if(!isPositiveInt(+rawMaxBytes)) {
    throw new Error(`Invalid HUFF_MAX_ALLOC_BYTES: ${rawMaxBytes}`);
  }
  return +rawMaxBytes;
}
