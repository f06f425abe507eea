
import { ZodError } from 'zod';

import { encodeMain } from './cmd/encode/encode-cmd';
import { helpCmdMain } from './cmd/help/help-cmd';
import { ParsedArgv, parseArgv } from './cmd/parse-argv';
import { HUFFC_CMD_ENUM, getCmdKind } from './cmd/parse-huffc-args';
import { HUFFC_PROC_NAME } from '../constants';
import { logger } from './logger';

export async function huffcMain(argv: string[]) {
  let parsedArgv: ParsedArgv;
  let cmdKind: HUFFC_CMD_ENUM;
  parsedArgv = parseArgv(argv);
  cmdKind = getCmdKind(parsedArgv.cmd);
  logger.info(`huffc ${cmdKind}`);
  switch(cmdKind) {
    case HUFFC_CMD_ENUM.ENCODE:
      return await encodeMain(parsedArgv, {
        outStream: process.stdout,
        errStream: process.stderr,
      });
    case HUFFC_CMD_ENUM.HELP:
      return await helpCmdMain(process.stdout);
  }
}

/*
  One line per failure, e.g. 'huffc: EmptyInputError: Cannot encode empty input'
*/
export function formatCliError(err: unknown): string {
  let errName: string;
  let errMsg: string;
  if(err instanceof ZodError) {
    errName = 'InvalidOption';
    errMsg = err.issues.map(issue => {
      return (issue.path.length > 0)
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
      ;
    }).join('; ');
  } else if(err instanceof Error) {
    errName = err.name;
    errMsg = err.message;
  } else {
    errName = 'Error';
    errMsg = `${err}`;
  }
  errMsg = errMsg.split('\n')[0];
  return `${HUFFC_PROC_NAME}: ${errName}: ${errMsg}`;
}
