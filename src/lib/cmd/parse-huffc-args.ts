
import { z } from 'zod';

import { ArgvOpt } from './parse-argv';

export enum HUFFC_CMD_ENUM {
  HELP = 'HELP',
  ENCODE = 'ENCODE',
}

/*
  a bare boolean flag, or one followed by 'true' / 'false'
*/
const BoolFlagArgSchema = z.tuple([]).transform(() => [ true ]).or(
  z.tuple([
    z.literal('true').or(z.literal('false')).transform(val => {
      return val === 'true' ? true : false;
    }),
  ]),
);

const EncodeOptsSchema = z.tuple([
  z.literal('-f').or(z.literal('--file')).transform(() => 'file' as const),
  z.tuple([
    z.string().min(1),
  ]),
]).or(
  z.tuple([
    z.literal('-t').or(z.literal('--table')).transform(() => 'table' as const),
    BoolFlagArgSchema,
  ])
).or(
  z.tuple([
    z.literal('-s').or(z.literal('--stats')).transform(() => 'stats' as const),
    BoolFlagArgSchema,
  ])
);

export type EncodeOpts = {
  file?: string;
  table?: boolean;
  stats?: boolean;
};

export function getCmdKind(cmdStr: string): HUFFC_CMD_ENUM {
  switch(cmdStr) {
    case 'encode':
    case 'e':
      return HUFFC_CMD_ENUM.ENCODE;
    case 'help':
    case 'h':
      return HUFFC_CMD_ENUM.HELP;
    default:
      throw new Error(`Invalid command: ${cmdStr}`);
  }
}

export function getEncodeOpts(opts: ArgvOpt[]): EncodeOpts {
  let encodeOpts: EncodeOpts;
  encodeOpts = {};
  for(let i = 0; i < opts.length; ++i) {
    let encodeOpt = EncodeOptsSchema.parse(opts[i]);
    /* aliases of the same option, e.g. -f and --file */
    if(encodeOpts[encodeOpt[0]] !== undefined) {
      throw new Error(`Invalid encode option: '${opts[i][0]}', ${encodeOpt[0]} already set`);
    }
    switch(encodeOpt[0]) {
      case 'file':
        encodeOpts.file = encodeOpt[1][0];
        break;
      case 'table':
        encodeOpts.table = encodeOpt[1][0];
        break;
      case 'stats':
        encodeOpts.stats = encodeOpt[1][0];
        break;
    }
  }
  return encodeOpts;
}

/*
  The text to encode, or undefined when the input comes from --file
*/
export function getEncodeArgs(args: string[], encodeOpts: EncodeOpts): string | undefined {
  if(encodeOpts.file !== undefined) {
    if(args.length !== 0) {
      throw new Error(`Invalid encode command: expected no text argument with --file, received: ${args.length}`);
    }
    return undefined;
  }
  if(args.length !== 1) {
    throw new Error(`Invalid encode command: expected one argument, received: ${args.length}`);
  }
  return args[0];
}
