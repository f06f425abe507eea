
import chalk from 'chalk';

import { logger } from '../../logger';
import { BitStr, CodeTable } from '../../models/encode/code-table';
import { RunStats, createSession, encode, resetOrDestroy } from '../../service/huff-session';
import { readFileBytes } from '../../util/files';
import { ParsedArgv } from '../parse-argv';
import { EncodeOpts, getEncodeArgs, getEncodeOpts } from '../parse-huffc-args';

export type OutStream = {
  write: (chunk: string) => unknown;
};

export type EncodeCmdOpts = {
  outStream: OutStream;
  errStream: OutStream;
  readFileFn?: (filePath: string) => Uint8Array;
  colors?: chalk.Chalk;
};

/*
  huffman encoding
*/
export async function encodeMain(parsedArgv: ParsedArgv, cmdOpts: EncodeCmdOpts) {
  let opts: EncodeOpts;
  let text: string | undefined;
  let inputBytes: Uint8Array;
  let readFileFn: (filePath: string) => Uint8Array;
  let colors: chalk.Chalk;

  opts = getEncodeOpts(parsedArgv.opts);
  text = getEncodeArgs(parsedArgv.args, opts);
  readFileFn = cmdOpts.readFileFn ?? readFileBytes;
  colors = cmdOpts.colors ?? chalk.stderr;

  if(opts.file !== undefined) {
    logger.info(`encode file: ${opts.file}`);
    inputBytes = readFileFn(opts.file);
  } else {
    inputBytes = Buffer.from(text ?? '', 'utf8');
  }

  let session = createSession();
  try {
    let bitStr: BitStr;
    bitStr = encode(session, inputBytes);
    cmdOpts.outStream.write(`${bitStr}\n`);
    if(opts.table && (session.codeTable !== undefined)) {
      cmdOpts.errStream.write(formatCodeTable(session.codeTable, colors));
    }
    if(opts.stats && (session.stats !== undefined)) {
      cmdOpts.errStream.write(formatRunStats(session.stats, colors));
    }
    logger.info(`encoded ${inputBytes.length} bytes into ${bitStr.length} bits`);
  } finally {
    resetOrDestroy(session);
  }
}

export function formatCodeTable(codeTable: CodeTable, colors: chalk.Chalk): string {
  let lines: string[];
  lines = codeTable.entries().map(([ byte, code ]) => {
    return `${colors.dim(byte)} ${getByteLabel(byte)} ${colors.green(code)}`;
  });
  return `${lines.join('\n')}\n`;
}

export function formatRunStats(stats: RunStats, colors: chalk.Chalk): string {
  let lines: string[];
  lines = [
    `${colors.dim('input bytes:')} ${stats.inputLength}`,
    `${colors.dim('distinct symbols:')} ${stats.distinctSymbols}`,
    `${colors.dim('tree nodes:')} ${stats.nodeCount}`,
    `${colors.dim('output bits:')} ${stats.outputLength}`,
  ];
  return `${lines.join('\n')}\n`;
}

/*
  printable ascii as a quoted char, everything else as hex
*/
function getByteLabel(byte: number): string {
  if((byte > 0x20) && (byte < 0x7f)) {
    return `'${String.fromCharCode(byte)}'`;
  }
  return `0x${byte.toString(16).padStart(2, '0')}`;
}
