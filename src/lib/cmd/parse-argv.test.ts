
import { describe, it, expect, beforeEach } from 'vitest';
import { ArgvOpt, ParsedArgv, parseArgv } from './parse-argv';

describe('parse-argv tests', () => {
  let argvMock: string[];

  beforeEach(() => {
    argvMock = [
      'node',
      'main.js',
    ];
  });

  it('tests parseArgv() parses command', () => {
    let parsedArgv: ParsedArgv;
    let cmd: string;
    cmd = 'encode';
    argvMock = [
      ...argvMock,
      cmd,
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.cmd).toBe(cmd);
    expect(parsedArgv.args).toEqual([]);
    expect(parsedArgv.opts).toEqual([]);
  });

  it('tests parseArgv() parses a single char command', () => {
    let parsedArgv: ParsedArgv;
    argvMock = [
      ...argvMock,
      'e',
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.cmd).toBe('e');
  });

  it('tests parseArgv() parses command with arg', () => {
    let parsedArgv: ParsedArgv;
    let cmdArg: string;
    cmdArg = 'hello world';
    argvMock = [
      ...argvMock,
      'encode', cmdArg,
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.args).toEqual([ cmdArg ]);
  });

  it('tests parseArgv() parses a boolean flag', () => {
    let parsedArgv: ParsedArgv;
    argvMock = [
      ...argvMock,
      'encode',
      '-t',
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.opts).toEqual([
      [ '-t', []],
    ]);
  });

  it('tests parseArgv() parses a long flag that has an arg', () => {
    let parsedArgv: ParsedArgv;
    argvMock = [
      ...argvMock,
      'encode',
      '--file', './in.txt',
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.args).toEqual([]);
    expect(parsedArgv.opts).toEqual([
      [ '--file', [ './in.txt' ]],
    ]);
  });

  it('tests parseArgv() with multiple command args and flag args', () => {
    let parsedArgv: ParsedArgv;
    let cmdArgs: string[];
    let flags: ArgvOpt[];
    cmdArgs = [
      './file1', './file2',
    ];
    flags = [
      [ '-a', [ '1', '2' ]],
      [ '-b', []],
      [ '--cc', [ '3' ]],
      [ '-d', []]
    ];
    argvMock = [
      ...argvMock,
      'test', ...cmdArgs,
    ];
    for(let i = 0; i < flags.length; ++i) {
      let flagTuple = flags[i];
      argvMock.push(flagTuple[0]);
      for(let k = 0; k < flagTuple[1].length; ++k) {
        argvMock.push(flagTuple[1][k]);
      }
    }
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.cmd).toBe('test');
    expect(parsedArgv.args).toEqual(cmdArgs);
    expect(parsedArgv.opts).toEqual(flags);
  });

  it('tests parseArgv() treats everything after -- as positional', () => {
    let parsedArgv: ParsedArgv;
    argvMock = [
      ...argvMock,
      'encode',
      '-t',
      '--',
      '-abc',
      '--stats',
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.opts).toEqual([
      [ '-t', []],
    ]);
    expect(parsedArgv.args).toEqual([ '-abc', '--stats' ]);
  });

  it('tests parseArgv() keeps negative numbers and empty strings as args', () => {
    let parsedArgv: ParsedArgv;
    argvMock = [
      ...argvMock,
      'encode',
      '-1',
      '',
    ];
    parsedArgv = parseArgv(argvMock);
    expect(parsedArgv.args).toEqual([ '-1', '' ]);
  });

  // #region !!! ERROR PATHS !!!!
  it('tests parseArgv() throws when no args', () => {
    expect(() => parseArgv(argvMock)).toThrowError('cmd is undefined');
  });

  it('tests parseArgv() throws when command string is invalid', () => {
    argvMock = [
      ...argvMock,
      '-test',
    ];
    expect(() => parseArgv(argvMock)).toThrowError('Parse Error: invalid cmd: \'-test\'');
  });

  it('tests parseArgv() throws on a repeated flag', () => {
    argvMock = [
      ...argvMock,
      'encode',
      '-t',
      '-t',
    ];
    expect(() => parseArgv(argvMock)).toThrowError('Unexpected Token: Attempt to set flag \'-t\', but flag already set.');
  });
  // #endregion
});
