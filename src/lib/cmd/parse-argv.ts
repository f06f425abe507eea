
export type ArgvOpt = [ string, string[] ];

export type ParsedArgv = {
  cmd: string;
  args: string[];
  opts: ArgvOpt[];
};

type ArgvToken = {
  kind: ArgvTokenEnum;
  val: string;
};

enum ArgvTokenEnum {
  CMD = 'CMD',
  FLAG = 'FLAG',
  ARG = 'ARG',
  /* '--', everything after it is positional */
  SEP = 'SEP',
}

/*
  argv[0] and argv[1] are the node binary and the script
*/
export function parseArgv(argv: string[]): ParsedArgv {
  let cmd: string | undefined;
  let cmdArgs: string[];
  let opts: ArgvOpt[];
  let currOpt: ArgvOpt | undefined;

  cmdArgs = [];
  opts = [];

  for(let token of getArgvTokens(argv.slice(2))) {
    switch(token.kind) {
      case ArgvTokenEnum.CMD:
        cmd = token.val;
        break;
      case ArgvTokenEnum.FLAG:
        if(opts.some(opt => opt[0] === token.val)) {
          throw new Error(`Unexpected Token: Attempt to set flag '${token.val}', but flag already set.`);
        }
        currOpt = [ token.val, [] ];
        opts.push(currOpt);
        break;
      case ArgvTokenEnum.SEP:
        currOpt = undefined;
        break;
      case ArgvTokenEnum.ARG:
        if(currOpt === undefined) {
          cmdArgs.push(token.val);
        } else {
          currOpt[1].push(token.val);
        }
        break;
    }
  }

  if(cmd === undefined) {
    throw new Error('cmd is undefined');
  }

  return {
    cmd,
    args: cmdArgs,
    opts,
  };
}

function *getArgvTokens(argv: string[]): Generator<ArgvToken> {
  let sepFound: boolean;
  sepFound = false;
  for(let pos = 0; pos < argv.length; ++pos) {
    let currArg = argv[pos];
    if(pos === 0) {
      if(!isCmdStr(currArg)) {
        throw new Error(`Parse Error: invalid cmd: '${currArg}'`);
      }
      yield {
        kind: ArgvTokenEnum.CMD,
        val: currArg,
      };
    } else if(!sepFound && (currArg === '--')) {
      sepFound = true;
      yield {
        kind: ArgvTokenEnum.SEP,
        val: currArg,
      };
    } else if(!sepFound && isFlagArg(currArg)) {
      yield {
        kind: ArgvTokenEnum.FLAG,
        val: currArg,
      };
    } else {
      yield {
        kind: ArgvTokenEnum.ARG,
        val: currArg,
      };
    }
  }
}

function isFlagArg(argStr: string): boolean {
  return /^-{1,2}[a-zA-Z][a-zA-Z-]*$/.test(argStr);
}

function isCmdStr(cmdStr: string): boolean {
  return /^[a-z0-9]+(-[a-z0-9]+)*$/.test(cmdStr);
}
