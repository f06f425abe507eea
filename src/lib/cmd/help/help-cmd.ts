
import { OutStream } from '../encode/encode-cmd';

const HELP_LINES = [
  'usage: huffc <command> [args] [flags]',
  '',
  'commands:',
  '  encode, e <text>      print the huffman bit-string of <text> (utf-8 bytes)',
  '  help, h               print this message',
  '',
  'encode flags:',
  '  -f, --file <path>     read the input bytes from <path> instead of <text>',
  '  -t, --table           print the code table to stderr',
  '  -s, --stats           print run statistics to stderr',
  '  --                    treat everything after it as positional',
  '',
  'flags take the arguments that follow them, so put <text> before any flag.',
];

export async function helpCmdMain(outStream: OutStream) {
  outStream.write(`${HELP_LINES.join('\n')}\n`);
}
