import readline, { type Interface } from 'node:readline';
import { readSync } from 'node:fs';
import { stdin as input } from 'node:process';
import { SystemError } from '../error.js';

const NEWLINE = 0x0a;

/**
 * Blocks until a full line arrives on stdin.
 * Throws at end of input, or when stdin can't be read synchronously.
 */
export const readStdinLineSync = (): string => {
  const bytes: number[] = [];
  const buffer = Buffer.alloc(1);

  while (true) {
    const read = readSync(input.fd, buffer, 0, 1, null);
    if (read === 0) {
      if (bytes.length === 0) throw SystemError.endOfInput();
      break;
    }
    if (buffer[0] === NEWLINE) break;
    bytes.push(buffer[0]);
  }

  return Buffer.from(bytes).toString('utf8').replace(/\r$/, '');
};

let rl: Interface | null = null;
let lines: AsyncIterator<string> | null = null;

export const readStdinLine = async (): Promise<string> => {
  if (!rl) rl = readline.createInterface({ input, terminal: false });
  if (!lines) lines = rl[Symbol.asyncIterator]();

  const next = await lines.next();
  if (next.done) throw SystemError.endOfInput();
  return next.value;
};

export const closeStdin = () => {
  rl?.close();
  rl = null;
  lines = null;
};

export const writeStdoutLine = (line: string) => {
  console.log(line);
};
