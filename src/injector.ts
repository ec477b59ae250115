import { FileMap } from 'codespan-napi';
import {
  readStdinLine,
  readStdinLineSync,
  writeStdoutLine,
} from './std/io.js';

enum Injectable {
  FileMap = 'FileMap',
  LineReader = 'LineReader',
  AsyncLineReader = 'AsyncLineReader',
  LineWriter = 'LineWriter',
}

/** Read primitives throw when no line can be read. */
type InjectableType = {
  [Injectable.FileMap]: FileMap;
  [Injectable.LineReader]: () => string;
  [Injectable.AsyncLineReader]: () => Promise<string>;
  [Injectable.LineWriter]: (line: string) => void;
};

// Register default injectables
const registry: InjectableType = {
  [Injectable.FileMap]: new FileMap(),
  [Injectable.LineReader]: readStdinLineSync,
  [Injectable.AsyncLineReader]: readStdinLine,
  [Injectable.LineWriter]: writeStdoutLine,
};

const register = <const T extends Injectable>(
  name: T,
  value: InjectableType[T]
) => {
  registry[name] = value;
};

const inject = <const T extends Injectable>(name: T): InjectableType[T] => {
  return registry[name];
};

export { register, inject, Injectable };
