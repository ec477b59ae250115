import { runFree, runTrampoline, translate } from '../free.js';
import { inject, Injectable } from '../injector.js';
import { done } from '../trampoline.js';
import * as Par from '../par.js';
import { thunkContext, type Thunk } from '../contexts/thunk.js';
import {
  buffers,
  runState,
  stateContext,
  type Buffers,
  type ConsoleState,
} from '../contexts/state.js';
import {
  readerContext,
  runReader,
  type ConsoleReader,
} from '../contexts/reader.js';
import { consoleTranslator, type ConsoleIO } from './vocabulary.js';

/** A failed read is an absent line, never an exception. */
const attemptRead = (read: () => string): string | undefined => {
  try {
    return read();
  } catch {
    return undefined;
  }
};

export const consoleToThunk = consoleTranslator<'Thunk'>({
  readLine: (result) => () =>
    result(attemptRead(inject(Injectable.LineReader))),
  printLine: (line, result) => () => {
    inject(Injectable.LineWriter)(line);
    return result(undefined);
  },
});

export const consoleToPar = consoleTranslator<'Par'>({
  readLine: (result) =>
    Par.fork(() =>
      inject(Injectable.AsyncLineReader)().then(result, () =>
        result(undefined)
      )
    ),
  printLine: (line, result) =>
    Par.lazyUnit(() => {
      inject(Injectable.LineWriter)(line);
      return result(undefined);
    }),
});

export const consoleToState = consoleTranslator<'ConsoleState'>({
  readLine: (result) => (current) => {
    if (current.input.length === 0) {
      return done([result(undefined), current] as const);
    }
    const [line, ...rest] = current.input;
    return done([result(line), { ...current, input: rest }] as const);
  },
  printLine: (line, result) => (current) =>
    done([
      result(undefined),
      { ...current, output: [...current.output, line] },
    ] as const),
});

export const consoleToReader = consoleTranslator<'ConsoleReader'>({
  readLine: (result) => (input) => done(result(input)),
  printLine: (_line, result) => () => done(result(undefined)),
});

/**
 * Nests one thunk per effect, so the stack grows with the program and long
 * programs overflow it. Use `runConsole` for those.
 */
export const runConsoleFunction0 = <A>(program: ConsoleIO<A>): Thunk<A> =>
  runFree(program, consoleToThunk, thunkContext);

export const runConsolePar = <A>(program: ConsoleIO<A>): Par.Par<A> =>
  runFree(program, consoleToPar, Par.parContext);

export const runConsoleState = <A>(program: ConsoleIO<A>): ConsoleState<A> =>
  runFree(program, consoleToState, stateContext);

export const runConsoleReader = <A>(program: ConsoleIO<A>): ConsoleReader<A> =>
  runFree(program, consoleToReader, readerContext);

/** Runs against the real console in constant stack, however long the program. */
export const runConsole = <A>(program: ConsoleIO<A>): A =>
  runTrampoline(translate(program, consoleToThunk));

export type Simulation<A> = { result: A; buffers: Buffers };

export const simulateConsole = <A>(
  program: ConsoleIO<A>,
  input: readonly string[] = []
): Simulation<A> => {
  const [result, final] = runState(runConsoleState(program), buffers(input));
  return { result, buffers: final };
};
