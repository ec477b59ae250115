import type { Kind, Translator, URI } from '../kind.js';
import { effect, type Free } from '../free.js';
import { SystemError } from '../error.js';
import { identity, unreachable } from '../utils.js';

/**
 * Console operations, indexed by the type they produce. `result` converts the
 * operation's own result into `A`; the smart constructors below always use
 * the identity, so `ReadLine` is a `Console<string | undefined>` and a
 * `PrintLine` is a `Console<void>`.
 */
export type Console<A> = ReadLine<A> | PrintLine<A>;

export type ReadLine<A> = {
  readonly tag: 'ReadLine';
  readonly result: (line: string | undefined) => A;
};

export type PrintLine<A> = {
  readonly tag: 'PrintLine';
  readonly line: string;
  readonly result: (unit: void) => A;
};

declare module '../kind.js' {
  interface Kinds<A> {
    Console: Console<A>;
  }
}

export type ConsoleIO<A> = Free<'Console', A>;

export const ReadLine: Console<string | undefined> = {
  tag: 'ReadLine',
  result: identity,
};

export const PrintLine = (line: string): Console<void> => ({
  tag: 'PrintLine',
  line,
  result: identity,
});

export const readLn = (): ConsoleIO<string | undefined> =>
  effect<'Console', string | undefined>(ReadLine);

export const printLn = (line: string): ConsoleIO<void> =>
  effect<'Console', void>(PrintLine(line));

/** One interpretation per Console operation, into the target `G`. */
export type ConsoleCases<G extends URI> = {
  readonly readLine: <A>(result: (line: string | undefined) => A) => Kind<G, A>;
  readonly printLine: <A>(
    line: string,
    result: (unit: void) => A
  ) => Kind<G, A>;
};

const consoleCaseNames = ['readLine', 'printLine'] as const;

export const consoleTranslator = <G extends URI>(
  cases: ConsoleCases<G>
): Translator<'Console', G> => {
  const missing = consoleCaseNames.filter(
    (name) => typeof cases[name] !== 'function'
  );
  if (missing.length > 0) {
    throw SystemError.incompleteTranslator('Console', missing);
  }

  return {
    apply: <A>(op: Console<A>): Kind<G, A> => {
      switch (op.tag) {
        case 'ReadLine':
          return cases.readLine(op.result);
        case 'PrintLine':
          return cases.printLine(op.line, op.result);
        default:
          return unreachable(SystemError.untranslatableEffect('Console', op));
      }
    },
  };
};
