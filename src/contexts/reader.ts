import type { ExecutionContext } from '../kind.js';
import { bind, done, run, type Computation } from '../trampoline.js';

/** Computation that reads one fixed input string, chained in constant stack. */
export type ConsoleReader<A> = (input: string) => Computation<A>;

declare module '../kind.js' {
  interface Kinds<A> {
    ConsoleReader: ConsoleReader<A>;
  }
}

export const readerContext: ExecutionContext<'ConsoleReader'> = {
  URI: 'ConsoleReader',
  lift: (a) => () => done(a),
  sequence: (fa, f) => (input) => bind(fa(input), (a) => f(a)(input)),
};

export const runReader = <A>(reader: ConsoleReader<A>, input: string): A =>
  run(reader(input));
