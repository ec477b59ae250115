import { bind, done, map } from './free.js';
import { doWhile, fold, forEach } from './combinators.js';
import { ref, type IO } from './io.js';
import { printLn, readLn, type ConsoleIO } from './console/vocabulary.js';
import { range } from './utils.js';

export const fahrenheitToCelsius = (f: number): number => ((f - 32) * 5) / 9;

export const converterPrompt = 'Enter a temperature in degrees Fahrenheit: ';

const parseNumber = (line: string): number | undefined => {
  const trimmed = line.trim();
  if (trimmed === '') return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

export const converter: ConsoleIO<void> = bind(printLn(converterPrompt), () =>
  bind(readLn(), (line): ConsoleIO<void> => {
    const fahrenheit = line === undefined ? undefined : parseNumber(line);
    if (fahrenheit === undefined) {
      return printLn(`Not a temperature: ${JSON.stringify(line ?? '')}`);
    }
    return printLn(String(fahrenheitToCelsius(fahrenheit)));
  })
);

export const echo: ConsoleIO<void> = bind(
  readLn(),
  (line): ConsoleIO<void> => (line === undefined ? done(undefined) : printLn(line))
);

export const factorial = (n: number): ConsoleIO<number> =>
  fold(range(1, n), 1, (acc, i): ConsoleIO<number> => done(acc * i));

/** Factorial accumulated in a mutable cell. */
export const factorialIO = (n: number): IO<number> =>
  bind(ref(1), (acc) =>
    bind(
      forEach(range(1, n), (i) => acc.modify((x) => x * i)),
      () => acc.get()
    )
  );

export const helpText = [
  'The Amazing Factorial REPL, v2.0',
  'q - quit',
  '<number> - compute the factorial of the given number',
  '<anything else> - complain and ask again',
].join('\n');

const factorialLine = (line: string): ConsoleIO<void> => {
  if (!/^\d+$/.test(line.trim())) {
    return printLn(`Not a number: ${JSON.stringify(line)}`);
  }
  const i = Number.parseInt(line.trim(), 10);
  return bind(factorial(i), (n) =>
    printLn(`factorial of ${i} is equal to ${n}`)
  );
};

/** Reads numbers until `q` or the end of input. */
export const factorialREPL: ConsoleIO<void> = bind(printLn(helpText), () =>
  doWhile(readLn(), (line): ConsoleIO<boolean> => {
    if (line === undefined || line === 'q') return done(false);
    return map(factorialLine(line), () => true);
  })
);

/** Reads two lines and reports both. */
export const readTwice: ConsoleIO<[string | undefined, string | undefined]> =
  bind(readLn(), (first) =>
    map(readLn(), (second): [string | undefined, string | undefined] => [
      first,
      second,
    ])
  );

export const demos = {
  converter,
  echo,
  factorial: factorialREPL,
  twice: readTwice,
} satisfies Record<string, ConsoleIO<unknown>>;

export type DemoName = keyof typeof demos;
