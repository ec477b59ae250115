import { describe, expect, it } from 'vitest';
import { runReader } from '../src/contexts/reader.ts';
import {
  runConsoleReader,
  simulateConsole,
} from '../src/console/interpreters.ts';
import {
  converter,
  converterPrompt,
  demos,
  echo,
  factorial,
  factorialREPL,
  fahrenheitToCelsius,
  helpText,
  readTwice,
} from '../src/demos.ts';

describe('converter', () => {
  it('fahrenheit to celsius', () => {
    expect(fahrenheitToCelsius(32)).toBe(0);
    expect(fahrenheitToCelsius(212)).toBe(100);
    expect(fahrenheitToCelsius(-40)).toBe(-40);
  });

  it('converts the temperature it reads', () => {
    const { buffers } = simulateConsole(converter, ['212']);
    expect(buffers.output).toEqual([converterPrompt, '100']);
  });

  it('complains about input that is not a number', () => {
    const { buffers } = simulateConsole(converter, ['warm']);
    expect(buffers.output).toEqual([converterPrompt, 'Not a temperature: "warm"']);
  });

  it('complains about missing input', () => {
    const { buffers } = simulateConsole(converter, []);
    expect(buffers.output).toEqual([converterPrompt, 'Not a temperature: ""']);
  });
});

describe('echo', () => {
  it('prints what it reads', () => {
    expect(simulateConsole(echo, ['hello']).buffers.output).toEqual(['hello']);
  });

  it('prints nothing at end of input', () => {
    expect(simulateConsole(echo, []).buffers.output).toEqual([]);
  });
});

describe('factorial', () => {
  it('computes factorials', () => {
    expect(simulateConsole(factorial(0)).result).toBe(1);
    expect(simulateConsole(factorial(5)).result).toBe(120);
    expect(simulateConsole(factorial(10)).result).toBe(3_628_800);
  });

  it('the REPL answers until q', () => {
    const { buffers } = simulateConsole(factorialREPL, ['5', 'x', 'q', '3']);

    expect(buffers.output).toEqual([
      helpText,
      'factorial of 5 is equal to 120',
      'Not a number: "x"',
    ]);
    expect(buffers.input).toEqual(['3']);
  });

  it('the REPL stops at end of input', () => {
    const { buffers } = simulateConsole(factorialREPL, ['3']);

    expect(buffers.output).toEqual([helpText, 'factorial of 3 is equal to 6']);
  });

  it('the REPL quits on q under the reader interpreter', () => {
    expect(runReader(runConsoleReader(factorialREPL), 'q')).toBeUndefined();
  });
});

describe('demos', () => {
  it('reads twice', () => {
    expect(runReader(runConsoleReader(readTwice), 'x')).toEqual(['x', 'x']);
    expect(simulateConsole(readTwice, ['a']).result).toEqual(['a', undefined]);
  });

  it('are registered by name', () => {
    expect(Object.keys(demos)).toEqual(['converter', 'echo', 'factorial', 'twice']);
  });
});
