#!/usr/bin/env node
import { Option, program } from 'commander';
import { SystemError } from './error.js';
import * as Par from './par.js';
import { runReader } from './contexts/reader.js';
import { closeStdin } from './std/io.js';
import { demos, type DemoName } from './demos.js';
import type { ConsoleIO } from './console/vocabulary.js';
import {
  runConsole,
  runConsoleFunction0,
  runConsolePar,
  runConsoleReader,
  simulateConsole,
} from './console/interpreters.js';

const interpreters = ['trampoline', 'thunk', 'par'] as const;
type InterpreterName = (typeof interpreters)[number];

const isDemoName = (name: string): name is DemoName => Object.hasOwn(demos, name);

const getDemo = (name: string): ConsoleIO<unknown> => {
  if (!isDemoName(name)) {
    throw SystemError.unknownDemo(name, Object.keys(demos));
  }
  return demos[name];
};

const isInterpreterName = (name: string): name is InterpreterName =>
  interpreters.some((interpreter) => interpreter === name);

const parseInterpreter = (name: string): InterpreterName => {
  if (!isInterpreterName(name)) {
    throw SystemError.invalidInterpreter(name, [...interpreters]);
  }
  return name;
};

const interpret = async (
  demo: ConsoleIO<unknown>,
  interpreter: InterpreterName
): Promise<unknown> => {
  switch (interpreter) {
    case 'trampoline':
      return runConsole(demo);
    case 'thunk':
      return runConsoleFunction0(demo)();
    case 'par':
      return await Par.run(runConsolePar(demo));
  }
};

program
  .name('freeio')
  .description('Interpret console programs with interchangeable interpreters');

program
  .command('run <demo>')
  .description('Run a demo against the terminal')
  .addOption(
    new Option('-i, --interpreter <name>', 'interpreter to run the demo with')
      .argParser(parseInterpreter)
      .default('trampoline')
  )
  .action(async (name: string, options: { interpreter: InterpreterName }) => {
    const demo = getDemo(name);
    try {
      const result = await interpret(demo, options.interpreter);
      if (result !== undefined) console.dir(result, { depth: null });
    } finally {
      closeStdin();
    }
  });

program
  .command('simulate <demo> [input...]')
  .description('Run a demo on simulated input and print what it wrote')
  .action((name: string, input: string[]) => {
    const { result, buffers } = simulateConsole(getDemo(name), input);
    for (const line of buffers.output) console.log(line);
    console.dir({ result, unread: buffers.input }, { depth: null });
  });

program
  .command('replay <demo> <input>')
  .description(
    'Run a demo where every read yields <input>. Demos that read until "q" only stop on "q"'
  )
  .action((name: string, input: string) => {
    const result = runReader(runConsoleReader(getDemo(name)), input);
    console.dir(result, { depth: null });
  });

program
  .command('list')
  .description('List available demos')
  .action(() => {
    for (const name of Object.keys(demos)) console.log(name);
  });

try {
  await program.parseAsync();
} catch (error) {
  const systemError =
    error instanceof SystemError
      ? error
      : SystemError.unknown().withCause(error);
  systemError.print();
  if (!(error instanceof SystemError)) console.error(error);
  process.exitCode = 1;
}
