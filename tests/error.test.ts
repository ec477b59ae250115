import { describe, expect, it } from 'vitest';
import { Diagnostic } from 'codespan-napi';
import { ErrorType, SystemError } from '../src/error.ts';
import { unreachable } from '../src/utils.ts';

describe('errors', () => {
  it('invariant violations are fatal', () => {
    const error = SystemError.invariantViolation('runFree', 'Done');

    expect(error.type).toBe(ErrorType.INVARIANT_VIOLATION);
    expect(error.isFatal()).toBe(true);
    expect(error.message).toBe(
      'runFree reached a program shape that stepping eliminates'
    );
    expect(error.data).toEqual({ driver: 'runFree', shape: 'Done' });
  });

  it('keeps the notes for the diagnostic', () => {
    const error = SystemError.incompleteTranslator('Console', ['printLine']);

    expect(error.message).toBe(
      'Translator for Console is missing cases: "printLine"'
    );
    expect(error.toObject().notes).toEqual([
      'A translator must handle every Console operation, so no effect is skipped',
    ]);
    expect(error.diagnostic()).toBeInstanceOf(Diagnostic);
  });

  it('untranslatable effects are fatal', () => {
    const error = SystemError.untranslatableEffect('Console', { tag: 'Beep' });

    expect(error.isFatal()).toBe(true);
    expect(error.toObject()).toEqual({
      type: 'UNTRANSLATABLE_EFFECT',
      message: 'No Console translation for operation "Beep"',
      data: { vocabulary: 'Console', tag: 'Beep' },
      notes: [],
    });
  });

  it('end of input is not fatal', () => {
    expect(SystemError.endOfInput().isFatal()).toBe(false);
    expect(SystemError.endOfInput().code).toBe('END_OF_INPUT');
  });

  it('unknown errors keep their cause', () => {
    const cause = new Error('inner');
    const error = SystemError.unknown().withCause(cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('UNKNOWN');
    expect(error.isFatal()).toBe(false);
  });

  it('prints through the diagnostic emitter', () => {
    const error = SystemError.endOfInput();
    expect(error.print()).toBe(error);
  });

  it('unreachable throws system errors as is', () => {
    const error = SystemError.unknownDemo('nope', ['echo']);

    expect(() => unreachable(error)).toThrow(error);
    expect(() => unreachable('broken')).toThrow('broken');
    expect(error.toObject()).toEqual({
      type: 'UNKNOWN_DEMO',
      message: 'Unknown demo "nope"',
      data: { name: 'nope' },
      notes: ['Available demos: echo'],
    });
  });
});
