import { describe, expect, it } from 'vitest';
import * as Par from '../src/par.ts';

describe('parallel executor', () => {
  it('unit resolves to its value', async () => {
    await expect(Par.run(Par.unit(3))).resolves.toBe(3);
  });

  it('delay runs on the calling turn once started', async () => {
    const log: string[] = [];
    const work = Par.delay(() => log.push('work'));

    expect(log).toEqual([]);
    const running = Par.run(work);
    log.push('after');
    await running;

    expect(log).toEqual(['work', 'after']);
  });

  it('fork runs on a later turn', async () => {
    const log: string[] = [];
    const running = Par.run(Par.fork(Par.delay(() => log.push('forked'))));
    log.push('caller');
    await running;

    expect(log).toEqual(['caller', 'forked']);
  });

  it('flatMap and map sequence work', async () => {
    const work = Par.map(
      Par.flatMap(Par.unit(20), (x) => Par.lazyUnit(() => x * 2)),
      (x) => x + 2
    );
    await expect(Par.run(work)).resolves.toBe(42);
  });

  it('map2 combines two pieces of work', async () => {
    const work = Par.map2(Par.lazyUnit(() => 'a'), Par.unit('b'), (a, b) => a + b);
    await expect(Par.run(work)).resolves.toBe('ab');
  });

  it('fromCallback completes when called back', async () => {
    const work = Par.fromCallback<string>((callback) =>
      setTimeout(() => callback('called back'), 0)
    );
    await expect(Par.run(work)).resolves.toBe('called back');
  });

  it('parContext continues on a later turn', async () => {
    const log: Array<string | number> = [];
    const work = Par.parContext.sequence(Par.unit(1), (x) =>
      Par.delay(() => log.push(x))
    );

    const running = Par.run(work);
    log.push('caller');
    await running;

    expect(log).toEqual(['caller', 1]);
  });

  it('a failure rejects', async () => {
    const work = Par.lazyUnit(() => {
      throw new Error('failed work');
    });
    await expect(Par.run(work)).rejects.toThrow('failed work');
  });
});
