/**
 * Abort Helper Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { attemptSignal, raceAbort } from '../../../src/utils/abort.js';

describe('raceAbort', () => {
  it('resolves with the promise when no signal fires', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve('ok'), controller.signal)).resolves.toBe('ok');
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = new Promise<string>(() => {});
    const raced = raceAbort(pending, controller.signal);
    controller.abort(new Error('session closed'));

    await expect(raced).rejects.toThrow('session closed');
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort('stopped');

    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toThrow('stopped');
  });
});

describe('attemptSignal', () => {
  it('returns undefined without a signal or timeout', () => {
    expect(attemptSignal(undefined, 0)).toBeUndefined();
  });

  it('returns the outer signal when the timeout is disabled', () => {
    const controller = new AbortController();
    expect(attemptSignal(controller.signal, 0)).toBe(controller.signal);
  });

  it('follows the outer signal when combined with a timeout', () => {
    const controller = new AbortController();
    const signal = attemptSignal(controller.signal, 60_000);
    controller.abort(new Error('cancelled'));

    expect(signal?.aborted).toBe(true);
  });
});
