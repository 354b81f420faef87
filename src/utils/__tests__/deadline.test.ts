import { describe, it, expect } from 'vitest';
import { DeadlineExceededError, withDeadline } from '../deadline.js';

describe('withDeadline', () => {
  it('should settle with the result of a call that finishes in time', async () => {
    await expect(withDeadline(1000, undefined, async () => 'done')).resolves.toBe('done');
  });

  it('should reject a call that ignores its signal once the deadline passes', async () => {
    let seen: AbortSignal | undefined;
    const pending = withDeadline(20, undefined, signal => {
      seen = signal;
      return new Promise<string>(() => {});
    });

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(pending).rejects.toThrow('Timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('should reject with the caller reason when the caller aborts first', async () => {
    const controller = new AbortController();
    const pending = withDeadline(1000, controller.signal, () => new Promise<string>(() => {}));

    controller.abort(new Error('caller gave up'));

    await expect(pending).rejects.toThrow('caller gave up');
  });

  it('should pass through a synchronous throw as a rejection', async () => {
    await expect(
      withDeadline(1000, undefined, () => {
        throw new Error('bad call');
      }),
    ).rejects.toThrow('bad call');
  });
});
