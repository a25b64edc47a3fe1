import { ReplyWaiter } from '../../../src/cli/lib/reply-waiter.js';
import type { ServerFrame } from '../../../src/gateway/types.js';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

function status(content: string): ServerFrame {
  return { type: 'status', content, timestamp: TIMESTAMP };
}

describe('ReplyWaiter', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('status frames report progress and the terminal frame settles', async () => {
    const progress: string[] = [];
    const waiter = new ReplyWaiter({ timeoutMs: 1000, onProgress: (text) => progress.push(text) });
    const reply: ServerFrame = { type: 'message', content: 'Try a warmer palette.', timestamp: TIMESTAMP };

    const pending = waiter.wait();
    expect(waiter.deliver(status('Thinking...'))).toBe(true);
    expect(waiter.deliver(reply)).toBe(true);

    await expect(pending).resolves.toEqual({ kind: 'reply', frame: reply });
    expect(progress).toEqual(['Thinking...']);
    expect(waiter.waiting).toBe(false);
  });

  test('frames are not claimed when nothing is waiting', () => {
    const waiter = new ReplyWaiter({ timeoutMs: 1000 });

    expect(waiter.deliver(status('Thinking...'))).toBe(false);
    expect(waiter.reconnected('img-1')).toBe(false);
  });

  test('a reconnect settles the wait with the latest image id', async () => {
    const waiter = new ReplyWaiter({ timeoutMs: 1000 });

    const pending = waiter.wait();
    expect(waiter.reconnected('img-7')).toBe(true);

    await expect(pending).resolves.toEqual({ kind: 'reconnected', lastImageId: 'img-7' });
    expect(waiter.waiting).toBe(false);
  });

  test('gives up after the timeout', async () => {
    const waiter = new ReplyWaiter({ timeoutMs: 1000 });

    const pending = waiter.wait();
    jest.advanceTimersByTime(999);
    expect(waiter.waiting).toBe(true);
    jest.advanceTimersByTime(1);

    await expect(pending).resolves.toEqual({ kind: 'timeout', timeoutMs: 1000 });
    expect(waiter.waiting).toBe(false);
  });

  test('a settled wait clears its timer', async () => {
    const waiter = new ReplyWaiter({ timeoutMs: 1000 });

    const pending = waiter.wait();
    waiter.closed();

    await expect(pending).resolves.toEqual({ kind: 'closed' });
    expect(jest.getTimerCount()).toBe(0);
  });

  test('only one reply can be awaited at a time', async () => {
    const waiter = new ReplyWaiter({ timeoutMs: 1000 });

    const first = waiter.wait();
    await expect(waiter.wait()).rejects.toThrow('A reply is already awaited');

    waiter.closed();
    await expect(first).resolves.toEqual({ kind: 'closed' });
  });
});
