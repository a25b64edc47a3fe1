/**
 * Reply Waiter - tracks the one request the interactive chat has in flight.
 *
 * Settles on the request's terminal frame, on a reconnect (the server drops
 * frames for a closed socket, so the reply can only be read from history),
 * on a timeout, or when the client stops.
 */

import type { ServerFrame } from '../../gateway/types.js';

export type ReplyOutcome =
  | { kind: 'reply'; frame: ServerFrame }
  | { kind: 'reconnected'; lastImageId?: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'closed' };

export interface ReplyWaiterOptions {
  timeoutMs: number;
  /** Called with the text of each status frame while waiting */
  onProgress?: (text: string) => void;
}

export class ReplyWaiter {
  private settle: ((outcome: ReplyOutcome) => void) | null = null;
  private timer?: NodeJS.Timeout;
  private readonly timeoutMs: number;
  private readonly onProgress?: (text: string) => void;

  constructor(options: ReplyWaiterOptions) {
    this.timeoutMs = options.timeoutMs;
    this.onProgress = options.onProgress;
  }

  get waiting(): boolean {
    return this.settle !== null;
  }

  wait(): Promise<ReplyOutcome> {
    if (this.settle) {
      return Promise.reject(new Error('A reply is already awaited'));
    }
    return new Promise((resolve) => {
      this.settle = resolve;
      this.timer = setTimeout(() => {
        this.finish({ kind: 'timeout', timeoutMs: this.timeoutMs });
      }, this.timeoutMs);
    });
  }

  /** Returns false when nothing is waiting for the frame */
  deliver(frame: ServerFrame): boolean {
    if (!this.settle) return false;

    if (frame.type === 'status') {
      if (frame.content) this.onProgress?.(frame.content);
      return true;
    }

    return this.finish({ kind: 'reply', frame });
  }

  /** A fresh connection cannot receive the reply of the request sent on the old one */
  reconnected(lastImageId?: string): boolean {
    return this.finish({ kind: 'reconnected', lastImageId });
  }

  closed(): boolean {
    return this.finish({ kind: 'closed' });
  }

  private finish(outcome: ReplyOutcome): boolean {
    const settle = this.settle;
    if (!settle) return false;

    this.settle = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    settle(outcome);
    return true;
  }
}
