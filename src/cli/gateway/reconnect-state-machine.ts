/**
 * Reconnect State Machine
 * Client-side connection lifecycle: a fixed delay between attempts, no cap.
 */

export type ReconnectState =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'disconnected_pending_retry'
  | 'retrying'
  | 'stopped';

export const RECONNECT_TRANSITIONS: Record<ReconnectState, ReconnectState[]> = {
  idle: ['connecting', 'stopped'],
  connecting: ['connected', 'disconnected_pending_retry', 'stopped'],
  connected: ['disconnected_pending_retry', 'stopped'],
  disconnected_pending_retry: ['retrying', 'stopped'],
  retrying: ['connected', 'disconnected_pending_retry', 'stopped'],
  stopped: [],
};

export const RECONNECT_DELAY_MS = 3000;

export function canTransitionReconnect(from: ReconnectState, to: ReconnectState): boolean {
  return RECONNECT_TRANSITIONS[from].includes(to);
}

/** Schedules a callback and returns its cancel function */
export type Scheduler = (callback: () => void, delayMs: number) => () => void;

export const defaultScheduler: Scheduler = (callback, delayMs) => {
  const timer = setTimeout(callback, delayMs);
  return () => clearTimeout(timer);
};

export interface ReconnectTransition {
  from: ReconnectState;
  to: ReconnectState;
  trigger: string;
  attempt: number;
}

export interface ReconnectOptions {
  delayMs?: number;
  schedule?: Scheduler;
  onTransition?: (transition: ReconnectTransition) => void;
}

export class ReconnectStateMachine {
  private current: ReconnectState = 'idle';
  private cancelRetry: (() => void) | null = null;
  private attempt = 0;
  private readonly delayMs: number;
  private readonly schedule: Scheduler;
  private readonly onTransition?: (transition: ReconnectTransition) => void;

  /**
   * @param connect - opens a new physical connection; its outcome is reported
   *   back through `opened()` or `closed()`
   */
  constructor(
    private readonly connect: () => void,
    options: ReconnectOptions = {}
  ) {
    this.delayMs = options.delayMs ?? RECONNECT_DELAY_MS;
    this.schedule = options.schedule ?? defaultScheduler;
    this.onTransition = options.onTransition;
  }

  get state(): ReconnectState {
    return this.current;
  }

  /** Retry attempts since the last successful connection */
  get retryAttempt(): number {
    return this.attempt;
  }

  start(): boolean {
    if (!this.transition('connecting', 'start')) return false;
    this.connect();
    return true;
  }

  opened(): boolean {
    if (!this.transition('connected', 'open')) return false;
    this.attempt = 0;
    return true;
  }

  closed(): boolean {
    if (!this.transition('disconnected_pending_retry', 'close')) return false;

    this.cancelRetry = this.schedule(() => {
      this.cancelRetry = null;
      this.attempt++;
      if (this.transition('retrying', 'timer')) {
        this.connect();
      }
    }, this.delayMs);
    return true;
  }

  stop(): boolean {
    if (this.cancelRetry) {
      this.cancelRetry();
      this.cancelRetry = null;
    }
    return this.transition('stopped', 'stop');
  }

  private transition(to: ReconnectState, trigger: string): boolean {
    const from = this.current;
    if (!canTransitionReconnect(from, to)) {
      return false;
    }
    this.current = to;
    this.onTransition?.({ from, to, trigger, attempt: this.attempt });
    return true;
  }
}
