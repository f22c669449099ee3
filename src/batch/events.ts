import { logger } from '../shared/logger.js';

export type BatchStats = Record<string, number>;

export type BatchEvent =
  | { type: 'status' | 'info' | 'warning' | 'success'; message: string }
  | { type: 'progress'; current: number; total: number; percent: number; message: string }
  | { type: 'error'; message: string }
  | { type: 'complete'; message: string; stats: BatchStats }
  | { type: 'keepalive' };

export type BatchEventType = BatchEvent['type'];

export function isTerminal(event: BatchEvent): boolean {
  return event.type === 'complete' || event.type === 'error';
}

export function progressEvent(current: number, total: number, message: string): BatchEvent {
  const percent = total > 0 ? Math.round((current / total) * 100) : 0;
  return { type: 'progress', current, total, percent, message };
}

/**
 * Ordered event log of one session. Workers `emit`; readers iterate
 * `stream()`, which replays from the first event and then follows new ones.
 * A reader idle for `heartbeatMs` receives a `keepalive`. The channel closes
 * on the first terminal event; later emits are dropped.
 */
export class EventChannel {
  private readonly events: BatchEvent[] = [];
  private readonly waiters = new Set<() => void>();
  private closed = false;

  constructor(private readonly heartbeatMs: number) {}

  get isClosed(): boolean {
    return this.closed;
  }

  emit(event: BatchEvent): void {
    if (this.closed) {
      logger.debug({ event: event.type }, 'Event after channel closed, dropped');
      return;
    }
    this.events.push(event);
    if (isTerminal(event)) {
      this.closed = true;
    }
    for (const wake of this.waiters) wake();
  }

  history(): BatchEvent[] {
    return [...this.events];
  }

  async *stream(signal?: AbortSignal): AsyncGenerator<BatchEvent> {
    let cursor = 0;
    for (;;) {
      while (cursor < this.events.length) {
        const event = this.events[cursor];
        cursor++;
        if (!event) continue;
        yield event;
        if (isTerminal(event)) return;
      }
      if (this.closed || signal?.aborted) return;

      const woken = await this.waitForEvent(signal);
      if (!woken && cursor >= this.events.length) {
        yield { type: 'keepalive' };
      }
    }
  }

  /** Resolves true on a new event or abort, false after a silent heartbeat interval. */
  private waitForEvent(signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      const finish = (woken: boolean): void => {
        clearTimeout(timer);
        this.waiters.delete(onEvent);
        signal?.removeEventListener('abort', onAbort);
        resolve(woken);
      };
      const onEvent = (): void => finish(true);
      const onAbort = (): void => finish(true);
      const timer = setTimeout(() => finish(false), this.heartbeatMs);

      this.waiters.add(onEvent);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
