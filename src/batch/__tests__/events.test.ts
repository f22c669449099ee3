import { describe, it, expect } from 'vitest';
import { EventChannel, isTerminal, progressEvent, type BatchEvent } from '../events.js';

async function collect(stream: AsyncGenerator<BatchEvent>): Promise<BatchEvent[]> {
  const out: BatchEvent[] = [];
  for await (const event of stream) out.push(event);
  return out;
}

describe('progressEvent', () => {
  it('rounds the percentage and handles an empty total', () => {
    expect(progressEvent(1, 3, 'x')).toEqual({ type: 'progress', current: 1, total: 3, percent: 33, message: 'x' });
    expect(progressEvent(0, 0, 'x')).toMatchObject({ percent: 0 });
  });
});

describe('isTerminal', () => {
  it('is true for complete and error only', () => {
    expect(isTerminal({ type: 'complete', message: '', stats: {} })).toBe(true);
    expect(isTerminal({ type: 'error', message: '' })).toBe(true);
    expect(isTerminal({ type: 'warning', message: '' })).toBe(false);
  });
});

describe('EventChannel', () => {
  it('replays history to late readers and ends at the terminal event', async () => {
    const channel = new EventChannel(1000);
    channel.emit({ type: 'info', message: 'one' });
    channel.emit({ type: 'complete', message: 'done', stats: { total: 1 } });

    expect(await collect(channel.stream())).toEqual([
      { type: 'info', message: 'one' },
      { type: 'complete', message: 'done', stats: { total: 1 } },
    ]);
    // A second reader sees the same sequence.
    expect(await collect(channel.stream())).toHaveLength(2);
  });

  it('drops events after the channel closes', () => {
    const channel = new EventChannel(1000);
    channel.emit({ type: 'error', message: 'fatal' });
    channel.emit({ type: 'info', message: 'late' });

    expect(channel.isClosed).toBe(true);
    expect(channel.history()).toEqual([{ type: 'error', message: 'fatal' }]);
  });

  it('follows events emitted while a reader waits', async () => {
    const channel = new EventChannel(1000);
    const reading = collect(channel.stream());

    channel.emit({ type: 'status', message: 'working' });
    await new Promise((resolve) => setTimeout(resolve, 5));
    channel.emit({ type: 'complete', message: 'done', stats: {} });

    expect((await reading).map((e) => e.type)).toEqual(['status', 'complete']);
  });

  it('sends a keepalive after a quiet heartbeat interval', async () => {
    const channel = new EventChannel(10);
    const reading = collect(channel.stream());

    await new Promise((resolve) => setTimeout(resolve, 60));
    channel.emit({ type: 'complete', message: 'done', stats: {} });

    const events = await reading;
    expect(events.at(-1)?.type).toBe('complete');
    expect(events.filter((e) => e.type === 'keepalive').length).toBeGreaterThanOrEqual(2);
    expect(channel.history().some((e) => e.type === 'keepalive')).toBe(false);
  });

  it('stops a reader when its signal aborts', async () => {
    const channel = new EventChannel(1000);
    const controller = new AbortController();
    channel.emit({ type: 'info', message: 'one' });
    const reading = collect(channel.stream(controller.signal));

    await new Promise((resolve) => setTimeout(resolve, 5));
    controller.abort();

    expect(await reading).toEqual([{ type: 'info', message: 'one' }]);
    expect(channel.isClosed).toBe(false);
  });
});
