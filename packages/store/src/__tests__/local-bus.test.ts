import { describe, it, expect, vi } from 'vitest';
import { LocalBus, LocalChannel } from '../notifications/local-bus.js';
import { NoopBus } from '../notifications/noop-bus.js';
import { NotificationError } from '../errors.js';
import type { InvalidationMessage } from '../types.js';

const MESSAGE: InvalidationMessage = {
  target: { scope: 'flag', flagName: 'dark_mode' },
  origin: 'node-a',
  sentAt: '2026-03-01T12:00:00.000Z',
};

describe('LocalBus', () => {
  it('delivers to every bus on the same channel, including the publisher', async () => {
    const channel = new LocalChannel();
    const a = new LocalBus(channel);
    const b = new LocalBus(channel);
    const onA = vi.fn();
    const onB = vi.fn();
    a.subscribe(onA);
    b.subscribe(onB);

    await a.publish(MESSAGE);

    expect(onA).toHaveBeenCalledWith(MESSAGE);
    expect(onB).toHaveBeenCalledWith(MESSAGE);
  });

  it('hands subscribers a copy of the message', async () => {
    const bus = new LocalBus();
    const handler = vi.fn();
    bus.subscribe(handler);

    await bus.publish(MESSAGE);

    expect(handler.mock.calls[0][0]).toEqual(MESSAGE);
    expect(handler.mock.calls[0][0]).not.toBe(MESSAGE);
  });

  it('isolates separate channels', async () => {
    const a = new LocalBus(new LocalChannel());
    const b = new LocalBus(new LocalChannel());
    const handler = vi.fn();
    b.subscribe(handler);

    await a.publish(MESSAGE);

    expect(handler).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', async () => {
    const channel = new LocalChannel();
    const bus = new LocalBus(channel);
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(handler);

    unsubscribe();
    await bus.publish(MESSAGE);

    expect(handler).not.toHaveBeenCalled();
    expect(channel.listenerCount).toBe(0);
  });

  it('detaches only its own listeners on close', async () => {
    const channel = new LocalChannel();
    const closing = new LocalBus(channel);
    const staying = new LocalBus(channel);
    closing.subscribe(() => {});
    closing.subscribe(() => {});
    staying.subscribe(() => {});

    await closing.close();

    expect(channel.listenerCount).toBe(1);
    await expect(closing.publish(MESSAGE)).rejects.toBeInstanceOf(NotificationError);
  });
});

describe('NoopBus', () => {
  it('accepts publishes and closes cleanly', async () => {
    const bus = new NoopBus();
    const unsubscribe = bus.subscribe();

    await expect(bus.publish(MESSAGE)).resolves.toBeUndefined();
    unsubscribe();
    await expect(bus.close()).resolves.toBeUndefined();
  });
});
