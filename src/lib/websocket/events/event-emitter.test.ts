import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from './event-emitter';

interface TestEvents extends Record<string, unknown> {
  message: string;
  count: number;
}

describe('EventEmitter', () => {
  it('should deliver emitted data to listeners of that event', () => {
    const emitter = new EventEmitter<TestEvents>();
    const onMessage = vi.fn();
    const onCount = vi.fn();
    emitter.on('message', onMessage);
    emitter.on('count', onCount);

    emitter.emit('message', 'hello');

    expect(onMessage).toHaveBeenCalledWith('hello');
    expect(onCount).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    const unsubscribe = emitter.on('count', listener);

    unsubscribe();
    emitter.emit('count', 1);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount('count')).toBe(0);
  });

  it('should call a once listener a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once('count', listener);

    emitter.emit('count', 1);
    emitter.emit('count', 2);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(1);
  });

  it('should keep notifying other listeners when one throws', () => {
    const emitter = new EventEmitter<TestEvents>();
    const after = vi.fn();
    emitter.on('message', () => {
      throw new Error('listener failure');
    });
    emitter.on('message', after);

    emitter.emit('message', 'still delivered');

    expect(after).toHaveBeenCalledWith('still delivered');
  });

  it('should remove listeners for one event or all events', () => {
    const emitter = new EventEmitter<TestEvents>();
    emitter.on('message', vi.fn());
    emitter.on('count', vi.fn());

    emitter.removeAllListeners('message');
    expect(emitter.listenerCount('message')).toBe(0);
    expect(emitter.listenerCount('count')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('count')).toBe(0);
  });
});
