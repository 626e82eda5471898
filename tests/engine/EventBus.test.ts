import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '@/engine/EventBus';

interface TestEvents {
  ping: [count: number, label: string];
  done: [];
}

describe('EventBus', () => {
  it('delivers arguments to every listener in registration order', () => {
    const bus = new EventBus<TestEvents>('Test');
    const calls: string[] = [];
    bus.on('ping', (count, label) => calls.push(`a:${count}:${label}`));
    bus.on('ping', (count, label) => calls.push(`b:${count}:${label}`));

    bus.emit('ping', 2, 'x');
    expect(calls).toEqual(['a:2:x', 'b:2:x']);
  });

  it('unsubscribes with off or the returned function', () => {
    const bus = new EventBus<TestEvents>('Test');
    const a = vi.fn();
    const b = vi.fn();
    bus.on('done', a);
    const stopB = bus.on('done', b);

    bus.off('done', a);
    stopB();
    bus.emit('done');

    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
    expect(bus.listenerCount('done')).toBe(0);
  });

  it('runs once listeners a single time', () => {
    const bus = new EventBus<TestEvents>('Test');
    const listener = vi.fn();
    bus.once('ping', listener);

    bus.emit('ping', 1, 'first');
    bus.emit('ping', 2, 'second');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(1, 'first');
  });

  it('keeps notifying after a listener throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const bus = new EventBus<TestEvents>('Test');
    const after = vi.fn();
    bus.on('done', () => {
      throw new Error('boom');
    });
    bus.on('done', after);

    bus.emit('done');

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[Test] Listener for "done" threw:');
    errorSpy.mockRestore();
  });

  it('lets a listener unsubscribe another mid-emit without skipping it', () => {
    const bus = new EventBus<TestEvents>('Test');
    const second = vi.fn();
    bus.on('done', () => bus.off('done', second));
    bus.on('done', second);

    bus.emit('done');
    bus.emit('done');
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('drops every listener on clear', () => {
    const bus = new EventBus<TestEvents>('Test');
    bus.on('ping', vi.fn());
    bus.on('done', vi.fn());
    bus.clear();
    expect(bus.listenerCount('ping')).toBe(0);
    expect(bus.listenerCount('done')).toBe(0);
  });
});
