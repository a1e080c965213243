import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { bindProcessLifecycle } from '../lifecycle';

const setup = () => {
  const target = new EventEmitter();
  const registry = { handleLifecycleChange: vi.fn() };
  const onSignal = vi.fn();
  const unbind = bindProcessLifecycle(registry, { target, onSignal });
  return { target, registry, onSignal, unbind };
};

describe('bindProcessLifecycle', () => {
  it.each(['SIGINT', 'SIGTERM'] as const)('runs full cleanup on %s and hands the signal on', (signal) => {
    const { target, registry, onSignal } = setup();

    target.emit(signal);

    expect(registry.handleLifecycleChange).toHaveBeenCalledWith('detached');
    expect(onSignal).toHaveBeenCalledWith(signal);
    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
    expect(target.listenerCount('beforeExit')).toBe(0);
  });

  it('detaches on beforeExit and stays bound', () => {
    const { target, registry, onSignal } = setup();

    target.emit('beforeExit');
    target.emit('beforeExit');

    expect(registry.handleLifecycleChange).toHaveBeenCalledTimes(2);
    expect(onSignal).not.toHaveBeenCalled();
    expect(target.listenerCount('beforeExit')).toBe(1);
  });

  it('removes every listener on unbind', () => {
    const { target, registry, unbind } = setup();

    unbind();
    unbind();
    target.emit('SIGINT');
    target.emit('beforeExit');

    expect(registry.handleLifecycleChange).not.toHaveBeenCalled();
    expect(target.listenerCount('SIGTERM')).toBe(0);
  });
});
