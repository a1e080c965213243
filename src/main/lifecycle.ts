import type { LifecycleState } from '../shared/types';

export type LifecycleTarget = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export interface LifecycleBindingOptions {
  target?: LifecycleTarget;
  // Runs after cleanup on SIGINT/SIGTERM. Defaults to re-raising the signal once unbound.
  onSignal?: (signal: NodeJS.Signals) => void;
}

const TERMINATING_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const reraise = (signal: NodeJS.Signals) => {
  process.kill(process.pid, signal);
};

/**
 * Translate process shutdown into a 'detached' lifecycle change.
 * Returns a function that removes every listener it added.
 */
export function bindProcessLifecycle(
  registry: { handleLifecycleChange(state: LifecycleState): void },
  options: LifecycleBindingOptions = {}
): () => void {
  const target = options.target ?? process;
  const onSignal = options.onSignal ?? reraise;
  let bound = true;

  const detach = () => registry.handleLifecycleChange('detached');

  const signalHandlers = TERMINATING_SIGNALS.map((signal) => {
    const handler = () => {
      console.info(`[Lifecycle] ${signal} received, releasing cached content`);
      detach();
      unbind();
      onSignal(signal);
    };
    return { signal, handler };
  });

  const unbind = () => {
    if (!bound) return;
    bound = false;
    for (const { signal, handler } of signalHandlers) {
      target.off(signal, handler);
    }
    target.off('beforeExit', detach);
  };

  for (const { signal, handler } of signalHandlers) {
    target.on(signal, handler);
  }
  target.on('beforeExit', detach);

  return unbind;
}
