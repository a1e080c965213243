import { describeError } from '../../shared/security';
import type { LifecycleState } from '../../shared/types';
import type { ManagedProcessor, ProcessorRegistry } from '../content/types';
import { createSessionStore, type SessionStoreApi } from './sessionStore';

export interface SessionMemoryStats {
  processorsCount: number;
  isInitialized: boolean;
  totalCachedLinks: number;
  totalMemoryUsageBytes: number;
  totalMemoryUsageKB: number;
  totalSessionContent: number;
}

/**
 * Tracks live processors and cascades cleanup to them on host lifecycle signals.
 *
 * Processors are held weakly: a processor that is garbage collected without
 * unregistering simply drops out of the set.
 */
export class SessionRegistry implements ProcessorRegistry {
  public readonly store: SessionStoreApi = createSessionStore();
  private processors: Set<WeakRef<ManagedProcessor>> = new Set();

  public initialize(): void {
    if (this.store.getState().isInitialized) return;
    this.store.getState().markInitialized();
    console.debug('[SessionRegistry] Initialized');
  }

  public get isInitialized(): boolean {
    return this.store.getState().isInitialized;
  }

  public registerProcessor(processor: ManagedProcessor): void {
    if (this.find(processor)) return;
    this.processors.add(new WeakRef(processor));
  }

  public unregisterProcessor(processor: ManagedProcessor): void {
    const ref = this.find(processor);
    if (ref) this.processors.delete(ref);
  }

  /**
   * Full cleanup clears every cache and session on each processor; light cleanup
   * clears caches only.
   */
  public triggerCleanup(fullCleanup: boolean): void {
    const live = this.liveProcessors();
    for (const processor of live) {
      try {
        if (fullCleanup) {
          processor.clearAllData();
        } else {
          processor.clearCache();
        }
      } catch (err) {
        console.error(`[SessionRegistry] Cleanup failed for a processor: ${describeError(err)}`);
      }
    }
    this.store.getState().recordCleanup(fullCleanup ? 'full' : 'light');
    console.info(`[SessionRegistry] ${fullCleanup ? 'Full' : 'Light'} cleanup of ${live.length} processors`);
  }

  public handleLifecycleChange(state: LifecycleState): void {
    this.store.getState().setLifecycleState(state);
    switch (state) {
      case 'detached':
        this.triggerCleanup(true);
        break;
      case 'paused':
        this.triggerCleanup(false);
        break;
      default:
        break;
    }
  }

  public getMemoryStats(): SessionMemoryStats {
    const live = this.liveProcessors();
    let totalCachedLinks = 0;
    let totalMemoryUsageBytes = 0;
    let totalSessionContent = 0;

    for (const processor of live) {
      const stats = processor.getCacheStats();
      totalCachedLinks += stats.totalCached;
      totalMemoryUsageBytes += stats.memoryUsageBytes;
      totalSessionContent += stats.sessionContentCount;
    }

    return {
      processorsCount: live.length,
      isInitialized: this.isInitialized,
      totalCachedLinks,
      totalMemoryUsageBytes,
      totalMemoryUsageKB: Math.round(totalMemoryUsageBytes / 1024),
      totalSessionContent,
    };
  }

  public hasHighMemoryUsage(): boolean {
    return this.liveProcessors().some((p) => p.isMemoryUsageHigh());
  }

  /**
   * Full cleanup, then forget every processor and reset observable state.
   */
  public dispose(): void {
    this.triggerCleanup(true);
    this.processors.clear();
    this.store.getState().reset();
    console.debug('[SessionRegistry] Disposed');
  }

  // Internal

  private find(processor: ManagedProcessor): WeakRef<ManagedProcessor> | undefined {
    for (const ref of this.processors) {
      if (ref.deref() === processor) return ref;
    }
    return undefined;
  }

  // Live processors; collected references are pruned on the way
  private liveProcessors(): ManagedProcessor[] {
    const live: ManagedProcessor[] = [];
    for (const ref of Array.from(this.processors)) {
      const processor = ref.deref();
      if (processor) {
        live.push(processor);
      } else {
        this.processors.delete(ref);
      }
    }
    return live;
  }
}

export default SessionRegistry;
