import { createStore } from 'zustand/vanilla';
import type { LifecycleState } from '../../shared/types';

export type CleanupKind = 'full' | 'light';

export type SessionState = {
  isInitialized: boolean;
  lifecycleState: LifecycleState | null;
  cleanupCount: number;
  lastCleanup: { kind: CleanupKind; at: number } | null;
};

export type SessionStore = SessionState & {
  markInitialized: () => void;
  setLifecycleState: (state: LifecycleState) => void;
  recordCleanup: (kind: CleanupKind) => void;
  reset: () => void;
};

const initialState: SessionState = {
  isInitialized: false,
  lifecycleState: null,
  cleanupCount: 0,
  lastCleanup: null,
};

/**
 * Observable registry state. One store per registry; subscribers see every lifecycle
 * transition and cleanup.
 */
export const createSessionStore = () =>
  createStore<SessionStore>((set) => ({
    ...initialState,
    markInitialized: () => set({ isInitialized: true }),
    setLifecycleState: (lifecycleState) => set({ lifecycleState }),
    recordCleanup: (kind) =>
      set((state) => ({
        cleanupCount: state.cleanupCount + 1,
        lastCleanup: { kind, at: Date.now() },
      })),
    reset: () => set({ ...initialState }),
  }));

export type SessionStoreApi = ReturnType<typeof createSessionStore>;
