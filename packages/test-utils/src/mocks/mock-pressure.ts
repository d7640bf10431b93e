/**
 * Manually triggered memory-pressure signal
 */

import type { MemoryPressureSignal } from '@tiercache/types';

export interface ManualPressureSignal extends MemoryPressureSignal {
  /** Notify every listener */
  emit(): void;
  /** Number of registered listeners */
  readonly listenerCount: number;
}

export function createPressureSignal(): ManualPressureSignal {
  const listeners = new Set<() => void>();
  return {
    subscribe(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    emit(): void {
      for (const listener of listeners) listener();
    },
    get listenerCount(): number {
      return listeners.size;
    },
  };
}
