import { tagged } from "./log.js";

/**
 * Exclusive, non-reentrant guard around a synchronous critical section.
 *
 * Callers on the event loop are already serialized; what can still
 * interleave is a callback fired mid-operation that calls back into the
 * guarded object. That call fails instead of seeing half-applied state.
 */
export class Lock {
  private held = false;

  acquire(): () => void {
    if (this.held) {
      throw new Error(
        tagged("re-entrant call, an eviction callback must not use its own cache")
      );
    }
    this.held = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  run<T>(fn: () => T): T {
    const release = this.acquire();
    try {
      return fn();
    } finally {
      release();
    }
  }

  private release(): void {
    this.held = false;
  }
}
