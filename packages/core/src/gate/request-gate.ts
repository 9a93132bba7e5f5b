import { isAbortError, sleep } from './sleep.js';

/**
 * Admission control wrapped around every outbound request.
 */
export interface RequestGate {
  /**
   * Resolve `true` once the caller may issue its request, or `false` when
   * `signal` aborted the wait. A `false` admission holds nothing and must not
   * be released.
   */
  acquire(signal?: AbortSignal): Promise<boolean>;
  /**
   * Give up the admission obtained from `acquire`. Does nothing when the gate
   * is not held.
   */
  release(): void;
}

/**
 * Gate used when no request spacing is configured. Never blocks.
 */
export class UnrestrictedGate implements RequestGate {
  async acquire(): Promise<boolean> {
    return true;
  }

  release(): void {}
}

interface Waiter {
  admit(): void;
}

/**
 * Admits one caller at a time in arrival order and keeps each admission
 * waiting `delayMs` before handing it back, so consecutive requests start at
 * least `delayMs` apart.
 */
export class SerializedGate implements RequestGate {
  private held = false;
  private readonly waiters: Array<Waiter> = [];

  constructor(private readonly delayMs: number) {}

  get isHeld(): boolean {
    return this.held;
  }

  /** Number of callers queued behind the current holder. */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }

    const admitted = await this.waitForTurn(signal);
    if (!admitted) {
      return false;
    }

    try {
      await sleep(this.delayMs, signal);
    } catch (error) {
      this.release();
      if (isAbortError(error)) {
        return false;
      }
      throw error;
    }

    return true;
  }

  release(): void {
    if (!this.held) {
      return;
    }

    // Ownership passes straight to the next waiter; the gate only becomes
    // free when nobody is queued.
    const next = this.waiters.shift();
    if (next) {
      next.admit();
    } else {
      this.held = false;
    }
  }

  private waitForTurn(signal?: AbortSignal): Promise<boolean> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(false);
      };

      const waiter: Waiter = {
        admit: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(true);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Pick the gate for a configured minimum request interval: `0` disables
 * spacing entirely.
 */
export function createRequestGate(minRequestInterval: number): RequestGate {
  return minRequestInterval > 0
    ? new SerializedGate(minRequestInterval)
    : new UnrestrictedGate();
}
