import { ReentrancyError } from '../errors';

/**
 * Mutual exclusion for guarded entry points.
 *
 * The flag is set on entry and cleared when the guarded work settles,
 * whether it resolves or rejects. Entering while the flag is set fails
 * immediately with {@link ReentrancyError}; there is no waiting.
 */
export class ReentrancyLock {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  /**
   * Run `work` holding the lock.
   *
   * @param entryPoint - Name reported in the error on re-entry.
   */
  async run<T>(entryPoint: string, work: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new ReentrancyError(entryPoint);
    }
    this.entered = true;
    try {
      return await work();
    } finally {
      this.entered = false;
    }
  }
}
