import { MarketplaceException } from './marketplace.errors';

/**
 * Mutual exclusion for operations that hand control to outside code midway.
 * A nested entry is refused; the lock is always released on exit.
 */
export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(operation: string, work: () => T): T {
    if (this.entered) {
      throw new MarketplaceException('ReentrantCall', `${operation} cannot be entered while another marketplace call is in progress`);
    }
    this.entered = true;
    try {
      return work();
    } finally {
      this.entered = false;
    }
  }
}
