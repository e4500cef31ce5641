import { BlockchainService } from './blockchain.service';

/**
 * Map whose writes are recorded in the execution journal, so a rolled-back
 * operation restores every entry it touched.
 */
export class JournaledMap<K, V extends object | string | bigint | number | boolean> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly chain: BlockchainService) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  set(key: K, value: V): void {
    this.journalPrevious(key);
    this.entries.set(key, value);
  }

  delete(key: K): void {
    if (!this.entries.has(key)) {
      return;
    }
    this.journalPrevious(key);
    this.entries.delete(key);
  }

  private journalPrevious(key: K): void {
    const previous = this.entries.get(key);
    if (previous === undefined) {
      this.chain.recordUndo(() => this.entries.delete(key));
    } else {
      this.chain.recordUndo(() => this.entries.set(key, previous));
    }
  }
}
