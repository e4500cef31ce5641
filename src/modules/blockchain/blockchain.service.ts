import { Injectable, Logger } from '@nestjs/common';

type JournalEntry =
  | { kind: 'undo'; revert: () => void }
  | { kind: 'commit'; run: () => void };

/**
 * In-process execution context shared by every ledger.
 *
 * Provides the block timestamp used for expiry checks and an undo journal
 * that turns a synchronous unit of work into an all-or-nothing operation.
 * Scopes nest: an inner `atomic` that throws reverts only its own effects,
 * and nothing is committed until the outermost scope returns.
 */
@Injectable()
export class BlockchainService {
  private readonly logger = new Logger(BlockchainService.name);
  private journal: JournalEntry[] = [];
  private depth = 0;

  /** Current time in seconds since epoch. */
  timestamp(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }

  inAtomicScope(): boolean {
    return this.depth > 0;
  }

  /**
   * Runs `work` as one atomic step. `work` must be synchronous: a returned
   * promise would escape the scope before its effects are journaled.
   */
  atomic<T>(work: () => T): T {
    const mark = this.journal.length;
    this.depth++;
    let result: T;
    try {
      result = work();
    } catch (error) {
      this.rollbackTo(mark);
      throw error;
    } finally {
      this.depth--;
    }
    if (this.depth === 0) {
      this.commit();
    }
    return result;
  }

  /** Registers how to revert a mutation that was just applied. */
  recordUndo(revert: () => void): void {
    if (this.depth === 0) {
      return;
    }
    this.journal.push({ kind: 'undo', revert });
  }

  /** Defers `run` until the outermost scope commits; dropped on rollback. */
  afterCommit(run: () => void): void {
    if (this.depth === 0) {
      this.runCommitHook(run);
      return;
    }
    this.journal.push({ kind: 'commit', run });
  }

  private rollbackTo(mark: number): void {
    while (this.journal.length > mark) {
      const entry = this.journal.pop();
      if (entry?.kind === 'undo') {
        entry.revert();
      }
    }
  }

  private commit(): void {
    const entries = this.journal;
    this.journal = [];
    for (const entry of entries) {
      if (entry.kind === 'commit') {
        this.runCommitHook(entry.run);
      }
    }
  }

  private runCommitHook(run: () => void): void {
    try {
      run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`After-commit hook failed: ${message}`);
    }
  }
}
