import { Injectable, Logger } from '@nestjs/common';
import { BlockchainService } from '../blockchain/blockchain.service';
import { Address } from '../../common/addresses';
import { Currency } from '../payments/currency';

export interface EventMeta {
  sequence: number;
  timestamp: bigint;
}

export interface UpdateListingEvent extends EventMeta {
  type: 'UpdateListing';
  assetId: bigint;
  seller: Address;
  salePrice: bigint;
  expiresAt: bigint;
  currency: Currency;
  historicalPrice: bigint;
}

export interface PurchasedEvent extends EventMeta {
  type: 'Purchased';
  assetId: bigint;
  seller: Address;
  buyer: Address;
  salePrice: bigint;
  currency: Currency;
  royaltyAmount: bigint;
}

export type MarketplaceEvent = UpdateListingEvent | PurchasedEvent;

type DistributiveOmit<T, K extends keyof MarketplaceEvent> = T extends MarketplaceEvent ? Omit<T, K> : never;
export type MarketplaceEventInput = DistributiveOmit<MarketplaceEvent, keyof EventMeta>;

export type MarketplaceEventListener = (event: MarketplaceEvent) => void;

/**
 * Append-only marketplace event log. Entries appended by an operation that
 * later fails are removed with it; listeners only see committed entries.
 */
@Injectable()
export class MarketplaceEventsService {
  private readonly logger = new Logger(MarketplaceEventsService.name);
  private readonly log: MarketplaceEvent[] = [];
  private readonly listeners = new Set<MarketplaceEventListener>();
  private firstSequence = 1;

  constructor(private readonly chain: BlockchainService) {}

  emit<E extends MarketplaceEventInput>(input: E): E & EventMeta {
    const event = { ...input, sequence: this.firstSequence + this.log.length, timestamp: this.chain.timestamp() };
    this.log.push(event);
    this.chain.recordUndo(() => {
      this.log.pop();
    });
    this.chain.afterCommit(() => this.notify(event));
    return event;
  }

  /** Events with a sequence number greater than `afterSequence`. */
  list(afterSequence = 0): MarketplaceEvent[] {
    return this.log.slice(Math.max(0, afterSequence - this.firstSequence + 1));
  }

  /** Continues numbering after `sequence`, the last one already persisted elsewhere. */
  resumeAfter(sequence: number): void {
    if (this.log.length > 0) {
      throw new Error('Cannot renumber an event log that already has entries');
    }
    this.firstSequence = sequence + 1;
    this.logger.log(`Event numbering resumes at #${this.firstSequence}`);
  }

  subscribe(listener: MarketplaceEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(event: MarketplaceEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Listener failed on ${event.type} #${event.sequence}: ${message}`);
      }
    }
  }
}
