import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { currencyAddress } from '../payments/currency';
import { HistoricalSale } from './entities/historical-sale.entity';
import { MarketplaceEventsService, PurchasedEvent } from './marketplace-events.service';

/** Persists committed purchases as a price history read model. */
@Injectable()
export class SalesHistoryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SalesHistoryService.name);
  private unsubscribe: (() => void) | null = null;

  constructor(
    @InjectRepository(HistoricalSale)
    private historicalSaleRepository: Repository<HistoricalSale>,
    private readonly events: MarketplaceEventsService,
  ) {}

  async onModuleInit() {
    const latest = await this.historicalSaleRepository.maximum('eventSequence');
    this.events.resumeAfter(latest ?? 0);
    this.unsubscribe = this.events.subscribe((event) => {
      if (event.type !== 'Purchased') {
        return;
      }
      this.recordSale(event).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to record sale of asset #${event.assetId} (event #${event.sequence}): ${message}`);
      });
    });
  }

  onModuleDestroy() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async recordSale(event: PurchasedEvent): Promise<HistoricalSale> {
    const sale = this.historicalSaleRepository.create({
      assetId: event.assetId.toString(),
      sellerAddress: event.seller,
      buyerAddress: event.buyer,
      salePrice: event.salePrice.toString(),
      currency: currencyAddress(event.currency),
      royaltyAmount: event.royaltyAmount.toString(),
      eventSequence: event.sequence,
      timestamp: new Date(Number(event.timestamp) * 1000),
    });
    const saved = await this.historicalSaleRepository.save(sale);
    this.logger.log(`Recorded sale of asset #${event.assetId} for ${event.salePrice} (event #${event.sequence})`);
    return saved;
  }

  async getPriceHistory(assetId: bigint): Promise<HistoricalSale[]> {
    this.logger.log(`Fetching price history for asset #${assetId}...`);
    return this.historicalSaleRepository.find({
      where: { assetId: assetId.toString() },
      order: { timestamp: 'ASC' },
    });
  }
}
