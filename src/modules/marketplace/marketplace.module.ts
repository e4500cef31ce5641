import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MarketplaceService } from './marketplace.service';
import { MarketplaceController } from './marketplace.controller';
import { ListingRegistryService } from './listing-registry.service';
import { MarketplaceEventsService } from './marketplace-events.service';
import { TransferHookService } from './transfer-hook.service';
import { SalesHistoryService } from './sales-history.service';
import { HistoricalSale } from './entities/historical-sale.entity';
import { AssetsModule } from '../assets/assets.module';
import { PaymentsModule } from '../payments/payments.module';
import { RoyaltiesModule } from '../royalties/royalties.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([HistoricalSale]),
    AssetsModule,
    PaymentsModule,
    RoyaltiesModule,
  ],
  controllers: [MarketplaceController],
  providers: [
    MarketplaceService,
    ListingRegistryService,
    MarketplaceEventsService,
    TransferHookService,
    SalesHistoryService,
  ],
  exports: [MarketplaceService, MarketplaceEventsService],
})
export class MarketplaceModule {}
