import { Body, Controller, Delete, Get, HttpCode, Logger, Param, Post, Query } from '@nestjs/common';
import { MarketplaceService, PurchaseReceipt } from './marketplace.service';
import { SalesHistoryService } from './sales-history.service';
import { BuyItemDto, ListingDto, ListItemDto, MarketplaceEventDto, PurchaseDto } from './dto/listing.dto';
import { HistoricalSale } from './entities/historical-sale.entity';
import { MarketplaceEvent, MarketplaceEventsService } from './marketplace-events.service';
import { Caller } from '../../common/decorators/caller.decorator';
import { ParseBigIntPipe } from '../../common/pipes/parse-bigint.pipe';
import { MAX_UINT64, parseUnsigned } from '../../common/amounts';
import { currencyAddress, currencyFromAddress } from '../payments/currency';

@Controller('marketplace')
export class MarketplaceController {
  private readonly logger = new Logger(MarketplaceController.name);

  constructor(
    private readonly marketplaceService: MarketplaceService,
    private readonly salesHistoryService: SalesHistoryService,
    private readonly eventsService: MarketplaceEventsService,
  ) {}

  @Get('listings/:assetId')
  getListing(@Param('assetId', ParseBigIntPipe) assetId: bigint): ListingDto {
    return this.describeListing(assetId);
  }

  @Post('listings/:assetId')
  listItem(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Body() dto: ListItemDto,
    @Caller() caller: string,
  ): ListingDto {
    this.logger.log(`POST /marketplace/listings/${assetId} called by ${caller}`);
    this.marketplaceService.listItem(
      assetId,
      parseUnsigned(dto.salePrice, 'salePrice'),
      parseUnsigned(dto.expiresAt, 'expiresAt', MAX_UINT64),
      currencyFromAddress(dto.currency),
      caller,
      parseUnsigned(dto.historicalPrice ?? '0', 'historicalPrice'),
    );
    return this.describeListing(assetId);
  }

  @Delete('listings/:assetId')
  delistItem(@Param('assetId', ParseBigIntPipe) assetId: bigint, @Caller() caller: string): ListingDto {
    this.logger.log(`DELETE /marketplace/listings/${assetId} called by ${caller}`);
    this.marketplaceService.delistItem(assetId, caller);
    return this.describeListing(assetId);
  }

  @Post('listings/:assetId/purchase')
  @HttpCode(200)
  buyItem(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Body() dto: BuyItemDto,
    @Caller() caller: string,
  ): PurchaseDto {
    this.logger.log(`POST /marketplace/listings/${assetId}/purchase called by ${caller}`);
    const receipt = this.marketplaceService.buyItem(
      assetId,
      parseUnsigned(dto.expectedSalePrice, 'expectedSalePrice'),
      currencyFromAddress(dto.expectedCurrency),
      caller,
      parseUnsigned(dto.value ?? '0', 'value'),
    );
    return this.describePurchase(receipt);
  }

  @Get('events')
  getEvents(@Query('afterSequence') afterSequence?: string): MarketplaceEventDto[] {
    const after = Number(parseUnsigned(afterSequence ?? '0', 'afterSequence'));
    return this.eventsService.list(after).map((event) => this.describeEvent(event));
  }

  @Get('price-history')
  async getPriceHistory(@Query('assetId', ParseBigIntPipe) assetId: bigint): Promise<HistoricalSale[]> {
    this.logger.log(`GET /marketplace/price-history?assetId=${assetId} called`);
    return this.salesHistoryService.getPriceHistory(assetId);
  }

  private describeListing(assetId: bigint): ListingDto {
    const view = this.marketplaceService.getListing(assetId);
    return {
      assetId: assetId.toString(),
      salePrice: view.salePrice.toString(),
      expiresAt: view.expiresAt.toString(),
      currency: view.currency,
      historicalPrice: view.historicalPrice.toString(),
      active: view.salePrice > 0n,
    };
  }

  private describePurchase(receipt: PurchaseReceipt): PurchaseDto {
    return {
      assetId: receipt.assetId.toString(),
      seller: receipt.seller,
      buyer: receipt.buyer,
      salePrice: receipt.salePrice.toString(),
      currency: currencyAddress(receipt.currency),
      royaltyRecipient: receipt.royaltyRecipient,
      royaltyAmount: receipt.royaltyAmount.toString(),
      sellerProceeds: receipt.sellerProceeds.toString(),
    };
  }

  private describeEvent(event: MarketplaceEvent): MarketplaceEventDto {
    const common = {
      sequence: event.sequence,
      timestamp: event.timestamp.toString(),
      assetId: event.assetId.toString(),
      seller: event.seller,
      salePrice: event.salePrice.toString(),
      currency: currencyAddress(event.currency),
    };
    if (event.type === 'Purchased') {
      return { ...common, type: event.type, buyer: event.buyer, royaltyAmount: event.royaltyAmount.toString() };
    }
    return {
      ...common,
      type: event.type,
      expiresAt: event.expiresAt.toString(),
      historicalPrice: event.historicalPrice.toString(),
    };
  }
}
