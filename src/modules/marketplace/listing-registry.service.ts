import { Injectable, Logger } from '@nestjs/common';
import { AssetsService } from '../assets/assets.service';
import { BlockchainService } from '../blockchain/blockchain.service';
import { JournaledMap } from '../blockchain/journaled-map';
import { Address, ZeroAddress } from '../../common/addresses';
import { Currency, describeCurrency, NATIVE } from '../payments/currency';
import { assertOwnerOrApproved } from './marketplace.access';
import { MarketplaceException } from './marketplace.errors';
import { MarketplaceEventsService } from './marketplace-events.service';
import { Listing } from './listing.types';

/**
 * Sole owner of listing state: at most one record per asset, overwritten on
 * relist and dropped on removal, purchase or transfer.
 */
@Injectable()
export class ListingRegistryService {
  private readonly logger = new Logger(ListingRegistryService.name);
  private readonly listings: JournaledMap<string, Listing>;

  constructor(
    private readonly chain: BlockchainService,
    private readonly assets: AssetsService,
    private readonly events: MarketplaceEventsService,
  ) {
    this.listings = new JournaledMap(chain);
  }

  setListing(
    assetId: bigint,
    salePrice: bigint,
    expiresAt: bigint,
    currency: Currency,
    historicalPrice: bigint,
    caller: Address,
  ): Listing {
    if (salePrice <= 0n) {
      throw new MarketplaceException('SalePriceCannotBeZero', 'Sale price must be greater than zero');
    }
    if (expiresAt < this.chain.timestamp()) {
      throw new MarketplaceException('InvalidExpiresTimestamp', `Expiry ${expiresAt} is already in the past`);
    }
    const owner = assertOwnerOrApproved(this.assets, assetId, caller);

    const listing: Listing = { salePrice, expiresAt, currency, historicalPrice };
    return this.chain.atomic(() => {
      this.listings.set(assetId.toString(), listing);
      this.events.emit({ type: 'UpdateListing', assetId, seller: owner, ...listing });
      this.logger.log(
        `Asset #${assetId} listed by ${caller} at ${salePrice} (${describeCurrency(currency)}) until ${expiresAt}`,
      );
      return { ...listing };
    });
  }

  removeListing(assetId: bigint, caller: Address): void {
    assertOwnerOrApproved(this.assets, assetId, caller);
    if (!this.isActive(assetId)) {
      throw new MarketplaceException('InvalidListing', `Asset #${assetId} has no active listing`);
    }
    this.invalidate(assetId);
  }

  /** Unconditional reset. Emits the zeroed update even if nothing was listed. */
  invalidate(assetId: bigint): void {
    const seller = this.assets.exists(assetId) ? this.assets.ownerOf(assetId) : ZeroAddress;
    const wasActive = this.isActive(assetId);
    this.chain.atomic(() => {
      this.listings.delete(assetId.toString());
      this.events.emit({
        type: 'UpdateListing',
        assetId,
        seller,
        salePrice: 0n,
        expiresAt: 0n,
        currency: NATIVE,
        historicalPrice: 0n,
      });
    });
    if (wasActive) {
      this.logger.log(`Listing for asset #${assetId} invalidated`);
    } else {
      this.logger.warn(`Invalidated asset #${assetId} which had no active listing`);
    }
  }

  isActive(assetId: bigint): boolean {
    const listing = this.listings.get(assetId.toString());
    return listing !== undefined && listing.salePrice > 0n && listing.expiresAt >= this.chain.timestamp();
  }

  /** The listing if it is active right now, otherwise `null`. */
  get(assetId: bigint): Listing | null {
    return this.isActive(assetId) ? this.peek(assetId) : null;
  }

  /** Stored record regardless of expiry. */
  peek(assetId: bigint): Listing | null {
    const listing = this.listings.get(assetId.toString());
    return listing ? { ...listing } : null;
  }
}
