import { Injectable, Logger } from '@nestjs/common';
import { AssetsService } from '../assets/assets.service';
import { BlockchainService } from '../blockchain/blockchain.service';
import { Address } from '../../common/addresses';
import { Currency, describeCurrency, NATIVE, sameCurrency } from '../payments/currency';
import { PaymentProcessorService } from '../payments/payment-processor.service';
import { RoyaltyCalculatorService } from '../royalties/royalty-calculator.service';
import { ListingRegistryService } from './listing-registry.service';
import { Listing, ListingView, toListingView } from './listing.types';
import { MarketplaceException } from './marketplace.errors';
import { MarketplaceEventsService, PurchasedEvent } from './marketplace-events.service';
import { ReentrancyGuard } from './reentrancy-guard';

export interface PurchaseReceipt {
  assetId: bigint;
  seller: Address;
  buyer: Address;
  salePrice: bigint;
  currency: Currency;
  royaltyRecipient: Address;
  royaltyAmount: bigint;
  sellerProceeds: bigint;
  event: PurchasedEvent;
}

/**
 * Public face of the protocol. Listing changes and purchases each run as one
 * atomic step behind a shared reentrancy guard, so a payment recipient that
 * calls back in mid-purchase is refused and the purchase unwinds.
 */
@Injectable()
export class MarketplaceService {
  private readonly logger = new Logger(MarketplaceService.name);
  private readonly guard = new ReentrancyGuard();

  constructor(
    private readonly chain: BlockchainService,
    private readonly assets: AssetsService,
    private readonly listingRegistry: ListingRegistryService,
    private readonly royaltyCalculator: RoyaltyCalculatorService,
    private readonly paymentProcessor: PaymentProcessorService,
    private readonly events: MarketplaceEventsService,
  ) {}

  listItem(
    assetId: bigint,
    salePrice: bigint,
    expiresAt: bigint,
    currency: Currency,
    caller: Address,
    historicalPrice = 0n,
  ): Listing {
    return this.guard.run('listItem', () =>
      this.chain.atomic(() =>
        this.listingRegistry.setListing(assetId, salePrice, expiresAt, currency, historicalPrice, caller),
      ),
    );
  }

  delistItem(assetId: bigint, caller: Address): void {
    this.guard.run('delistItem', () => this.chain.atomic(() => this.listingRegistry.removeListing(assetId, caller)));
    this.logger.log(`Asset #${assetId} delisted by ${caller}`);
  }

  getListing(assetId: bigint): ListingView {
    return toListingView(this.listingRegistry.get(assetId));
  }

  /**
   * Buys `assetId` on the terms the buyer expects. `attachedValue` is the
   * native amount sent with the call and only counts for native listings.
   */
  buyItem(
    assetId: bigint,
    expectedSalePrice: bigint,
    expectedCurrency: Currency,
    buyer: Address,
    attachedValue = 0n,
  ): PurchaseReceipt {
    return this.guard.run('buyItem', () =>
      this.chain.atomic(() => this.executePurchase(assetId, expectedSalePrice, expectedCurrency, buyer, attachedValue)),
    );
  }

  private executePurchase(
    assetId: bigint,
    expectedSalePrice: bigint,
    expectedCurrency: Currency,
    buyer: Address,
    attachedValue: bigint,
  ): PurchaseReceipt {
    // Terms are checked against the stored record, expired or not.
    const listing = this.listingRegistry.peek(assetId);
    if (expectedSalePrice !== (listing?.salePrice ?? 0n)) {
      throw new MarketplaceException(
        'InconsistentSalePrice',
        `Expected price ${expectedSalePrice} does not match the listing for asset #${assetId}`,
      );
    }
    if (!sameCurrency(expectedCurrency, listing?.currency ?? NATIVE)) {
      throw new MarketplaceException(
        'InconsistentTokens',
        `Expected ${describeCurrency(expectedCurrency)} does not match the listing for asset #${assetId}`,
      );
    }
    if (!listing || !this.listingRegistry.isActive(assetId)) {
      throw new MarketplaceException('InvalidListing', `Asset #${assetId} has no active listing`);
    }

    const seller = this.assets.ownerOf(assetId);
    const royalty = this.royaltyCalculator.compute(assetId, listing.salePrice, listing.historicalPrice);
    const sellerProceeds = listing.salePrice - royalty.amount;

    const payer = this.collectPayment(assetId, listing, buyer, attachedValue);
    this.payLeg('royalty', royalty.amount, payer, royalty.recipient, listing.currency);
    this.payLeg('seller', sellerProceeds, payer, seller, listing.currency);

    this.assets.transfer(seller, buyer, assetId);
    if (this.listingRegistry.isActive(assetId)) {
      this.listingRegistry.invalidate(assetId);
    }

    const event = this.events.emit({
      type: 'Purchased',
      assetId,
      seller,
      buyer,
      salePrice: listing.salePrice,
      currency: listing.currency,
      royaltyAmount: royalty.amount,
    });
    this.logger.log(
      `Asset #${assetId} sold by ${seller} to ${buyer} for ${listing.salePrice} (${describeCurrency(listing.currency)}), royalty ${royalty.amount}`,
    );

    return {
      assetId,
      seller,
      buyer,
      salePrice: listing.salePrice,
      currency: listing.currency,
      royaltyRecipient: royalty.recipient,
      royaltyAmount: royalty.amount,
      sellerProceeds,
      event,
    };
  }

  /** Returns the account both payment legs are drawn from. */
  private collectPayment(assetId: bigint, listing: Listing, buyer: Address, attachedValue: bigint): Address {
    if (listing.currency.kind === 'native') {
      if (attachedValue !== listing.salePrice) {
        throw new MarketplaceException(
          'IncorrectValueSent',
          `Asset #${assetId} costs ${listing.salePrice}, ${attachedValue} was sent`,
        );
      }
      const escrow = this.paymentProcessor.operator;
      if (!this.paymentProcessor.pay(attachedValue, buyer, escrow, NATIVE)) {
        throw new MarketplaceException('InsufficientFunds', `${buyer} cannot cover ${attachedValue}`);
      }
      return escrow;
    }

    const allowance = this.paymentProcessor.allowance(listing.currency, buyer);
    if (allowance < listing.salePrice) {
      throw new MarketplaceException(
        'InsufficientAllowance',
        `Allowance ${allowance} is below the sale price ${listing.salePrice}`,
      );
    }
    return buyer;
  }

  private payLeg(leg: 'royalty' | 'seller', amount: bigint, payer: Address, recipient: Address, currency: Currency): void {
    if (!this.paymentProcessor.pay(amount, payer, recipient, currency)) {
      throw new MarketplaceException('PaymentTransferFailed', `The ${leg} payment of ${amount} to ${recipient} failed`);
    }
  }
}
