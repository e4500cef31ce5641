import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ZeroAddress } from 'ethers';
import { AssetsService } from '../assets/assets.service';
import { BlockchainService } from '../blockchain/blockchain.service';
import { NATIVE, tokenCurrency } from '../payments/currency';
import { NativeLedgerService } from '../payments/native-ledger.service';
import { PaymentProcessorService } from '../payments/payment-processor.service';
import { TokenLedgerService } from '../payments/token-ledger.service';
import { RoyaltyCalculatorService } from '../royalties/royalty-calculator.service';
import { RoyaltyConfigService } from '../royalties/royalty-config.service';
import { HistoricalSale } from './entities/historical-sale.entity';
import { ListingRegistryService } from './listing-registry.service';
import { MarketplaceEventsService } from './marketplace-events.service';
import { MarketplaceException } from './marketplace.errors';
import { MarketplaceService } from './marketplace.service';
import { SalesHistoryService } from './sales-history.service';
import { TransferHookService } from './transfer-hook.service';

const MARKETPLACE = '0x9999999999999999999999999999999999999999';
const CREATOR = '0x4444444444444444444444444444444444444444';
const SELLER = '0x1111111111111111111111111111111111111111';
const BUYER = '0x2222222222222222222222222222222222222222';
const OTHER = '0x3333333333333333333333333333333333333333';
const NOW = 1_700_000_000n;

function captureError(work: () => unknown): unknown {
  try {
    work();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to fail');
}

describe('MarketplaceService', () => {
  let moduleRef: TestingModule;
  let marketplace: MarketplaceService;
  let assets: AssetsService;
  let nativeLedger: NativeLedgerService;
  let tokenLedger: TokenLedgerService;
  let events: MarketplaceEventsService;
  let clock: jest.SpyInstance<bigint, []>;
  let saleRepository: {
    create: jest.Mock;
    save: jest.Mock;
    find: jest.Mock;
    maximum: jest.Mock;
  };
  let assetId: bigint;

  beforeEach(async () => {
    saleRepository = {
      create: jest.fn((data: Partial<HistoricalSale>) => ({ ...data })),
      save: jest.fn(async (sale: Partial<HistoricalSale>) => sale),
      find: jest.fn(async () => []),
      maximum: jest.fn(async (): Promise<number | null> => null),
    };

    moduleRef = await Test.createTestingModule({
      providers: [
        BlockchainService,
        AssetsService,
        NativeLedgerService,
        TokenLedgerService,
        PaymentProcessorService,
        RoyaltyConfigService,
        RoyaltyCalculatorService,
        MarketplaceEventsService,
        ListingRegistryService,
        TransferHookService,
        SalesHistoryService,
        MarketplaceService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            MARKETPLACE_ADDRESS: MARKETPLACE,
            ROYALTY_DEFAULT_BPS: '1000',
            ROYALTY_DEFAULT_RECIPIENT: CREATOR,
          }),
        },
        { provide: getRepositoryToken(HistoricalSale), useValue: saleRepository },
      ],
    }).compile();
    await moduleRef.init();

    marketplace = moduleRef.get(MarketplaceService);
    assets = moduleRef.get(AssetsService);
    nativeLedger = moduleRef.get(NativeLedgerService);
    tokenLedger = moduleRef.get(TokenLedgerService);
    events = moduleRef.get(MarketplaceEventsService);
    clock = jest.spyOn(moduleRef.get(BlockchainService), 'timestamp').mockReturnValue(NOW);

    assetId = assets.mint(SELLER);
    nativeLedger.deposit(BUYER, 1_000n);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('listing', () => {
    it('exposes the listed terms through getListing', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);

      expect(marketplace.getListing(assetId)).toEqual({
        salePrice: 100n,
        expiresAt: NOW + 1_000n,
        currency: ZeroAddress,
        historicalPrice: 0n,
      });
      expect(events.list()).toEqual([
        expect.objectContaining({
          sequence: 1,
          type: 'UpdateListing',
          assetId,
          seller: SELLER,
          salePrice: 100n,
          expiresAt: NOW + 1_000n,
          currency: NATIVE,
          historicalPrice: 0n,
        }),
      ]);
    });

    it('returns the sentinel for assets that were never listed', () => {
      expect(marketplace.getListing(42n)).toEqual({
        salePrice: 0n,
        expiresAt: 0n,
        currency: ZeroAddress,
        historicalPrice: 0n,
      });
    });

    it('overwrites the previous listing on relist', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);
      marketplace.listItem(assetId, 200n, NOW + 50n, NATIVE, SELLER, 30n);

      expect(marketplace.getListing(assetId)).toEqual({
        salePrice: 200n,
        expiresAt: NOW + 50n,
        currency: ZeroAddress,
        historicalPrice: 30n,
      });
    });

    it('refuses a zero price, a past expiry and strangers', () => {
      expect(captureError(() => marketplace.listItem(assetId, 0n, NOW + 1n, NATIVE, SELLER))).toMatchObject({
        code: 'SalePriceCannotBeZero',
      });
      expect(captureError(() => marketplace.listItem(assetId, 50n, NOW - 1n, NATIVE, SELLER))).toMatchObject({
        code: 'InvalidExpiresTimestamp',
      });
      expect(captureError(() => marketplace.listItem(assetId, 50n, NOW + 1n, NATIVE, OTHER))).toMatchObject({
        code: 'CallerIsntOwnerNorApproved',
      });
      expect(events.list()).toEqual([]);
    });

    it('accepts an expiry equal to the current time', () => {
      marketplace.listItem(assetId, 50n, NOW, NATIVE, SELLER);
      expect(marketplace.getListing(assetId).salePrice).toBe(50n);
    });

    it('lets an approved operator list on behalf of the owner', () => {
      assets.setApprovalForAll(SELLER, OTHER, true);
      marketplace.listItem(assetId, 70n, NOW + 10n, NATIVE, OTHER);

      expect(events.list()[0]).toMatchObject({ type: 'UpdateListing', seller: SELLER, salePrice: 70n });
    });

    it('hides the listing once it expires', () => {
      marketplace.listItem(assetId, 50n, NOW + 10n, NATIVE, SELLER);
      clock.mockReturnValue(NOW + 11n);

      expect(marketplace.getListing(assetId).salePrice).toBe(0n);
    });
  });

  describe('delisting', () => {
    it('resets the listing and emits a zeroed update', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);
      marketplace.delistItem(assetId, SELLER);

      expect(marketplace.getListing(assetId).salePrice).toBe(0n);
      expect(events.list()[1]).toMatchObject({
        type: 'UpdateListing',
        assetId,
        seller: SELLER,
        salePrice: 0n,
        expiresAt: 0n,
        currency: NATIVE,
        historicalPrice: 0n,
      });
    });

    it('refuses strangers and inactive listings', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);

      expect(captureError(() => marketplace.delistItem(assetId, OTHER))).toMatchObject({
        code: 'CallerIsntOwnerNorApproved',
      });

      marketplace.delistItem(assetId, SELLER);
      expect(captureError(() => marketplace.delistItem(assetId, SELLER))).toMatchObject({ code: 'InvalidListing' });
    });
  });

  describe('native purchase', () => {
    beforeEach(() => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);
    });

    it('splits the price between royalty and seller and hands the asset over', () => {
      const receipt = marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);

      expect(receipt).toMatchObject({
        seller: SELLER,
        buyer: BUYER,
        salePrice: 100n,
        royaltyRecipient: CREATOR,
        royaltyAmount: 10n,
        sellerProceeds: 90n,
      });
      expect(receipt.event).toMatchObject({ type: 'Purchased', sequence: 3, timestamp: NOW });
      expect(nativeLedger.balanceOf(CREATOR)).toBe(10n);
      expect(nativeLedger.balanceOf(SELLER)).toBe(90n);
      expect(nativeLedger.balanceOf(BUYER)).toBe(900n);
      expect(nativeLedger.balanceOf(MARKETPLACE)).toBe(0n);
      expect(assets.ownerOf(assetId)).toBe(BUYER);
      expect(marketplace.getListing(assetId).salePrice).toBe(0n);
      expect(events.list().map((event) => event.type)).toEqual(['UpdateListing', 'UpdateListing', 'Purchased']);
      expect(events.list()[2]).toMatchObject({
        type: 'Purchased',
        assetId,
        seller: SELLER,
        buyer: BUYER,
        salePrice: 100n,
        currency: NATIVE,
        royaltyAmount: 10n,
      });
    });

    it('records the committed sale in the price history', () => {
      marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);

      expect(saleRepository.save).toHaveBeenCalledTimes(1);
      expect(saleRepository.save).toHaveBeenCalledWith({
        assetId: '1',
        sellerAddress: SELLER,
        buyerAddress: BUYER,
        salePrice: '100',
        currency: ZeroAddress,
        royaltyAmount: '10',
        eventSequence: 3,
        timestamp: new Date(Number(NOW) * 1000),
      });
    });

    it('rejects a purchase at a different price', () => {
      expect(captureError(() => marketplace.buyItem(assetId, 95n, NATIVE, BUYER, 95n))).toMatchObject({
        code: 'InconsistentSalePrice',
      });
      expect(marketplace.getListing(assetId).salePrice).toBe(100n);
      expect(nativeLedger.balanceOf(BUYER)).toBe(1_000n);
    });

    it('rejects a purchase in a different currency', () => {
      const token = tokenLedger.deploy('USDT', 6, MARKETPLACE).address;
      expect(captureError(() => marketplace.buyItem(assetId, 100n, tokenCurrency(token), BUYER))).toMatchObject({
        code: 'InconsistentTokens',
      });
    });

    it('rejects an expired listing', () => {
      clock.mockReturnValue(NOW + 1_001n);
      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n))).toMatchObject({
        code: 'InvalidListing',
      });
      expect(assets.ownerOf(assetId)).toBe(SELLER);
    });

    it('requires the exact price to be attached', () => {
      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 99n))).toMatchObject({
        code: 'IncorrectValueSent',
      });
      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 101n))).toMatchObject({
        code: 'IncorrectValueSent',
      });
    });

    it('fails when the buyer cannot cover the attached value', () => {
      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, OTHER, 100n))).toMatchObject({
        code: 'InsufficientFunds',
      });
    });

    it('cannot be bought twice', () => {
      marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);
      nativeLedger.deposit(OTHER, 100n);

      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, OTHER, 100n))).toMatchObject({
        code: 'InconsistentSalePrice',
      });
      expect(assets.ownerOf(assetId)).toBe(BUYER);
    });

    it('charges royalty only on the appreciation', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER, 60n);
      const receipt = marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);

      expect(receipt.royaltyAmount).toBe(4n);
      expect(nativeLedger.balanceOf(SELLER)).toBe(96n);
    });

    it('pays no royalty when selling at or below cost', () => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER, 150n);
      const receipt = marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);

      expect(receipt).toMatchObject({ royaltyRecipient: CREATOR, royaltyAmount: 0n, sellerProceeds: 100n });
      expect(nativeLedger.balanceOf(CREATOR)).toBe(0n);
    });
  });

  describe('atomicity', () => {
    beforeEach(() => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);
    });

    it('unwinds the royalty leg when the seller leg fails', () => {
      nativeLedger.onReceive(SELLER, () => false);

      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n))).toMatchObject({
        code: 'PaymentTransferFailed',
      });
      expect(nativeLedger.balanceOf(CREATOR)).toBe(0n);
      expect(nativeLedger.balanceOf(BUYER)).toBe(1_000n);
      expect(nativeLedger.balanceOf(MARKETPLACE)).toBe(0n);
      expect(assets.ownerOf(assetId)).toBe(SELLER);
      expect(marketplace.getListing(assetId).salePrice).toBe(100n);
      expect(events.list()).toHaveLength(1);
      expect(saleRepository.save).not.toHaveBeenCalled();
    });

    it('reports a refused re-entry as 423 Locked', () => {
      let reentryError: unknown;
      nativeLedger.onReceive(SELLER, () => {
        reentryError = captureError(() => marketplace.delistItem(assetId, SELLER));
        return false;
      });

      captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n));

      expect(reentryError).toBeInstanceOf(MarketplaceException);
      if (reentryError instanceof MarketplaceException) {
        expect(reentryError.code).toBe('ReentrantCall');
        expect(reentryError.getStatus()).toBe(423);
      }
    });

    it('refuses a payment recipient that re-enters to relist', () => {
      let reentryError: unknown;
      const unregister = nativeLedger.onReceive(SELLER, () => {
        reentryError = captureError(() => marketplace.listItem(assetId, 1n, NOW + 5n, NATIVE, SELLER));
        throw reentryError;
      });

      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n))).toMatchObject({
        code: 'PaymentTransferFailed',
      });
      expect(reentryError).toMatchObject({ code: 'ReentrantCall' });
      expect(marketplace.getListing(assetId).salePrice).toBe(100n);
      expect(assets.ownerOf(assetId)).toBe(SELLER);

      unregister();
      marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n);
      expect(assets.ownerOf(assetId)).toBe(BUYER);
    });

    it('refuses a royalty recipient that re-enters to buy', () => {
      nativeLedger.deposit(OTHER, 100n);
      let reentryError: unknown;
      nativeLedger.onReceive(CREATOR, () => {
        reentryError = captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, OTHER, 100n));
        return false;
      });

      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n))).toMatchObject({
        code: 'PaymentTransferFailed',
      });
      expect(reentryError).toMatchObject({ code: 'ReentrantCall' });
      expect(nativeLedger.balanceOf(OTHER)).toBe(100n);
    });
  });

  describe('token purchase', () => {
    let token: string;

    beforeEach(() => {
      token = tokenLedger.deploy('USDT', 6, MARKETPLACE).address;
      tokenLedger.mint(token, BUYER, 1_000n);
      marketplace.listItem(assetId, 100n, NOW + 1_000n, tokenCurrency(token), SELLER);
    });

    it('pulls both legs straight from the buyer', () => {
      tokenLedger.approve(token, BUYER, MARKETPLACE, 100n);

      const receipt = marketplace.buyItem(assetId, 100n, tokenCurrency(token), BUYER, 5n);

      expect(receipt.royaltyAmount).toBe(10n);
      expect(tokenLedger.balanceOf(token, CREATOR)).toBe(10n);
      expect(tokenLedger.balanceOf(token, SELLER)).toBe(90n);
      expect(tokenLedger.balanceOf(token, BUYER)).toBe(900n);
      expect(tokenLedger.balanceOf(token, MARKETPLACE)).toBe(0n);
      expect(tokenLedger.allowance(token, BUYER, MARKETPLACE)).toBe(0n);
      expect(nativeLedger.balanceOf(BUYER)).toBe(1_000n);
      expect(assets.ownerOf(assetId)).toBe(BUYER);
    });

    it('requires an allowance covering the price', () => {
      tokenLedger.approve(token, BUYER, MARKETPLACE, 99n);

      expect(captureError(() => marketplace.buyItem(assetId, 100n, tokenCurrency(token), BUYER))).toMatchObject({
        code: 'InsufficientAllowance',
      });
    });

    it('unwinds the royalty leg when the buyer runs short mid-purchase', () => {
      const poorBuyer = OTHER;
      tokenLedger.mint(token, poorBuyer, 95n);
      tokenLedger.approve(token, poorBuyer, MARKETPLACE, 100n);

      expect(captureError(() => marketplace.buyItem(assetId, 100n, tokenCurrency(token), poorBuyer))).toMatchObject({
        code: 'PaymentTransferFailed',
      });
      expect(tokenLedger.balanceOf(token, CREATOR)).toBe(0n);
      expect(tokenLedger.balanceOf(token, poorBuyer)).toBe(95n);
      expect(tokenLedger.allowance(token, poorBuyer, MARKETPLACE)).toBe(100n);
      expect(assets.ownerOf(assetId)).toBe(SELLER);
    });
  });

  describe('transfers outside the marketplace', () => {
    beforeEach(() => {
      marketplace.listItem(assetId, 100n, NOW + 1_000n, NATIVE, SELLER);
    });

    it('invalidate the listing on a direct transfer', () => {
      assets.transferFrom(SELLER, SELLER, OTHER, assetId);

      expect(marketplace.getListing(assetId).salePrice).toBe(0n);
      expect(captureError(() => marketplace.buyItem(assetId, 100n, NATIVE, BUYER, 100n))).toMatchObject({
        code: 'InconsistentSalePrice',
      });
      expect(assets.ownerOf(assetId)).toBe(OTHER);
    });

    it('invalidate the listing on a burn', () => {
      assets.burn(SELLER, assetId);

      expect(marketplace.getListing(assetId).salePrice).toBe(0n);
      expect(events.list()[1]).toMatchObject({ type: 'UpdateListing', seller: SELLER, salePrice: 0n });
    });

    it('leave expired listings alone without emitting', () => {
      clock.mockReturnValue(NOW + 2_000n);
      assets.transferFrom(SELLER, SELLER, OTHER, assetId);

      expect(events.list()).toHaveLength(1);
    });
  });
});
