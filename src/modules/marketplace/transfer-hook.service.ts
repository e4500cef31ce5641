import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { AssetsService } from '../assets/assets.service';
import { ListingRegistryService } from './listing-registry.service';

/**
 * Clears the listing of an asset whenever its owner changes, whichever path
 * the transfer takes, so a listing never outlives the ownership it was made under.
 */
@Injectable()
export class TransferHookService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TransferHookService.name);
  private unregister: (() => void) | null = null;

  constructor(
    private readonly assets: AssetsService,
    private readonly listingRegistry: ListingRegistryService,
  ) {}

  onModuleInit() {
    this.unregister = this.assets.onBeforeTransfer((assetId) => this.beforeTransfer(assetId));
    this.logger.log('Registered pre-transfer hook with the ownership ledger');
  }

  onModuleDestroy() {
    this.unregister?.();
    this.unregister = null;
  }

  beforeTransfer(assetId: bigint): void {
    if (this.listingRegistry.isActive(assetId)) {
      this.listingRegistry.invalidate(assetId);
    }
  }
}
