import { Injectable } from '@nestjs/common';
import { Address } from '../../common/addresses';
import { RoyaltyConfigService } from './royalty-config.service';

export interface RoyaltyQuote {
  recipient: Address;
  amount: bigint;
  /** Appreciation the rate was applied to. */
  taxableBasis: bigint;
}

/**
 * Value-added royalty: the configured rate applies only to the part of the
 * sale price above what the seller paid.
 */
@Injectable()
export class RoyaltyCalculatorService {
  constructor(private readonly royaltyConfig: RoyaltyConfigService) {}

  compute(assetId: bigint, salePrice: bigint, historicalPrice: bigint): RoyaltyQuote {
    const taxableBasis = salePrice > historicalPrice ? salePrice - historicalPrice : 0n;
    const { recipient, amount } = this.royaltyConfig.royaltyInfo(assetId, taxableBasis);
    return { recipient, amount, taxableBasis };
  }
}
