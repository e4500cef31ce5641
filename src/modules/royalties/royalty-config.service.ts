import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BlockchainService } from '../blockchain/blockchain.service';
import { JournaledMap } from '../blockchain/journaled-map';
import { Address, DEFAULT_MARKETPLACE_ADDRESS, isZeroAddress, normalizeAddress, ZeroAddress } from '../../common/addresses';

export const MAX_ROYALTY_BPS = 10_000;
const BPS_DENOMINATOR = 10_000n;

export interface RoyaltyConfig {
  recipient: Address;
  basisPoints: number;
}

export interface RoyaltyInfo {
  recipient: Address;
  amount: bigint;
}

/** Per-asset royalty rate and recipient, falling back to the configured default. */
@Injectable()
export class RoyaltyConfigService {
  private readonly logger = new Logger(RoyaltyConfigService.name);
  private readonly perAsset: JournaledMap<string, RoyaltyConfig>;
  private readonly defaultConfig: RoyaltyConfig;

  /** Account allowed to change royalty settings. */
  readonly admin: Address;

  constructor(chain: BlockchainService, configService: ConfigService) {
    this.perAsset = new JournaledMap(chain);
    this.defaultConfig = this.validate(
      configService.get<string>('ROYALTY_DEFAULT_RECIPIENT', ZeroAddress),
      Number(configService.get<string>('ROYALTY_DEFAULT_BPS', '0')),
    );
    this.admin = normalizeAddress(
      configService.get<string>(
        'ROYALTY_ADMIN_ADDRESS',
        configService.get<string>('MARKETPLACE_ADDRESS', DEFAULT_MARKETPLACE_ADDRESS),
      ),
      'ROYALTY_ADMIN_ADDRESS',
    );
  }

  getConfig(assetId: bigint): RoyaltyConfig {
    return this.perAsset.get(assetId.toString()) ?? this.defaultConfig;
  }

  setRoyalty(assetId: bigint, recipient: string, basisPoints: number): RoyaltyConfig {
    const config = this.validate(recipient, basisPoints);
    this.perAsset.set(assetId.toString(), config);
    this.logger.log(`Royalty for asset #${assetId} set to ${basisPoints} bps paid to ${config.recipient}`);
    return config;
  }

  clearRoyalty(assetId: bigint): void {
    this.perAsset.delete(assetId.toString());
  }

  /** Royalty owed on `price` (floor of price × rate). */
  royaltyInfo(assetId: bigint, price: bigint): RoyaltyInfo {
    const { recipient, basisPoints } = this.getConfig(assetId);
    return { recipient, amount: (price * BigInt(basisPoints)) / BPS_DENOMINATOR };
  }

  private validate(recipient: string, basisPoints: number): RoyaltyConfig {
    if (!Number.isInteger(basisPoints) || basisPoints < 0 || basisPoints > MAX_ROYALTY_BPS) {
      throw new BadRequestException(`Royalty must be an integer between 0 and ${MAX_ROYALTY_BPS} bps`);
    }
    const normalized = normalizeAddress(recipient, 'royalty recipient');
    if (basisPoints > 0 && isZeroAddress(normalized)) {
      throw new BadRequestException('A non-zero royalty needs a recipient');
    }
    return { recipient: normalized, basisPoints };
  }
}
