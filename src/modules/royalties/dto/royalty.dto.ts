import { IsEthereumAddress, IsInt, Max, Min } from 'class-validator';
import { MAX_ROYALTY_BPS } from '../royalty-config.service';

export class SetRoyaltyDto {
  @IsEthereumAddress()
  recipient!: string;

  @IsInt()
  @Min(0)
  @Max(MAX_ROYALTY_BPS)
  basisPoints!: number;
}

export class RoyaltyConfigDto {
  assetId!: string;
  recipient!: string;
  basisPoints!: number;
}

export class RoyaltyQuoteDto {
  assetId!: string;
  recipient!: string;
  amount!: string;
  taxableBasis!: string;
}
