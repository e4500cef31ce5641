import { IsBoolean, IsEthereumAddress, IsOptional } from 'class-validator';

export class MintAssetDto {
  @IsEthereumAddress()
  to!: string;
}

export class TransferAssetDto {
  @IsEthereumAddress()
  from!: string;

  @IsEthereumAddress()
  to!: string;
}

export class ApproveAssetDto {
  // Omitted or the zero address clears the approval
  @IsOptional()
  @IsEthereumAddress()
  approved?: string;
}

export class SetOperatorDto {
  @IsEthereumAddress()
  operator!: string;

  @IsBoolean()
  approved!: boolean;
}

export class AssetDto {
  assetId!: string;
  owner!: string;
  approved!: string | null;
}
