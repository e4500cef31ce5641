import { IsEthereumAddress, IsNumberString, IsOptional } from 'class-validator';

export class ListItemDto {
  @IsNumberString({ no_symbols: true })
  salePrice!: string; // Smallest unit of the currency

  @IsNumberString({ no_symbols: true })
  expiresAt!: string; // Seconds since epoch

  @IsEthereumAddress()
  currency!: string; // Zero address for native

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  historicalPrice?: string;
}

export class BuyItemDto {
  @IsNumberString({ no_symbols: true })
  expectedSalePrice!: string;

  @IsEthereumAddress()
  expectedCurrency!: string;

  // Native value sent with the purchase
  @IsOptional()
  @IsNumberString({ no_symbols: true })
  value?: string;
}

export class ListingDto {
  assetId!: string;
  salePrice!: string;
  expiresAt!: string;
  currency!: string;
  historicalPrice!: string;
  active!: boolean;
}

export class PurchaseDto {
  assetId!: string;
  seller!: string;
  buyer!: string;
  salePrice!: string;
  currency!: string;
  royaltyRecipient!: string;
  royaltyAmount!: string;
  sellerProceeds!: string;
}

export class MarketplaceEventDto {
  sequence!: number;
  type!: 'UpdateListing' | 'Purchased';
  timestamp!: string;
  assetId!: string;
  seller!: string;
  buyer?: string;
  salePrice!: string;
  expiresAt?: string;
  currency!: string;
  historicalPrice?: string;
  royaltyAmount?: string;
}
