import { Address, ZeroAddress } from '../../common/addresses';
import { Currency, currencyAddress } from '../payments/currency';

/** Sale terms attached to an asset. Absence of a record means "not listed". */
export interface Listing {
  salePrice: bigint;
  expiresAt: bigint;
  currency: Currency;
  historicalPrice: bigint;
}

/** External tuple form: all zeros when there is no active listing. */
export interface ListingView {
  salePrice: bigint;
  expiresAt: bigint;
  currency: Address;
  historicalPrice: bigint;
}

export const EMPTY_LISTING_VIEW: Readonly<ListingView> = Object.freeze({
  salePrice: 0n,
  expiresAt: 0n,
  currency: ZeroAddress,
  historicalPrice: 0n,
});

export function toListingView(listing: Listing | null): ListingView {
  if (!listing) {
    return { ...EMPTY_LISTING_VIEW };
  }
  return {
    salePrice: listing.salePrice,
    expiresAt: listing.expiresAt,
    currency: currencyAddress(listing.currency),
    historicalPrice: listing.historicalPrice,
  };
}
