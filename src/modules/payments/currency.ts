import { Address, isZeroAddress, normalizeAddress, sameAddress, ZeroAddress } from '../../common/addresses';

export type NativeCurrency = { readonly kind: 'native' };
export type TokenCurrency = { readonly kind: 'token'; readonly address: Address };
export type Currency = NativeCurrency | TokenCurrency;

export const NATIVE: NativeCurrency = { kind: 'native' };

export function tokenCurrency(address: string): TokenCurrency {
  return { kind: 'token', address: normalizeAddress(address, 'token') };
}

// Wire form: the zero address stands for the native currency.
export function currencyFromAddress(value: string): Currency {
  const address = normalizeAddress(value, 'currency');
  return isZeroAddress(address) ? NATIVE : { kind: 'token', address };
}

export function currencyAddress(currency: Currency): Address {
  return currency.kind === 'native' ? ZeroAddress : currency.address;
}

export function sameCurrency(a: Currency, b: Currency): boolean {
  if (a.kind === 'native' || b.kind === 'native') {
    return a.kind === b.kind;
  }
  return sameAddress(a.address, b.address);
}

export function describeCurrency(currency: Currency): string {
  return currency.kind === 'native' ? 'native' : `token ${currency.address}`;
}
