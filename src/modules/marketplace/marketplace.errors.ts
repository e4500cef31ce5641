import { HttpException, HttpStatus } from '@nestjs/common';

export type MarketplaceErrorCode =
  | 'SalePriceCannotBeZero'
  | 'InvalidExpiresTimestamp'
  | 'CallerIsntOwnerNorApproved'
  | 'InconsistentSalePrice'
  | 'InconsistentTokens'
  | 'InvalidListing'
  | 'IncorrectValueSent'
  | 'InsufficientAllowance'
  | 'InsufficientFunds'
  | 'PaymentTransferFailed'
  | 'ReentrantCall';

// 423 Locked has no HttpStatus member.
const LOCKED = 423;

const STATUS: Record<MarketplaceErrorCode, number> = {
  SalePriceCannotBeZero: HttpStatus.BAD_REQUEST,
  InvalidExpiresTimestamp: HttpStatus.BAD_REQUEST,
  CallerIsntOwnerNorApproved: HttpStatus.FORBIDDEN,
  InconsistentSalePrice: HttpStatus.CONFLICT,
  InconsistentTokens: HttpStatus.CONFLICT,
  InvalidListing: HttpStatus.CONFLICT,
  IncorrectValueSent: HttpStatus.BAD_REQUEST,
  InsufficientAllowance: HttpStatus.PAYMENT_REQUIRED,
  InsufficientFunds: HttpStatus.PAYMENT_REQUIRED,
  PaymentTransferFailed: HttpStatus.PAYMENT_REQUIRED,
  ReentrantCall: LOCKED,
};

/** A named protocol failure. The operation that raised it left no trace. */
export class MarketplaceException extends HttpException {
  constructor(
    readonly code: MarketplaceErrorCode,
    message: string,
  ) {
    super({ statusCode: STATUS[code], error: code, message }, STATUS[code]);
  }
}
