import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Address, DEFAULT_MARKETPLACE_ADDRESS, normalizeAddress } from '../../common/addresses';
import { Currency, describeCurrency } from './currency';
import { NativeLedgerService } from './native-ledger.service';
import { NativeRail, PaymentRail, TokenRail } from './payment-rail';
import { TokenLedgerService } from './token-ledger.service';

@Injectable()
export class PaymentProcessorService {
  private readonly logger = new Logger(PaymentProcessorService.name);
  private readonly nativeRail: NativeRail;

  /** The marketplace's own account: native escrow and token spender. */
  readonly operator: Address;

  constructor(
    nativeLedger: NativeLedgerService,
    private readonly tokenLedger: TokenLedgerService,
    configService: ConfigService,
  ) {
    this.operator = normalizeAddress(
      configService.get<string>('MARKETPLACE_ADDRESS', DEFAULT_MARKETPLACE_ADDRESS),
      'MARKETPLACE_ADDRESS',
    );
    this.nativeRail = new NativeRail(nativeLedger);
  }

  /** Moves `amount` from `payer` to `recipient`. A zero amount always succeeds. */
  pay(amount: bigint, payer: Address, recipient: Address, currency: Currency): boolean {
    if (amount === 0n) {
      return true;
    }
    let ok: boolean;
    try {
      ok = this.railFor(currency).pay(amount, payer, recipient);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Payment in ${describeCurrency(currency)} could not be attempted: ${message}`);
      return false;
    }
    if (ok) {
      this.logger.debug(`Paid ${amount} (${describeCurrency(currency)}) from ${payer} to ${recipient}`);
    } else {
      this.logger.warn(`Payment of ${amount} (${describeCurrency(currency)}) from ${payer} to ${recipient} failed`);
    }
    return ok;
  }

  allowance(currency: Currency, owner: Address): bigint {
    return this.railFor(currency).allowance(owner);
  }

  private railFor(currency: Currency): PaymentRail {
    switch (currency.kind) {
      case 'native':
        return this.nativeRail;
      case 'token':
        return new TokenRail(this.tokenLedger, currency.address, this.operator);
    }
  }
}
