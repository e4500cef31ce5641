import { MaxUint256 } from 'ethers';
import { Address } from '../../common/addresses';
import { NativeLedgerService } from './native-ledger.service';
import { TokenLedgerService } from './token-ledger.service';

/** One way of moving value. Each currency kind has its own rail. `pay` may throw for an unknown token. */
export interface PaymentRail {
  pay(amount: bigint, payer: Address, recipient: Address): boolean;
  /** How much `owner` has authorised the marketplace to pull. */
  allowance(owner: Address): bigint;
}

export class NativeRail implements PaymentRail {
  constructor(private readonly ledger: NativeLedgerService) {}

  pay(amount: bigint, payer: Address, recipient: Address): boolean {
    return this.ledger.send(payer, recipient, amount);
  }

  // Native value is attached to the call, never pulled.
  allowance(): bigint {
    return MaxUint256;
  }
}

export class TokenRail implements PaymentRail {
  constructor(
    private readonly ledger: TokenLedgerService,
    private readonly token: Address,
    private readonly spender: Address,
  ) {}

  pay(amount: bigint, payer: Address, recipient: Address): boolean {
    return this.ledger.transferFrom(this.token, this.spender, payer, recipient, amount);
  }

  allowance(owner: Address): bigint {
    return this.ledger.allowance(this.token, owner, this.spender);
  }
}
