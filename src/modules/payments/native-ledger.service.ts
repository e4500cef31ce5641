import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { BlockchainService } from '../blockchain/blockchain.service';
import { JournaledMap } from '../blockchain/journaled-map';
import { Address } from '../../common/addresses';

export interface IncomingPayment {
  from: Address;
  amount: bigint;
}

/**
 * Code an account runs when native currency arrives. Returning `false` or
 * throwing rejects the payment; anything else accepts it.
 */
export type ReceiveHandler = (payment: IncomingPayment) => boolean | void;

@Injectable()
export class NativeLedgerService {
  private readonly logger = new Logger(NativeLedgerService.name);
  private readonly balances: JournaledMap<string, bigint>;
  private readonly receivers = new Map<string, ReceiveHandler>();

  constructor(private readonly chain: BlockchainService) {
    this.balances = new JournaledMap(chain);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  deposit(account: Address, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new BadRequestException('Deposit amount must be positive');
    }
    const balance = this.balanceOf(account) + amount;
    this.chain.atomic(() => this.balances.set(account.toLowerCase(), balance));
    this.logger.log(`Deposited ${amount} native units to ${account}`);
    return balance;
  }

  onReceive(account: Address, handler: ReceiveHandler): () => void {
    const key = account.toLowerCase();
    this.receivers.set(key, handler);
    return () => {
      if (this.receivers.get(key) === handler) {
        this.receivers.delete(key);
      }
    };
  }

  /**
   * Moves `amount` and runs the recipient's receive handler. Reports `false`
   * with every effect of the attempt reverted if the payer is short or the
   * recipient rejects.
   */
  send(from: Address, to: Address, amount: bigint): boolean {
    if (amount === 0n) {
      return true;
    }
    try {
      this.chain.atomic(() => {
        const available = this.balanceOf(from);
        if (available < amount) {
          throw new Error(`balance ${available} is below ${amount}`);
        }
        this.balances.set(from.toLowerCase(), available - amount);
        this.balances.set(to.toLowerCase(), this.balanceOf(to) + amount);
        const handler = this.receivers.get(to.toLowerCase());
        if (handler && handler({ from, amount }) === false) {
          throw new Error(`${to} rejected the payment`);
        }
      });
      this.logger.debug(`Sent ${amount} native units from ${from} to ${to}`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Native payment of ${amount} from ${from} to ${to} failed: ${message}`);
      return false;
    }
  }
}
