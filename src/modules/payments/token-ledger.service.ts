import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { getCreateAddress } from 'ethers';
import { BlockchainService } from '../blockchain/blockchain.service';
import { JournaledMap } from '../blockchain/journaled-map';
import { Address, normalizeAddress } from '../../common/addresses';

export interface TokenInfo {
  address: Address;
  symbol: string;
  decimals: number;
  /** Only account allowed to mint through the API. */
  deployer: Address;
}

interface TokenState extends TokenInfo {
  balances: JournaledMap<string, bigint>;
  allowances: JournaledMap<string, bigint>;
}

/**
 * Fungible token contracts with balance and allowance bookkeeping.
 * `transferFrom` follows the non-reverting convention: shortfalls return `false`.
 */
@Injectable()
export class TokenLedgerService {
  private readonly logger = new Logger(TokenLedgerService.name);
  private readonly tokens = new Map<string, TokenState>();
  private deployNonce = 0;

  constructor(private readonly chain: BlockchainService) {}

  deploy(symbol: string, decimals: number, deployer: Address): TokenInfo {
    const address = getCreateAddress({ from: deployer, nonce: this.deployNonce++ });
    const token: TokenState = {
      address,
      symbol,
      decimals,
      deployer: normalizeAddress(deployer, 'deployer'),
      balances: new JournaledMap(this.chain),
      allowances: new JournaledMap(this.chain),
    };
    this.tokens.set(address.toLowerCase(), token);
    this.logger.log(`Deployed token ${symbol} at ${address}`);
    return this.describe(token);
  }

  getToken(token: Address): TokenInfo {
    return this.describe(this.requireToken(token));
  }

  list(): TokenInfo[] {
    return [...this.tokens.values()].map((token) => this.describe(token));
  }

  mint(token: Address, to: Address, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new BadRequestException('Mint amount must be positive');
    }
    const state = this.requireToken(token);
    const account = normalizeAddress(to, 'to').toLowerCase();
    const balance = (state.balances.get(account) ?? 0n) + amount;
    this.chain.atomic(() => state.balances.set(account, balance));
    return balance;
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.requireToken(token).balances.get(account.toLowerCase()) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.requireToken(token).allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    const state = this.requireToken(token);
    const key = this.allowanceKey(owner, normalizeAddress(spender, 'spender'));
    this.chain.atomic(() => state.allowances.set(key, amount));
    this.logger.log(`${owner} approved ${spender} for ${amount} ${state.symbol}`);
  }

  transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): boolean {
    const state = this.requireToken(token);
    const key = this.allowanceKey(from, spender);
    const allowed = state.allowances.get(key) ?? 0n;
    const available = state.balances.get(from.toLowerCase()) ?? 0n;
    if (allowed < amount || available < amount) {
      this.logger.warn(
        `transferFrom of ${amount} ${state.symbol} from ${from} refused (allowance ${allowed}, balance ${available})`,
      );
      return false;
    }
    this.chain.atomic(() => {
      state.allowances.set(key, allowed - amount);
      state.balances.set(from.toLowerCase(), available - amount);
      state.balances.set(to.toLowerCase(), (state.balances.get(to.toLowerCase()) ?? 0n) + amount);
    });
    return true;
  }

  private requireToken(token: Address): TokenState {
    const state = this.tokens.get(token.toLowerCase());
    if (!state) {
      throw new NotFoundException(`Unknown token ${token}`);
    }
    return state;
  }

  private describe({ address, symbol, decimals, deployer }: TokenState): TokenInfo {
    return { address, symbol, decimals, deployer };
  }

  private allowanceKey(owner: Address, spender: Address): string {
    return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
  }
}
