import { Body, Controller, ForbiddenException, Get, Logger, Param, Post } from '@nestjs/common';
import { ZeroAddress, normalizeAddress, sameAddress } from '../../common/addresses';
import { parseUnsigned } from '../../common/amounts';
import { Caller } from '../../common/decorators/caller.decorator';
import { ApproveTokenDto, BalanceDto, DeployTokenDto, DepositDto, MintTokenDto } from './dto/payment.dto';
import { NativeLedgerService } from './native-ledger.service';
import { PaymentProcessorService } from './payment-processor.service';
import { TokenInfo, TokenLedgerService } from './token-ledger.service';

@Controller('payments')
export class PaymentsController {
  private readonly logger = new Logger(PaymentsController.name);

  constructor(
    private readonly nativeLedger: NativeLedgerService,
    private readonly tokenLedger: TokenLedgerService,
    private readonly paymentProcessor: PaymentProcessorService,
  ) {}

  // Development faucet
  @Post('native/deposit')
  deposit(@Body() dto: DepositDto): BalanceDto {
    const account = normalizeAddress(dto.account, 'account');
    this.logger.log(`POST /payments/native/deposit called for ${account}`);
    const balance = this.nativeLedger.deposit(account, parseUnsigned(dto.amount, 'amount'));
    return { account, currency: ZeroAddress, balance: balance.toString() };
  }

  @Get('native/:account')
  nativeBalance(@Param('account') account: string): BalanceDto {
    const normalized = normalizeAddress(account, 'account');
    return { account: normalized, currency: ZeroAddress, balance: this.nativeLedger.balanceOf(normalized).toString() };
  }

  @Get('tokens')
  listTokens(): TokenInfo[] {
    return this.tokenLedger.list();
  }

  @Post('tokens')
  deployToken(@Body() dto: DeployTokenDto, @Caller() caller: string): TokenInfo {
    this.logger.log(`POST /payments/tokens called by ${caller} for ${dto.symbol}`);
    return this.tokenLedger.deploy(dto.symbol, dto.decimals, caller);
  }

  @Post('tokens/:token/mint')
  mintToken(@Param('token') token: string, @Body() dto: MintTokenDto, @Caller() caller: string): BalanceDto {
    const address = normalizeAddress(token, 'token');
    const { deployer, symbol } = this.tokenLedger.getToken(address);
    if (!sameAddress(caller, deployer)) {
      throw new ForbiddenException(`Only the deployer of ${symbol} can mint it`);
    }
    const to = normalizeAddress(dto.to, 'to');
    this.logger.log(`POST /payments/tokens/${address}/mint called by ${caller}`);
    const balance = this.tokenLedger.mint(address, to, parseUnsigned(dto.amount, 'amount'));
    return { account: to, currency: address, balance: balance.toString() };
  }

  @Post('tokens/:token/approve')
  approveToken(@Param('token') token: string, @Body() dto: ApproveTokenDto, @Caller() caller: string): BalanceDto {
    const address = normalizeAddress(token, 'token');
    const spender = dto.spender ? normalizeAddress(dto.spender, 'spender') : this.paymentProcessor.operator;
    this.tokenLedger.approve(address, caller, spender, parseUnsigned(dto.amount, 'amount'));
    return this.tokenBalance(address, caller);
  }

  @Get('tokens/:token/:account')
  tokenBalance(@Param('token') token: string, @Param('account') account: string): BalanceDto {
    const address = normalizeAddress(token, 'token');
    const owner = normalizeAddress(account, 'account');
    return {
      account: owner,
      currency: address,
      balance: this.tokenLedger.balanceOf(address, owner).toString(),
      allowance: this.tokenLedger.allowance(address, owner, this.paymentProcessor.operator).toString(),
    };
  }
}
