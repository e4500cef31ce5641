import { IsEthereumAddress, IsInt, IsNotEmpty, IsNumberString, IsOptional, IsString, Max, Min } from 'class-validator';

export class DepositDto {
  @IsEthereumAddress()
  account!: string;

  @IsNumberString({ no_symbols: true })
  amount!: string; // smallest native unit
}

export class DeployTokenDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsInt()
  @Min(0)
  @Max(36)
  decimals!: number;
}

export class MintTokenDto {
  @IsEthereumAddress()
  to!: string;

  @IsNumberString({ no_symbols: true })
  amount!: string;
}

export class ApproveTokenDto {
  // Defaults to the marketplace account
  @IsOptional()
  @IsEthereumAddress()
  spender?: string;

  @IsNumberString({ no_symbols: true })
  amount!: string;
}

export class BalanceDto {
  account!: string;
  currency!: string;
  balance!: string;
  allowance?: string;
}
