import { Body, Controller, ForbiddenException, Get, Logger, Param, Put, Query } from '@nestjs/common';
import { sameAddress } from '../../common/addresses';
import { parseUnsigned } from '../../common/amounts';
import { Caller } from '../../common/decorators/caller.decorator';
import { ParseBigIntPipe } from '../../common/pipes/parse-bigint.pipe';
import { RoyaltyConfigDto, RoyaltyQuoteDto, SetRoyaltyDto } from './dto/royalty.dto';
import { RoyaltyCalculatorService } from './royalty-calculator.service';
import { RoyaltyConfigService } from './royalty-config.service';

@Controller('royalties')
export class RoyaltiesController {
  private readonly logger = new Logger(RoyaltiesController.name);

  constructor(
    private readonly royaltyConfig: RoyaltyConfigService,
    private readonly royaltyCalculator: RoyaltyCalculatorService,
  ) {}

  @Get(':assetId')
  getRoyalty(@Param('assetId', ParseBigIntPipe) assetId: bigint): RoyaltyConfigDto {
    return { assetId: assetId.toString(), ...this.royaltyConfig.getConfig(assetId) };
  }

  @Put(':assetId')
  setRoyalty(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Body() dto: SetRoyaltyDto,
    @Caller() caller: string,
  ): RoyaltyConfigDto {
    this.logger.log(`PUT /royalties/${assetId} called by ${caller}`);
    if (!sameAddress(caller, this.royaltyConfig.admin)) {
      throw new ForbiddenException('Only the royalty admin can change royalty settings');
    }
    return { assetId: assetId.toString(), ...this.royaltyConfig.setRoyalty(assetId, dto.recipient, dto.basisPoints) };
  }

  @Get(':assetId/quote')
  quote(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Query('salePrice') salePrice?: string,
    @Query('historicalPrice') historicalPrice?: string,
  ): RoyaltyQuoteDto {
    const quote = this.royaltyCalculator.compute(
      assetId,
      parseUnsigned(salePrice ?? '', 'salePrice'),
      parseUnsigned(historicalPrice ?? '0', 'historicalPrice'),
    );
    return {
      assetId: assetId.toString(),
      recipient: quote.recipient,
      amount: quote.amount.toString(),
      taxableBasis: quote.taxableBasis.toString(),
    };
  }
}
