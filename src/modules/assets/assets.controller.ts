import { Body, Controller, Get, HttpCode, Logger, Param, Post } from '@nestjs/common';
import { AssetsService } from './assets.service';
import { ApproveAssetDto, AssetDto, MintAssetDto, SetOperatorDto, TransferAssetDto } from './dto/asset.dto';
import { Caller } from '../../common/decorators/caller.decorator';
import { ParseBigIntPipe } from '../../common/pipes/parse-bigint.pipe';
import { normalizeAddress } from '../../common/addresses';

@Controller('assets')
export class AssetsController {
  private readonly logger = new Logger(AssetsController.name);

  constructor(private readonly assetsService: AssetsService) {}

  @Post()
  mint(@Body() dto: MintAssetDto): AssetDto {
    this.logger.log(`POST /assets called for ${dto.to}`);
    const assetId = this.assetsService.mint(dto.to);
    return this.describe(assetId);
  }

  @Get(':assetId')
  findOne(@Param('assetId', ParseBigIntPipe) assetId: bigint): AssetDto {
    return this.describe(assetId);
  }

  @Post(':assetId/transfer')
  @HttpCode(200)
  transfer(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Body() dto: TransferAssetDto,
    @Caller() caller: string,
  ): AssetDto {
    this.logger.log(`POST /assets/${assetId}/transfer called by ${caller}`);
    this.assetsService.transferFrom(
      caller,
      normalizeAddress(dto.from, 'from'),
      normalizeAddress(dto.to, 'to'),
      assetId,
    );
    return this.describe(assetId);
  }

  @Post(':assetId/approve')
  @HttpCode(200)
  approve(
    @Param('assetId', ParseBigIntPipe) assetId: bigint,
    @Body() dto: ApproveAssetDto,
    @Caller() caller: string,
  ): AssetDto {
    this.assetsService.approve(caller, dto.approved ?? null, assetId);
    return this.describe(assetId);
  }

  @Post('operators')
  @HttpCode(200)
  setOperator(@Body() dto: SetOperatorDto, @Caller() caller: string): { owner: string; operator: string; approved: boolean } {
    this.assetsService.setApprovalForAll(caller, dto.operator, dto.approved);
    const operator = normalizeAddress(dto.operator, 'operator');
    return { owner: caller, operator, approved: this.assetsService.isApprovedForAll(caller, operator) };
  }

  private describe(assetId: bigint): AssetDto {
    return {
      assetId: assetId.toString(),
      owner: this.assetsService.ownerOf(assetId),
      approved: this.assetsService.getApproved(assetId),
    };
  }
}
