import { Module } from '@nestjs/common';
import { RoyaltyConfigService } from './royalty-config.service';
import { RoyaltyCalculatorService } from './royalty-calculator.service';
import { RoyaltiesController } from './royalties.controller';

@Module({
  controllers: [RoyaltiesController],
  providers: [RoyaltyConfigService, RoyaltyCalculatorService],
  exports: [RoyaltyConfigService, RoyaltyCalculatorService],
})
export class RoyaltiesModule {}
