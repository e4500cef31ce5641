import { Module, Global } from '@nestjs/common';
import { BlockchainService } from './blockchain.service';

@Global() // Every ledger journals through the same execution context
@Module({
  providers: [BlockchainService],
  exports: [BlockchainService],
})
export class BlockchainModule {}
