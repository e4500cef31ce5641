import { Module } from '@nestjs/common';
import { NativeLedgerService } from './native-ledger.service';
import { TokenLedgerService } from './token-ledger.service';
import { PaymentProcessorService } from './payment-processor.service';
import { PaymentsController } from './payments.controller';

@Module({
  controllers: [PaymentsController],
  providers: [NativeLedgerService, TokenLedgerService, PaymentProcessorService],
  exports: [NativeLedgerService, TokenLedgerService, PaymentProcessorService],
})
export class PaymentsModule {}
