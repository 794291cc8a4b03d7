import { Module } from '@nestjs/common';
import { LedgerDatabaseService } from './ledger-database.service';
import { ProcessingLedgerService } from './processing-ledger.service';
import { SkipListService } from './skip-list.service';

@Module({
  providers: [LedgerDatabaseService, ProcessingLedgerService, SkipListService],
  exports: [ProcessingLedgerService, SkipListService],
})
export class LedgerModule {}
