import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { LedgerModule } from '../ledger/ledger.module';
import { MediaModule } from '../media/media.module';
import { SegmentsModule } from '../segments/segments.module';
import { CompilationPipelineService } from './compilation-pipeline.service';

@Module({
  imports: [SegmentsModule, MediaModule, LedgerModule, CollaboratorsModule],
  providers: [CompilationPipelineService],
  exports: [CompilationPipelineService],
})
export class PipelineModule {}
