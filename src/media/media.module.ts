import { Module } from '@nestjs/common';
import { BridgesModule } from '../bridges';
import { ClipExtractorService } from './clip-extractor.service';
import { CompilationAssemblerService } from './compilation-assembler.service';

@Module({
  imports: [BridgesModule],
  providers: [ClipExtractorService, CompilationAssemblerService],
  exports: [ClipExtractorService, CompilationAssemblerService],
})
export class MediaModule {}
