// src/segments/segments.module.ts
import { Module } from '@nestjs/common';
import { TimestampParserService } from './timestamp-parser.service';
import { SegmentFilterService } from './segment-filter.service';

@Module({
  providers: [TimestampParserService, SegmentFilterService],
  exports: [TimestampParserService, SegmentFilterService],
})
export class SegmentsModule {}
