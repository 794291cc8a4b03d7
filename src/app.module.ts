// src/app.module.ts
import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { PipelineConfigModule } from './config/config.module';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    PipelineConfigModule,
    EventEmitterModule.forRoot({
      global: true,
    }),
    PipelineModule,
  ],
})
export class AppModule {}
