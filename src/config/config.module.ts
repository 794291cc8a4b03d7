// src/config/config.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { loadPipelineConfig, PIPELINE_CONFIG } from './pipeline-config';

@Global() // Every module reads the same frozen config
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
  ],
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: (configService: ConfigService) =>
        loadPipelineConfig(key => configService.get<string>(key)),
      inject: [ConfigService],
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
