import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CollaboratorError, ConfigValidationError } from './common/errors';
import { createAppLogger, WinstonNestLogger } from './common/logger';
import { PIPELINE_CONFIG, PipelineConfig } from './config/pipeline-config';
import { CompilationPipelineService } from './pipeline/compilation-pipeline.service';

const logger = new Logger('Bootstrap');

/**
 * Run a single pass over the configured channel and exit.
 * Exit code 1 on invalid configuration, an authentication failure or
 * anything else that ends the pass early.
 */
async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });

  const config = app.get<PipelineConfig>(PIPELINE_CONFIG);
  app.useLogger(new WinstonNestLogger(createAppLogger({ level: config.logLevel, logDir: config.logDir })));
  app.enableShutdownHooks();

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received, finishing the current step`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    logger.log('====================================');
    logger.log(`PASS STARTING for ${config.channelId}`);
    logger.log(`Process ID: ${process.pid}`);
    logger.log('====================================');

    const summary = await app.get(CompilationPipelineService).runPass(controller.signal);
    return summary.cancelled ? 130 : 0;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await app.close();
  }
}

bootstrap()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigValidationError) {
      logger.error(error.message);
    } else if (error instanceof CollaboratorError && error.kind === 'AuthFailure') {
      logger.error(`=== AUTHENTICATION FAILED === ${error.message}`);
    } else {
      logger.error('=== PASS FAILED ===', error instanceof Error ? error.stack : String(error));
    }
    process.exitCode = 1;
  });
