import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { AppService } from './app.service';
import { getErrorMessage } from './common/utils/common.utils';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    app.get(AppService).runConfiguredBacktest();
  } catch (error) {
    logger.error(`Configured backtest failed: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
