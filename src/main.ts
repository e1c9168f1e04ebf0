import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PipelineExceptionFilter } from './filters/pipeline-exception.filter';
import { readNumberSetting } from './config/settings';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new PipelineExceptionFilter(app.get(HttpAdapterHost)));
  app.enableShutdownHooks();

  const port = readNumberSetting(app.get(ConfigService), 'PORT', 3000);
  await app.listen(port);
  Logger.log(`Market lake API listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
