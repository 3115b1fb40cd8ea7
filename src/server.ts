import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigType } from '@nestjs/config';
import { AppModule } from './app.module';
import portfolioConfig from './config/portfolio.config';

// HTTP API over the persisted holdings.
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { abortOnError: false });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }));
  app.enableShutdownHooks();

  const config = app.get<ConfigType<typeof portfolioConfig>>(portfolioConfig.KEY);
  await app.listen(config.port);
  new Logger('Server').log(`Holdings API listening on port ${config.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Server').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
