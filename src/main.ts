#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { runBatch } from './run/run-batch';

// Batch run. Opening the application context opens the store.
async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { abortOnError: false });
  await runBatch(app);
}

bootstrap().catch((error: unknown) => {
  new Logger('Main').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
