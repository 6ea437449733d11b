import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import * as express from 'express';
import { MonitorModule } from './monitor.module';
import { applyConfiguredLogLevels, resolveLogLevels } from './logging';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(MonitorModule, {
    bodyParser: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.use(express.json({ limit: '16kb' }));
  app.use(express.urlencoded({ extended: false, limit: '16kb' }));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  applyConfiguredLogLevels(app, configService);
  const parsedPort = Number(configService.get<number>('PORT', 10000));
  const port = Number.isFinite(parsedPort) && parsedPort > 0 ? parsedPort : 10000;
  const host = '0.0.0.0';
  const logger = new Logger('MonitorBootstrap');

  await app.listen(port, host);
  logger.log(`Dashboard listening on ${host}:${port}`);
}

void bootstrap();
