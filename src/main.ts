import 'reflect-metadata';
import { BadRequestException, type INestApplication, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import { createLogger, logger } from './common/utils/logger';
import { buildCorsOriginHandler, resolveCorsMode } from './common/http/cors-policy';

export function configureApp(app: INestApplication): void {
  app.use(helmet());
  app.use(json({ limit: '1mb' }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
}

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureApp(app);
  configureCors(app, validatedEnv);
  app.enableShutdownHooks();

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Chat orchestrator listening on port ${validatedEnv.PORT}`);
}

function configureCors(app: INestApplication, env: AppEnv): void {
  const corsMode = resolveCorsMode(env);
  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: corsMode,
    allowedOriginsCount: env.ALLOWED_ORIGINS.length,
  });

  app.enableCors({
    origin: buildCorsOriginHandler(env),
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-request-id'],
    exposedHeaders: ['x-request-id'],
    credentials: true,
  });
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    createLogger('Bootstrap').error(
      'Failed to bootstrap chat orchestrator',
      error instanceof Error ? error : undefined,
    );
    process.exit(1);
  });
}
