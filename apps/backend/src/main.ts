import 'reflect-metadata';
import { randomUUID } from 'crypto';
import { json, urlencoded } from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { USER_ID_HEADER } from './auth/identity';
import { RuntimeConfig } from './config/runtime.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger,
  });
  const runtime = app.get(ConfigService).getOrThrow<RuntimeConfig>('runtime');
  const env = runtime.env;

  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const origins = (env.ALLOWED_ORIGINS ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  type CorsCallback = (err: Error | null, origin?: boolean | string) => void;

  app.enableCors({
    origin: (requestOrigin: string | undefined, callback: CorsCallback) => {
      if (!requestOrigin && origins.length === 0) {
        callback(null, false);
        return;
      }
      if (
        origins.length === 0 ||
        (requestOrigin && origins.includes(requestOrigin))
      ) {
        callback(null, requestOrigin ?? false);
        return;
      }
      callback(new Error('CORS origin denied'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: [
      'Accept',
      'Content-Type',
      'Origin',
      'User-Agent',
      'X-Requested-With',
      'X-Request-Id',
      'X-User-Id',
      'X-User-Roles',
    ],
    exposedHeaders: ['X-Request-Id'],
  });

  app.use(json({ limit: env.BODY_LIMIT }));
  app.use(urlencoded({ extended: true, limit: env.BODY_LIMIT }));

  app.use(
    helmet({
      hsts: true,
      referrerPolicy: { policy: 'same-origin' },
      contentSecurityPolicy: env.DISABLE_CSP === 'true' ? false : undefined,
    }),
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-request-id'];
    const requestId =
      (Array.isArray(header) ? header[0] : header) ?? randomUUID();
    req.headers['x-request-id'] = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      logger.log(
        JSON.stringify({
          method: req.method,
          url: req.originalUrl ?? req.url,
          status: res.statusCode,
          requestId,
          userId: req.headers[USER_ID_HEADER],
          userAgent: req.headers['user-agent'],
        }),
      );
    });
    next();
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      forbidNonWhitelisted: true,
    }),
  );

  await app.listen(env.PORT);
}
void bootstrap();
