import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { EnvironmentConfig, GATEWAY_CONFIG, GatewayConfig } from './config/environment.config';
import { errorMessage, errorStack } from './utils/error-handling.util';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: EnvironmentConfig.NODE_ENV === 'development'
      ? ['error', 'warn', 'log', 'debug', 'verbose']
      : ['error', 'warn', 'log'],
  });
  const config = app.get<GatewayConfig>(GATEWAY_CONFIG);

  // Security headers; the API serves JSON only
  app.use(helmet({
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    referrerPolicy: { policy: 'no-referrer' },
  }));

  // Browser clients only when CORS_ORIGIN is set
  if (config.corsOrigin) {
    app.enableCors({
      origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map((origin) => origin.trim()),
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    });
  }
  app.enableShutdownHooks();

  await app.listen(config.port, '0.0.0.0');
  Logger.log(`Gateway listening on :${config.port}`, 'Bootstrap');
  Logger.log(JSON.stringify(EnvironmentConfig.getConfigInfo(config)), 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Startup failed: ${errorMessage(error)}`, errorStack(error), 'Bootstrap');
  process.exit(1);
});
