import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { ConfigModule, logLevelsFrom } from '@infra/config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    // Validate configuration
    const config = ConfigModule.validate();
    logger.log(`Starting building registry in ${config.MODE} mode...`);

    // Create NestJS application
    const app = await NestFactory.create(AppModule, {
      logger: logLevelsFrom(config.LOG_LEVEL),
    });

    // Enable validation
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );

    app.enableShutdownHooks();

    const httpEnabled = config.MODE === 'API' || config.MODE === 'IOT';

    if (httpEnabled) {
      app.enableCors({
        origin: config.CORS_ORIGIN,
        credentials: true,
      });
      app.setGlobalPrefix('api/v1');

      await app.listen(config.PORT, '0.0.0.0');
      logger.log(`🚀 Server running on http://localhost:${config.PORT}/api/v1`);
      logger.log(`📊 Health check: http://localhost:${config.PORT}/api/v1/health`);
    } else {
      // For NFC mode, just init the app without HTTP server
      await app.init();
      logger.log(`📡 NFC mode initialized`);
    }

    logger.log(`Mode: ${config.MODE}`);
    logger.log(`Delete mode: ${config.DELETE_MODE ? 'ENABLED' : 'DISABLED'}`);
    if (config.MQTT_BROKER_URL) {
      logger.log(`MQTT broker: ${config.MQTT_BROKER_URL}`);
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`Failed to start application: ${err.message}`, err.stack);
    process.exit(1);
  }
}

void bootstrap();
