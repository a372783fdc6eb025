import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './shared/filters/all-exceptions.filter';
import { LoggingInterceptor } from './shared/interceptors/logging.interceptor';
import { loadAppConfig } from './shared/config/app.config';

async function bootstrap() {
  const config = loadAppConfig();
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Structured logging
  app.useLogger(app.get(Logger));

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new AllExceptionsFilter());

  // Global logging interceptor
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.enableShutdownHooks();

  // Swagger
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Email Address Service')
      .setDescription(
        'Stores email address records. Every write of email or backupEmail is checked for presence, type, an @ sign, ' +
          'uniqueness against stored emails, length (254 max) and blocked domains (hotmail.com, yahoo.com).',
      )
      .setVersion('1.0')
      .addTag('email-addresses', 'Create, read and update records')
      .addTag('health', 'Service health checks')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });

  await app.listen(config.port);

  const logger = app.get(Logger);
  logger.log(`Application running on http://localhost:${config.port}`);
  logger.log(`Swagger UI available at http://localhost:${config.port}/api/docs`);
}
void bootstrap();
