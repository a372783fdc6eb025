import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { EmailAddressModule } from './email-address/email-address.module';
import { EmailAddressOrmEntity } from './email-address/infrastructure/persistence/entities/email-address.orm-entity';
import { loadAppConfig } from './shared/config/app.config';

@Module({
  imports: [
    // Structured logging
    LoggerModule.forRootAsync({
      useFactory: () => {
        const config = loadAppConfig();
        return {
          pinoHttp: {
            transport:
              config.environment === 'development'
                ? { target: 'pino-pretty', options: { colorize: true } }
                : undefined,
            level: config.logLevel,
          },
        };
      },
    }),

    // Read at module init so tests can point DATABASE_PATH at :memory:
    TypeOrmModule.forRootAsync({
      useFactory: () => ({
        type: 'sqlite',
        database: loadAppConfig().databasePath,
        entities: [EmailAddressOrmEntity],
        synchronize: true, // Auto-create schema, no migrations
      }),
    }),

    EmailAddressModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
