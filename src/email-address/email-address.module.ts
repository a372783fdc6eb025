import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TerminusModule } from '@nestjs/terminus';

// Domain
import { EmailAddressValidatorService } from './domain/services/email-address-validator.service';

// Application - Use Cases
import { CreateEmailAddressUseCase } from './application/use-cases/create-email-address.use-case';
import { GetEmailAddressUseCase } from './application/use-cases/get-email-address.use-case';
import { ListEmailAddressesUseCase } from './application/use-cases/list-email-addresses.use-case';
import { UpdateEmailAddressUseCase } from './application/use-cases/update-email-address.use-case';
import { CheckHealthUseCase } from './application/use-cases/check-health.use-case';

// Infrastructure - Persistence
import { EmailAddressOrmEntity } from './infrastructure/persistence/entities/email-address.orm-entity';
import { EmailAddressRepository } from './infrastructure/persistence/repositories/email-address.repository';

// Presentation
import { EmailAddressController } from './presentation/controllers/email-address.controller';
import { HealthController } from './presentation/controllers/health.controller';

// Shared
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([EmailAddressOrmEntity]), TerminusModule],
  controllers: [EmailAddressController, HealthController],
  providers: [
    EmailAddressValidatorService,

    CreateEmailAddressUseCase,
    GetEmailAddressUseCase,
    ListEmailAddressesUseCase,
    UpdateEmailAddressUseCase,
    CheckHealthUseCase,

    {
      provide: INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY,
      useClass: EmailAddressRepository,
    },
  ],
})
export class EmailAddressModule {}
