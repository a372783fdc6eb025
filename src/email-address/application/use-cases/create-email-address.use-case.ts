import { Injectable, Inject, Logger } from '@nestjs/common';
import { IEmailAddressRepository } from '../interfaces/email-address-repository.interface';
import {
  EmailAddressChanges,
  EmailAddressValidatorService,
} from '../../domain/services/email-address-validator.service';
import { EmailAddress } from '../../domain/entities/email-address.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class CreateEmailAddressUseCase {
  private readonly logger = new Logger(CreateEmailAddressUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY)
    private readonly repository: IEmailAddressRepository,
    private readonly validator: EmailAddressValidatorService,
  ) {}

  async execute(input: EmailAddressChanges): Promise<EmailAddress> {
    // email is required, so a missing value still goes through the presence rule
    const email = await this.validator.validate(
      'email',
      input.email,
      this.repository,
    );

    let backupEmail: string | null = null;
    if (input.backupEmail !== undefined) {
      backupEmail = await this.validator.validate(
        'backupEmail',
        input.backupEmail,
        this.repository,
      );
    }

    const created = await this.repository.create({ email, backupEmail });
    this.logger.log(`Created email address ${created.id}`);
    return created;
  }
}
