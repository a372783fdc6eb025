import { Injectable, Inject, Logger } from '@nestjs/common';
import { IEmailAddressRepository } from '../interfaces/email-address-repository.interface';
import {
  EmailAddressChanges,
  EmailAddressValidatorService,
} from '../../domain/services/email-address-validator.service';
import { EmailAddress } from '../../domain/entities/email-address.entity';
import { EmailAddressNotFoundException } from '../../domain/exceptions/email-address-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class UpdateEmailAddressUseCase {
  private readonly logger = new Logger(UpdateEmailAddressUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY)
    private readonly repository: IEmailAddressRepository,
    private readonly validator: EmailAddressValidatorService,
  ) {}

  async execute(id: number, changes: EmailAddressChanges): Promise<EmailAddress> {
    const existing = await this.repository.findById(id);
    if (!existing) {
      throw new EmailAddressNotFoundException(id);
    }

    // Writing a field's current value back is not a change
    const touched: EmailAddressChanges = {
      email: changes.email === existing.email ? undefined : changes.email,
      backupEmail:
        changes.backupEmail === existing.backupEmail
          ? undefined
          : changes.backupEmail,
    };

    const validated = await this.validator.validateChanges(
      touched,
      this.repository,
    );

    if (validated.email === undefined && validated.backupEmail === undefined) {
      this.logger.debug(`No changes for email address ${id}`);
      return existing;
    }

    const updated = await this.repository.update(id, validated);
    this.logger.log(
      `Updated email address ${id}: ${Object.keys(validated).join(', ')}`,
    );
    return updated;
  }
}
