import { Injectable, Inject } from '@nestjs/common';
import { IEmailAddressRepository } from '../interfaces/email-address-repository.interface';
import { EmailAddress } from '../../domain/entities/email-address.entity';
import { EmailAddressNotFoundException } from '../../domain/exceptions/email-address-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class GetEmailAddressUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY)
    private readonly repository: IEmailAddressRepository,
  ) {}

  async execute(id: number): Promise<EmailAddress> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new EmailAddressNotFoundException(id);
    }
    return record;
  }
}
