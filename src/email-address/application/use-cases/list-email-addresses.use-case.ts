import { Injectable, Inject } from '@nestjs/common';
import { IEmailAddressRepository } from '../interfaces/email-address-repository.interface';
import { EmailAddress } from '../../domain/entities/email-address.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class ListEmailAddressesUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY)
    private readonly repository: IEmailAddressRepository,
  ) {}

  execute(): Promise<EmailAddress[]> {
    return this.repository.findAll();
  }
}
