import { Injectable, Inject } from '@nestjs/common';
import { IEmailAddressRepository } from '../interfaces/email-address-repository.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface HealthStatus {
  database: boolean;
}

@Injectable()
export class CheckHealthUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_ADDRESS_REPOSITORY)
    private readonly repository: IEmailAddressRepository,
  ) {}

  async execute(): Promise<HealthStatus> {
    return { database: await this.repository.isHealthy() };
  }
}
