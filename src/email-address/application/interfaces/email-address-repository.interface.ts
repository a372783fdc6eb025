import { EmailAddress } from '../../domain/entities/email-address.entity';
import { EmailAddressLookup } from '../../domain/services/email-address-validator.service';

export interface NewEmailAddress {
  email: string;
  backupEmail: string | null;
}

export interface EmailAddressUpdate {
  email?: string;
  backupEmail?: string;
}

/**
 * What the use cases need from storage. The SQLite repository implements it.
 *
 * Abstract class rather than interface: interfaces are erased at runtime
 * and cannot serve as NestJS DI tokens.
 */
export abstract class IEmailAddressRepository implements EmailAddressLookup {
  abstract existsByEmail(email: string): Promise<boolean>;
  abstract findById(id: number): Promise<EmailAddress | null>;
  abstract findAll(): Promise<EmailAddress[]>;
  abstract create(record: NewEmailAddress): Promise<EmailAddress>;
  abstract update(id: number, changes: EmailAddressUpdate): Promise<EmailAddress>;
  abstract isHealthy(): Promise<boolean>;
}
