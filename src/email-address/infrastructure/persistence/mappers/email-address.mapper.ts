import { EmailAddress } from '../../../domain/entities/email-address.entity';
import { EmailAddressOrmEntity } from '../entities/email-address.orm-entity';

export class EmailAddressMapper {
  static toDomain(orm: EmailAddressOrmEntity): EmailAddress {
    return new EmailAddress({
      id: orm.id,
      email: orm.email,
      backupEmail: orm.backupEmail,
    });
  }
}
