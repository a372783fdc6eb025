import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EmailAddress } from '../../../domain/entities/email-address.entity';

export class EmailAddressResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'ada@example.com' })
  email!: string;

  @ApiPropertyOptional({ type: String, nullable: true, example: 'ada.backup@example.org' })
  backupEmail!: string | null;

  static fromDomain(record: EmailAddress): EmailAddressResponseDto {
    const dto = new EmailAddressResponseDto();
    dto.id = record.id;
    dto.email = record.email;
    dto.backupEmail = record.backupEmail;
    return dto;
  }
}
