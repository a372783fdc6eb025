import { Allow } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

// Values are left untyped here: the domain validator reports type errors
export class CreateEmailAddressRequestDto {
  @ApiProperty({ type: String, example: 'ada@example.com' })
  @Allow()
  email?: unknown;

  @ApiPropertyOptional({ type: String, example: 'ada.backup@example.org' })
  @Allow()
  backupEmail?: unknown;
}
