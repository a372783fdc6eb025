import { Allow } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdateEmailAddressRequestDto {
  @ApiPropertyOptional({ type: String, example: 'ada@example.net' })
  @Allow()
  email?: unknown;

  @ApiPropertyOptional({ type: String, example: 'ada.other@example.org' })
  @Allow()
  backupEmail?: unknown;
}
