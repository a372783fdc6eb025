import { ApiProperty } from '@nestjs/swagger';

export class ErrorDetailDto {
  @ApiProperty({ example: 'email' })
  field!: string;

  @ApiProperty({ example: { validation: 'Email must be unique.' } })
  constraints!: Record<string, string>;
}

export class ErrorBodyDto {
  @ApiProperty({ example: 422 })
  statusCode!: number;

  @ApiProperty({ example: 'Email must be unique.' })
  message!: string;

  @ApiProperty({ type: [ErrorDetailDto], example: [] })
  details!: ErrorDetailDto[];
}

export class ApiErrorDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ type: ErrorBodyDto })
  error!: ErrorBodyDto;

  @ApiProperty({ example: '2026-10-19T10:00:00.000Z' })
  timestamp!: string;
}
