import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { CreateEmailAddressUseCase } from '../../application/use-cases/create-email-address.use-case';
import { GetEmailAddressUseCase } from '../../application/use-cases/get-email-address.use-case';
import { ListEmailAddressesUseCase } from '../../application/use-cases/list-email-addresses.use-case';
import { UpdateEmailAddressUseCase } from '../../application/use-cases/update-email-address.use-case';
import { CreateEmailAddressRequestDto } from '../dto/request/create-email-address.request.dto';
import { UpdateEmailAddressRequestDto } from '../dto/request/update-email-address.request.dto';
import { EmailAddressResponseDto } from '../dto/response/email-address.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

@ApiTags('email-addresses')
@Controller('email-addresses')
@UseInterceptors(ResponseWrapperInterceptor)
export class EmailAddressController {
  constructor(
    private readonly createEmailAddress: CreateEmailAddressUseCase,
    private readonly getEmailAddress: GetEmailAddressUseCase,
    private readonly listEmailAddresses: ListEmailAddressesUseCase,
    private readonly updateEmailAddress: UpdateEmailAddressUseCase,
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Create an email address record',
    description:
      'Both fields go through the same ordered checks: presence, type, @ sign, uniqueness against stored emails, length, blocked domains.',
  })
  @ApiResponse({ status: 201, type: EmailAddressResponseDto })
  @ApiResponse({
    status: 422,
    description: 'A field failed validation',
    type: ApiErrorDto,
  })
  async create(
    @Body() dto: CreateEmailAddressRequestDto,
  ): Promise<EmailAddressResponseDto> {
    const record = await this.createEmailAddress.execute({
      email: dto.email,
      backupEmail: dto.backupEmail,
    });
    return EmailAddressResponseDto.fromDomain(record);
  }

  @Get()
  @ApiOperation({ summary: 'List all email address records' })
  @ApiResponse({ status: 200, type: [EmailAddressResponseDto] })
  async list(): Promise<EmailAddressResponseDto[]> {
    const records = await this.listEmailAddresses.execute();
    return records.map((r) => EmailAddressResponseDto.fromDomain(r));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an email address record by id' })
  @ApiParam({ name: 'id', example: 1 })
  @ApiResponse({ status: 200, type: EmailAddressResponseDto })
  @ApiResponse({ status: 404, description: 'Unknown id', type: ApiErrorDto })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<EmailAddressResponseDto> {
    const record = await this.getEmailAddress.execute(id);
    return EmailAddressResponseDto.fromDomain(record);
  }

  @Patch(':id')
  @ApiOperation({
    summary: 'Update an email address record',
    description:
      'Only fields whose value changes are validated. Nothing is written unless every changed field passes.',
  })
  @ApiParam({ name: 'id', example: 1 })
  @ApiResponse({ status: 200, type: EmailAddressResponseDto })
  @ApiResponse({ status: 404, description: 'Unknown id', type: ApiErrorDto })
  @ApiResponse({
    status: 422,
    description: 'A field failed validation',
    type: ApiErrorDto,
  })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateEmailAddressRequestDto,
  ): Promise<EmailAddressResponseDto> {
    const record = await this.updateEmailAddress.execute(id, {
      email: dto.email,
      backupEmail: dto.backupEmail,
    });
    return EmailAddressResponseDto.fromDomain(record);
  }
}
