import { Controller, Get, Header } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';

export const INDEX_MESSAGE = 'Validations Technical Lesson';

/** Liveness banner; plain text, outside the JSON envelope. */
@ApiExcludeController()
@Controller()
export class AppController {
  @Get()
  @Header('Content-Type', 'text/plain')
  index(): string {
    return INDEX_MESSAGE;
  }
}
