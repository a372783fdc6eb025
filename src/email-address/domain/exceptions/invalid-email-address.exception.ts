export type EmailAddressField = 'email' | 'backupEmail';

export class InvalidEmailAddressException extends Error {
  constructor(
    readonly field: EmailAddressField,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidEmailAddressException';
  }
}
