export class EmailAddressNotFoundException extends Error {
  constructor(id: number) {
    super(`Email address with id ${id} not found`);
    this.name = 'EmailAddressNotFoundException';
  }
}
