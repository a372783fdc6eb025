export class EmailAddress {
  readonly id: number;
  readonly email: string;
  readonly backupEmail: string | null;

  constructor(params: {
    id: number;
    email: string;
    backupEmail?: string | null;
  }) {
    this.id = params.id;
    this.email = params.email;
    this.backupEmail = params.backupEmail ?? null;
  }
}
