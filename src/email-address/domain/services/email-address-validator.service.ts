import {
  EmailAddressField,
  InvalidEmailAddressException,
} from '../exceptions/invalid-email-address.exception';

export const MAX_EMAIL_LENGTH = 254;
export const BLOCKED_DOMAINS: readonly string[] = ['hotmail.com', 'yahoo.com'];

export const EmailValidationMessages = {
  PRESENT: 'Email must be present.',
  STRING: 'Email must be a string.',
  AT_SIGN: "Email must have an '@' in the address.",
  UNIQUE: 'Email must be unique.',
  TOO_LONG: 'Email is too long.',
  BLOCKED_DOMAIN: 'Email cannot be a hotmail or yahoo address.',
} as const;

/**
 * Storage capability the validator needs for the uniqueness check.
 * Only the `email` column is consulted, whichever field is being validated.
 */
export interface EmailAddressLookup {
  existsByEmail(email: string): Promise<boolean>;
}

/** Candidate values as received; `undefined` means the field is not being written. */
export interface EmailAddressChanges {
  email?: unknown;
  backupEmail?: unknown;
}

export interface ValidatedEmailAddressChanges {
  email?: string;
  backupEmail?: string;
}

function isAbsent(value: unknown): boolean {
  if (!value) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * Domain service holding the ordered rule set applied to every write of
 * `email` or `backupEmail`. The first failing rule wins.
 *
 * Rules, in order:
 *  - present (not empty, null, false, 0 or an empty collection)
 *  - a string
 *  - contains an '@'
 *  - not already stored in the `email` column
 *  - at most 254 characters (code points)
 *  - the part after the first '@' is not hotmail.com or yahoo.com
 *
 * Accepted values are returned untouched: no trimming, no case folding.
 */
export class EmailAddressValidatorService {
  async validate(
    field: EmailAddressField,
    candidate: unknown,
    lookup: EmailAddressLookup,
  ): Promise<string> {
    if (isAbsent(candidate)) {
      throw new InvalidEmailAddressException(field, EmailValidationMessages.PRESENT);
    }

    if (typeof candidate !== 'string') {
      throw new InvalidEmailAddressException(field, EmailValidationMessages.STRING);
    }

    if (!candidate.includes('@')) {
      throw new InvalidEmailAddressException(field, EmailValidationMessages.AT_SIGN);
    }

    if (await lookup.existsByEmail(candidate)) {
      throw new InvalidEmailAddressException(field, EmailValidationMessages.UNIQUE);
    }

    if ([...candidate].length > MAX_EMAIL_LENGTH) {
      throw new InvalidEmailAddressException(field, EmailValidationMessages.TOO_LONG);
    }

    // Segment between the first '@' and the next one, if any
    const domain = candidate.split('@')[1];
    if (BLOCKED_DOMAINS.includes(domain)) {
      throw new InvalidEmailAddressException(
        field,
        EmailValidationMessages.BLOCKED_DOMAIN,
      );
    }

    return candidate;
  }

  /**
   * Validates every supplied field, email first. Throws on the first
   * failure so callers never persist a partially valid record.
   */
  async validateChanges(
    changes: EmailAddressChanges,
    lookup: EmailAddressLookup,
  ): Promise<ValidatedEmailAddressChanges> {
    const validated: ValidatedEmailAddressChanges = {};

    if (changes.email !== undefined) {
      validated.email = await this.validate('email', changes.email, lookup);
    }
    if (changes.backupEmail !== undefined) {
      validated.backupEmail = await this.validate(
        'backupEmail',
        changes.backupEmail,
        lookup,
      );
    }

    return validated;
  }
}
