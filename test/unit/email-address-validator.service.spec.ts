import {
  EmailAddressLookup,
  EmailAddressValidatorService,
  EmailValidationMessages,
} from '../../src/email-address/domain/services/email-address-validator.service';
import { InvalidEmailAddressException } from '../../src/email-address/domain/exceptions/invalid-email-address.exception';

describe('EmailAddressValidatorService', () => {
  let validator: EmailAddressValidatorService;
  let storedEmails: Set<string>;
  let lookup: EmailAddressLookup;

  const addressOfLength = (length: number, domain = 'example.com'): string =>
    'a'.repeat(length - domain.length - 1) + '@' + domain;

  beforeEach(() => {
    validator = new EmailAddressValidatorService();
    storedEmails = new Set(['taken@example.com']);
    lookup = {
      existsByEmail: jest.fn(async (email: string) => storedEmails.has(email)),
    };
  });

  describe('validate', () => {
    it('should return a valid address unchanged', async () => {
      await expect(
        validator.validate('email', 'Ada.Lovelace@Example.com', lookup),
      ).resolves.toBe('Ada.Lovelace@Example.com');
    });

    it('should not trim surrounding whitespace', async () => {
      await expect(
        validator.validate('email', ' ada@example.com ', lookup),
      ).resolves.toBe(' ada@example.com ');
    });

    it.each([[undefined], [null], [''], [0], [false], [[]], [{}]])(
      'should reject %p as not present',
      async (value: unknown) => {
        await expect(validator.validate('email', value, lookup)).rejects.toThrow(
          EmailValidationMessages.PRESENT,
        );
      },
    );

    it.each([[42], [true], [['a@b.com']], [{ address: 'a@b.com' }]])(
      'should reject %p as not a string',
      async (value: unknown) => {
        await expect(validator.validate('email', value, lookup)).rejects.toThrow(
          EmailValidationMessages.STRING,
        );
      },
    );

    it('should reject an address without an @', async () => {
      await expect(
        validator.validate('email', 'ada.example.com', lookup),
      ).rejects.toThrow("Email must have an '@' in the address.");
    });

    it('should reject an address already stored as an email', async () => {
      await expect(
        validator.validate('email', 'taken@example.com', lookup),
      ).rejects.toThrow('Email must be unique.');
      expect(lookup.existsByEmail).toHaveBeenCalledWith('taken@example.com');
    });

    it('should check uniqueness case-sensitively', async () => {
      await expect(
        validator.validate('email', 'TAKEN@example.com', lookup),
      ).resolves.toBe('TAKEN@example.com');
    });

    it('should accept exactly 254 characters', async () => {
      const address = addressOfLength(254);
      expect(address).toHaveLength(254);
      await expect(validator.validate('email', address, lookup)).resolves.toBe(
        address,
      );
    });

    it('should reject 255 characters', async () => {
      await expect(
        validator.validate('email', addressOfLength(255), lookup),
      ).rejects.toThrow('Email is too long.');
    });

    it('should count code points rather than UTF-16 units', async () => {
      // 250 astral characters are 500 UTF-16 units but 250 code points
      const address = '\u{1F600}'.repeat(250) + '@a.b';
      await expect(validator.validate('email', address, lookup)).resolves.toBe(
        address,
      );
    });

    it.each(['user@hotmail.com', 'user@yahoo.com'])(
      'should reject the blocked domain in %s',
      async (address) => {
        await expect(
          validator.validate('email', address, lookup),
        ).rejects.toThrow('Email cannot be a hotmail or yahoo address.');
      },
    );

    it.each(['user@outlook.com', 'user@Hotmail.com', 'user@mail.yahoo.com'])(
      'should accept %s',
      async (address) => {
        await expect(validator.validate('email', address, lookup)).resolves.toBe(
          address,
        );
      },
    );

    it('should only compare the segment right after the first @', async () => {
      await expect(
        validator.validate('email', 'a@hotmail.com@example.com', lookup),
      ).rejects.toThrow(EmailValidationMessages.BLOCKED_DOMAIN);
      await expect(
        validator.validate('email', 'a@example.com@hotmail.com', lookup),
      ).resolves.toBe('a@example.com@hotmail.com');
    });

    it('should report length before a blocked domain', async () => {
      await expect(
        validator.validate('email', addressOfLength(300, 'hotmail.com'), lookup),
      ).rejects.toThrow(EmailValidationMessages.TOO_LONG);
    });

    it('should report uniqueness before length', async () => {
      const longAddress = addressOfLength(300);
      storedEmails.add(longAddress);

      await expect(
        validator.validate('email', longAddress, lookup),
      ).rejects.toThrow(EmailValidationMessages.UNIQUE);
    });

    it('should not query storage when an earlier rule fails', async () => {
      await expect(
        validator.validate('email', 'no-at-sign', lookup),
      ).rejects.toThrow(EmailValidationMessages.AT_SIGN);
      expect(lookup.existsByEmail).not.toHaveBeenCalled();
    });

    it('should carry the field name on the exception', async () => {
      const error = await validator
        .validate('backupEmail', 'user@yahoo.com', lookup)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidEmailAddressException);
      expect(error).toMatchObject({
        field: 'backupEmail',
        message: 'Email cannot be a hotmail or yahoo address.',
      });
    });
  });

  describe('validateChanges', () => {
    it('should validate only the supplied fields', async () => {
      const result = await validator.validateChanges(
        { backupEmail: 'spare@example.org' },
        lookup,
      );

      expect(result).toEqual({ backupEmail: 'spare@example.org' });
      expect(lookup.existsByEmail).toHaveBeenCalledTimes(1);
    });

    it('should validate email before backupEmail', async () => {
      const error = await validator
        .validateChanges({ email: 'bad', backupEmail: 'also bad' }, lookup)
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ field: 'email' });
    });

    it('should reject a backupEmail that matches a stored email', async () => {
      await expect(
        validator.validateChanges(
          { email: 'new@example.com', backupEmail: 'taken@example.com' },
          lookup,
        ),
      ).rejects.toMatchObject({
        field: 'backupEmail',
        message: 'Email must be unique.',
      });
    });

    it('should return an empty result when nothing is supplied', async () => {
      await expect(validator.validateChanges({}, lookup)).resolves.toEqual({});
    });
  });
});
