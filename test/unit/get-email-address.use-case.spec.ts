import { GetEmailAddressUseCase } from '../../src/email-address/application/use-cases/get-email-address.use-case';
import { ListEmailAddressesUseCase } from '../../src/email-address/application/use-cases/list-email-addresses.use-case';
import { IEmailAddressRepository } from '../../src/email-address/application/interfaces/email-address-repository.interface';
import { EmailAddress } from '../../src/email-address/domain/entities/email-address.entity';
import { EmailAddressNotFoundException } from '../../src/email-address/domain/exceptions/email-address-not-found.exception';

describe('GetEmailAddressUseCase / ListEmailAddressesUseCase', () => {
  let repository: jest.Mocked<IEmailAddressRepository>;

  beforeEach(() => {
    repository = {
      existsByEmail: jest.fn(),
      findById: jest.fn(),
      findAll: jest.fn(),
      create: jest.fn(),
      update: jest.fn(),
      isHealthy: jest.fn(),
    } as jest.Mocked<IEmailAddressRepository>;
  });

  it('should return the record for a known id', async () => {
    const record = new EmailAddress({ id: 1, email: 'ken@example.com' });
    repository.findById.mockResolvedValue(record);

    const result = await new GetEmailAddressUseCase(repository).execute(1);

    expect(result).toBe(record);
    expect(result.backupEmail).toBeNull();
    expect(repository.findById).toHaveBeenCalledWith(1);
  });

  it('should throw EmailAddressNotFoundException for an unknown id', async () => {
    repository.findById.mockResolvedValue(null);

    await expect(
      new GetEmailAddressUseCase(repository).execute(42),
    ).rejects.toThrow('Email address with id 42 not found');
  });

  it('should return every record from the repository', async () => {
    const records = [
      new EmailAddress({ id: 1, email: 'ken@example.com' }),
      new EmailAddress({ id: 2, email: 'dennis@example.com', backupEmail: 'dmr@example.org' }),
    ];
    repository.findAll.mockResolvedValue(records);

    await expect(
      new ListEmailAddressesUseCase(repository).execute(),
    ).resolves.toEqual(records);
  });

  it('should be an Error subclass with a stable name', () => {
    const error = new EmailAddressNotFoundException(5);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('EmailAddressNotFoundException');
  });
});
