import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  EmailAddressUpdate,
  IEmailAddressRepository,
  NewEmailAddress,
} from '../../../application/interfaces/email-address-repository.interface';
import { EmailAddress } from '../../../domain/entities/email-address.entity';
import { EmailAddressNotFoundException } from '../../../domain/exceptions/email-address-not-found.exception';
import { EmailAddressOrmEntity } from '../entities/email-address.orm-entity';
import { EmailAddressMapper } from '../mappers/email-address.mapper';

@Injectable()
export class EmailAddressRepository implements IEmailAddressRepository {
  private readonly logger = new Logger(EmailAddressRepository.name);

  constructor(
    @InjectRepository(EmailAddressOrmEntity)
    private readonly repo: Repository<EmailAddressOrmEntity>,
  ) {}

  async existsByEmail(email: string): Promise<boolean> {
    const match = await this.repo.findOne({
      select: { id: true },
      where: { email },
    });

    if (match) {
      this.logger.debug(`Email already stored on record ${match.id}`);
    }
    return match !== null;
  }

  async findById(id: number): Promise<EmailAddress | null> {
    const entity = await this.repo.findOneBy({ id });
    return entity ? EmailAddressMapper.toDomain(entity) : null;
  }

  async findAll(): Promise<EmailAddress[]> {
    const entities = await this.repo.find({ order: { id: 'ASC' } });
    return entities.map((e) => EmailAddressMapper.toDomain(e));
  }

  async create(record: NewEmailAddress): Promise<EmailAddress> {
    const entity = this.repo.create({
      email: record.email,
      backupEmail: record.backupEmail,
    });
    const saved = await this.repo.save(entity);
    return EmailAddressMapper.toDomain(saved);
  }

  async update(id: number, changes: EmailAddressUpdate): Promise<EmailAddress> {
    const entity = await this.repo.findOneBy({ id });
    if (!entity) {
      throw new EmailAddressNotFoundException(id);
    }

    if (changes.email !== undefined) {
      entity.email = changes.email;
    }
    if (changes.backupEmail !== undefined) {
      entity.backupEmail = changes.backupEmail;
    }

    const saved = await this.repo.save(entity);
    return EmailAddressMapper.toDomain(saved);
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.repo.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Database health check failed', error);
      return false;
    }
  }
}
