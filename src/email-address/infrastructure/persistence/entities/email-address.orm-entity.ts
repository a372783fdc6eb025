import { Entity, Column, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('emailaddress')
export class EmailAddressOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  // Uniqueness is enforced by the validator, not by a constraint
  @Index()
  @Column({ type: 'varchar' })
  email!: string;

  @Column({ name: 'backup_email', type: 'varchar', nullable: true })
  backupEmail!: string | null;
}
