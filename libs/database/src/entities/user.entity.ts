import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * User entity — an account that can sign in to VerseVault.
 *
 * Invariants:
 * - Email is unique across all users and stored lower-cased
 * - Password is stored as a bcrypt hash, never in plaintext
 * - securityStamp is replaced whenever the password changes; purpose tokens
 *   (email confirmation, password reset) are bound to its current value
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 255, name: 'full_name' })
  fullName!: string;

  @Column({ type: 'boolean', name: 'email_confirmed', default: false })
  emailConfirmed!: boolean;

  @Column({ type: 'varchar', length: 64, name: 'security_stamp' })
  securityStamp!: string;

  @CreateDateColumn({ type: 'datetime', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'datetime', name: 'updated_at' })
  updatedAt!: Date;
}
