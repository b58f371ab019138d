import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { StoredUser } from '@gatehouse/auth';

/**
 * User entity — an account that can log in to either service.
 *
 * Invariants:
 * - Username is unique and case-sensitive
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Only the admin service changes `isAdmin`
 */
@Entity('users')
export class User implements StoredUser {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Index('IDX_users_username', { unique: true })
  @Column({ type: 'varchar', length: 100 })
  username!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'boolean', name: 'is_admin', default: false })
  isAdmin!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
