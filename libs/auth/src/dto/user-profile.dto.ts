import { Expose } from 'class-transformer';
import type { AuthUser, StoredUser } from '../interfaces';

/**
 * Public view of a user. Never includes the password hash.
 *
 * Built only through `fromUser()`, which copies the three public
 * fields explicitly.
 */
export class UserProfileDto {
  id: number;
  username: string;

  @Expose({ name: 'is_admin' })
  isAdmin: boolean;

  private constructor(id: number, username: string, isAdmin: boolean) {
    this.id = id;
    this.username = username;
    this.isAdmin = isAdmin;
  }

  static fromUser(user: AuthUser | StoredUser): UserProfileDto {
    return new UserProfileDto(user.id, user.username, user.isAdmin);
  }
}
