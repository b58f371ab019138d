/**
 * A user record as the credential store holds it.
 * `passwordHash` never leaves the auth library.
 */
export interface StoredUser {
  id: number;
  username: string;
  passwordHash: string;
  isAdmin: boolean;
}

export interface NewUser {
  username: string;
  passwordHash: string;
  isAdmin: boolean;
}

/**
 * Credential store consumed by the auth core.
 *
 * Implementations rely on the database for atomicity and username
 * uniqueness. They throw `DuplicateUsernameError` on a uniqueness
 * violation and `StoreUnavailableError` when the backend cannot be
 * reached in time. Update methods resolve `null` for an unknown id.
 */
export interface UserStore {
  findByUsername(username: string): Promise<StoredUser | null>;
  findById(id: number): Promise<StoredUser | null>;
  findAll(): Promise<StoredUser[]>;
  create(user: NewUser): Promise<StoredUser>;
  updateRole(id: number, isAdmin: boolean): Promise<StoredUser | null>;
  updatePassword(id: number, passwordHash: string): Promise<StoredUser | null>;
  /** Resolves `false` when no row matched */
  delete(id: number): Promise<boolean>;
}
