import {
  AccountNotFoundException,
  AccountsService,
  UsernameTakenException,
} from '../../src/accounts';
import { DuplicateUsernameError, InvalidCredentialsError } from '../../src/errors';
import { PasswordHasher } from '../../src/password';
import { InMemoryUserStore } from '../in-memory-user.store';
import { testAuthOptions } from '../test-config';

describe('AccountsService', () => {
  let store: InMemoryUserStore;
  let hasher: PasswordHasher;
  let service: AccountsService;

  beforeEach(() => {
    store = new InMemoryUserStore();
    hasher = new PasswordHasher(testAuthOptions);
    service = new AccountsService(store, hasher);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('register', () => {
    it('stores a hashed password and no admin rights by default', async () => {
      const user = await service.register('alice', 'wonderland');

      expect(user).toMatchObject({ id: 1, username: 'alice', isAdmin: false });
      expect(user.passwordHash).not.toBe('wonderland');
      await expect(hasher.verify('wonderland', user.passwordHash)).resolves.toBe(true);
    });

    it('creates an admin when asked', async () => {
      const user = await service.register('root', 'correct-horse', { isAdmin: true });

      expect(user.isAdmin).toBe(true);
    });

    it('refuses a taken username', async () => {
      await service.register('alice', 'wonderland');

      await expect(service.register('alice', 'another-password')).rejects.toBeInstanceOf(
        UsernameTakenException,
      );
    });

    it('turns a lost insert race into a conflict', async () => {
      jest.spyOn(store, 'create').mockRejectedValueOnce(new DuplicateUsernameError('alice'));

      await expect(service.register('alice', 'wonderland')).rejects.toBeInstanceOf(
        UsernameTakenException,
      );
    });
  });

  describe('changePassword', () => {
    it('replaces the hash when the current password matches', async () => {
      const { id } = await service.register('alice', 'wonderland');

      await service.changePassword(id, 'wonderland', 'looking-glass');

      const stored = await service.get(id);
      await expect(hasher.verify('looking-glass', stored.passwordHash)).resolves.toBe(true);
      await expect(hasher.verify('wonderland', stored.passwordHash)).resolves.toBe(false);
    });

    it('rejects a wrong current password', async () => {
      const { id } = await service.register('alice', 'wonderland');

      await expect(
        service.changePassword(id, 'not-my-password', 'looking-glass'),
      ).rejects.toBeInstanceOf(InvalidCredentialsError);
    });
  });

  describe('admin operations', () => {
    it('lists users in id order', async () => {
      await service.register('alice', 'wonderland');
      await service.register('bob', 'builder-pass');

      const users = await service.list();

      expect(users.map((user) => user.username)).toEqual(['alice', 'bob']);
    });

    it('changes a role', async () => {
      const { id } = await service.register('alice', 'wonderland');

      await expect(service.setRole(id, true)).resolves.toMatchObject({ isAdmin: true });
    });

    it('resets a password without the old one', async () => {
      const { id } = await service.register('alice', 'wonderland');

      await service.resetPassword(id, 'reset-by-admin');

      const stored = await service.get(id);
      await expect(hasher.verify('reset-by-admin', stored.passwordHash)).resolves.toBe(true);
    });

    it('removes a user', async () => {
      const { id } = await service.register('alice', 'wonderland');

      await service.remove(id);

      await expect(service.get(id)).rejects.toBeInstanceOf(AccountNotFoundException);
    });

    it.each([
      ['get', (s: AccountsService) => s.get(42)],
      ['setRole', (s: AccountsService) => s.setRole(42, true)],
      ['resetPassword', (s: AccountsService) => s.resetPassword(42, 'reset-by-admin')],
      ['remove', (s: AccountsService) => s.remove(42)],
    ])('%s reports an unknown id as not found', async (_name, call) => {
      await expect(call(service)).rejects.toBeInstanceOf(AccountNotFoundException);
    });
  });

  describe('ensureInitialAdmin', () => {
    it('creates the admin once', async () => {
      await expect(service.ensureInitialAdmin('root', 'correct-horse')).resolves.toBe(true);
      await expect(service.ensureInitialAdmin('root', 'correct-horse')).resolves.toBe(false);

      const users = await service.list();
      expect(users).toHaveLength(1);
      expect(users[0]).toMatchObject({ username: 'root', isAdmin: true });
    });

    it('leaves an existing account untouched', async () => {
      await service.register('root', 'wonderland');

      await expect(service.ensureInitialAdmin('root', 'correct-horse')).resolves.toBe(false);
      await expect(service.get(1)).resolves.toMatchObject({ isAdmin: false });
    });
  });
});
