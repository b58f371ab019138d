import { EntityNotFoundError, QueryFailedError } from 'typeorm';
import type { Repository } from 'typeorm';
import { DuplicateUsernameError, StoreUnavailableError } from '@gatehouse/auth';
import { User } from '../../src/entities/user.entity';
import { TypeOrmUserStore } from '../../src/stores/typeorm-user.store';

function pgError(code?: string): QueryFailedError {
  const driverError =
    code === undefined
      ? new Error('Query read timeout')
      : Object.assign(new Error('pg'), { code });
  return new QueryFailedError('SELECT 1', [], driverError);
}

function makeUser(overrides: Partial<User> = {}): User {
  return Object.assign(new User(), {
    id: 1,
    username: 'alice',
    passwordHash: '$2b$04$hash',
    isAdmin: false,
    ...overrides,
  });
}

describe('TypeOrmUserStore', () => {
  let repository: {
    findOne: jest.Mock;
    find: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
    update: jest.Mock;
    delete: jest.Mock;
  };
  let store: TypeOrmUserStore;

  beforeEach(() => {
    repository = {
      findOne: jest.fn(),
      find: jest.fn(),
      create: jest.fn((fields: Partial<User>) => makeUser(fields)),
      save: jest.fn(async (user: User) => user),
      update: jest.fn(),
      delete: jest.fn(),
    };
    store = new TypeOrmUserStore(repository as unknown as Repository<User>);
  });

  it('looks a user up by username', async () => {
    const alice = makeUser();
    repository.findOne.mockResolvedValue(alice);

    await expect(store.findByUsername('alice')).resolves.toBe(alice);
    expect(repository.findOne).toHaveBeenCalledWith({ where: { username: 'alice' } });
  });

  it('returns null for an unknown username', async () => {
    repository.findOne.mockResolvedValue(null);

    await expect(store.findByUsername('bob')).resolves.toBeNull();
  });

  it('lists users ordered by id', async () => {
    repository.find.mockResolvedValue([]);

    await store.findAll();

    expect(repository.find).toHaveBeenCalledWith({ order: { id: 'ASC' } });
  });

  it('maps a unique violation to DuplicateUsernameError', async () => {
    repository.save.mockRejectedValue(pgError('23505'));

    await expect(
      store.create({ username: 'alice', passwordHash: 'h', isAdmin: false }),
    ).rejects.toBeInstanceOf(DuplicateUsernameError);
  });

  it.each([
    ['a refused connection', Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' })],
    ['a query timeout', pgError()],
    ['a connection exception', pgError('08006')],
    ['too many connections', pgError('53300')],
    ['an administrator shutdown', pgError('57P01')],
  ])('reports %s as StoreUnavailableError', async (_label, error) => {
    repository.findOne.mockRejectedValue(error);

    await expect(store.findByUsername('alice')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it.each([
    ['a syntax error', pgError('42601')],
    ['an ORM error', new EntityNotFoundError(User, { id: 1 })],
    ['a programming error', new TypeError('x is not a function')],
  ])('lets %s propagate', async (_label, error) => {
    repository.findOne.mockRejectedValue(error);

    await expect(store.findByUsername('alice')).rejects.toBe(error);
  });

  it('reloads the row after a role change', async () => {
    const updated = makeUser({ isAdmin: true });
    repository.update.mockResolvedValue({ affected: 1, raw: [], generatedMaps: [] });
    repository.findOne.mockResolvedValue(updated);

    await expect(store.updateRole(1, true)).resolves.toBe(updated);
    expect(repository.update).toHaveBeenCalledWith({ id: 1 }, { isAdmin: true });
  });

  it('returns null when an update matches no row', async () => {
    repository.update.mockResolvedValue({ affected: 0, raw: [], generatedMaps: [] });

    await expect(store.updatePassword(42, 'h')).resolves.toBeNull();
    expect(repository.findOne).not.toHaveBeenCalled();
  });

  it('reports whether a delete matched a row', async () => {
    repository.delete.mockResolvedValueOnce({ affected: 1, raw: [] });
    repository.delete.mockResolvedValueOnce({ affected: 0, raw: [] });

    await expect(store.delete(1)).resolves.toBe(true);
    await expect(store.delete(42)).resolves.toBe(false);
  });
});
