import { ConfigService } from '@nestjs/config';
import { AccountsService, PasswordHasher, StoreUnavailableError } from '@gatehouse/auth';
import { InMemoryUserStore } from '../../../../libs/auth/test/in-memory-user.store';
import { testAuthOptions } from '../../../../libs/auth/test/test-config';
import { CsvUpload, UserImportService } from '../../src/users/user-import.service';

function csv(name: string, ...lines: string[]): CsvUpload {
  return { originalname: name, buffer: Buffer.from(`${lines.join('\n')}\n`) };
}

describe('UserImportService', () => {
  let store: InMemoryUserStore;
  let hasher: PasswordHasher;
  let accounts: AccountsService;

  function makeService(settings: Record<string, string> = {}): UserImportService {
    return new UserImportService(accounts, new ConfigService(settings));
  }

  beforeEach(async () => {
    store = new InMemoryUserStore();
    hasher = new PasswordHasher(testAuthOptions);
    accounts = new AccountsService(store, hasher);
    await accounts.register('alice', 'wonderland');
  });

  it('creates one account per row', async () => {
    const report = await makeService().importFiles([
      csv('users.csv', 'username,password,is_admin', 'carol,carol-pass,true', 'dave,dave-pass,'),
    ]);

    expect(report).toEqual({ successCount: 2, errors: [] });
    await expect(store.findByUsername('carol')).resolves.toMatchObject({ id: 2, isAdmin: true });
    await expect(store.findByUsername('dave')).resolves.toMatchObject({ id: 3, isAdmin: false });
  });

  it('matches headers case-insensitively and ignores unknown columns', async () => {
    const report = await makeService().importFiles([
      csv('users.csv', 'Username,PASSWORD,Is_Admin,group_id', 'carol,carol-pass,TRUE,7'),
    ]);

    expect(report).toEqual({ successCount: 1, errors: [] });
    await expect(store.findByUsername('carol')).resolves.toMatchObject({ isAdmin: true });
  });

  it('falls back to the configured default password', async () => {
    const report = await makeService({ IMPORT_DEFAULT_PASSWORD: 'imported-pass' }).importFiles([
      csv('users.csv', 'username', 'henry'),
    ]);

    expect(report.successCount).toBe(1);
    const henry = await store.findByUsername('henry');
    expect(henry).not.toBeNull();
    await expect(hasher.verify('imported-pass', henry?.passwordHash ?? '')).resolves.toBe(true);
  });

  it('reports each bad row with its line and keeps going', async () => {
    const report = await makeService().importFiles([
      csv(
        'users.csv',
        'username,password,is_admin',
        'alice,wonderland,',
        ',orphan-pass,',
        'erin,short,',
        'grace,,',
        'ivan,ivan-pass,maybe',
        'frank,frank-pass,false',
        'frank,frank-pass,false',
      ),
    ]);

    expect(report).toEqual({
      successCount: 1,
      errors: [
        'users.csv line 2: user "alice" already exists',
        'users.csv line 3: username is required',
        'users.csv line 4: password must be at least 8 characters long',
        'users.csv line 5: password is required',
        'users.csv line 6: is_admin must be "true" or "false"',
        'users.csv line 8: user "frank" already exists',
      ],
    });
  });

  it('measures the password limit in bytes', async () => {
    const report = await makeService().importFiles([
      csv('users.csv', 'username,password', `zoe,${'é'.repeat(36)}a`),
    ]);

    expect(report).toEqual({
      successCount: 0,
      errors: ['users.csv line 2: password must be at most 72 bytes long'],
    });
  });

  it('skips files that are not CSV', async () => {
    const report = await makeService().importFiles([
      { originalname: 'users.txt', buffer: Buffer.from('username,password\ncarol,carol-pass\n') },
      csv('more.csv', 'username,password', 'dave,dave-pass'),
    ]);

    expect(report).toEqual({ successCount: 1, errors: ['File "users.txt" is not a CSV file'] });
  });

  it('reports a file that cannot be parsed', async () => {
    const report = await makeService().importFiles([csv('broken.csv', 'username', '"carol')]);

    expect(report.successCount).toBe(0);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(/^File "broken\.csv" could not be parsed: /);
  });

  it('aborts on a store outage', async () => {
    store.unavailable = true;

    await expect(
      makeService().importFiles([csv('users.csv', 'username,password', 'carol,carol-pass')]),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
