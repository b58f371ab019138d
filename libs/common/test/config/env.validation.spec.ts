import { validateEnv } from '../../src/config/env.validation';

const minimal = { JWT_SECRET: 'test-secret-0123456789' };

describe('validateEnv', () => {
  it('applies defaults and coerces numbers', () => {
    const env = validateEnv({ ...minimal, API_PORT: '9000', JWT_EXPIRATION: '600' });

    expect(env.API_PORT).toBe(9000);
    expect(env.ADMIN_PORT).toBe(8001);
    expect(env.JWT_EXPIRATION).toBe(600);
    expect(env.BCRYPT_SALT_ROUNDS).toBe(12);
    expect(env.POSTGRES_HOST).toBe('localhost');
  });

  it('refuses to start without a signing secret', () => {
    expect(() => validateEnv({})).toThrow(
      'Invalid environment configuration. Missing/invalid: JWT_SECRET. See .env.example.',
    );
  });

  it('refuses a short signing secret without echoing it', () => {
    expect(() => validateEnv({ JWT_SECRET: 'tiny-secret' })).toThrow(
      /^Invalid environment configuration\. Missing\/invalid: JWT_SECRET\. See \.env\.example\.$/,
    );
  });

  it('names every invalid key', () => {
    expect(() =>
      validateEnv({ ...minimal, BCRYPT_SALT_ROUNDS: '3', JWT_EXPIRATION: 'soon' }),
    ).toThrow('Missing/invalid: JWT_EXPIRATION, BCRYPT_SALT_ROUNDS.');
  });

  it('requires both initial admin settings or neither', () => {
    expect(() => validateEnv({ ...minimal, INITIAL_ADMIN_USERNAME: 'root' })).toThrow(
      'Missing/invalid: INITIAL_ADMIN_PASSWORD.',
    );

    const env = validateEnv({
      ...minimal,
      INITIAL_ADMIN_USERNAME: ' root ',
      INITIAL_ADMIN_PASSWORD: 'correct-horse',
    });
    expect(env.INITIAL_ADMIN_USERNAME).toBe('root');
  });

  it('measures password limits in bytes', () => {
    expect(() =>
      validateEnv({
        ...minimal,
        INITIAL_ADMIN_USERNAME: 'root',
        INITIAL_ADMIN_PASSWORD: `${'é'.repeat(36)}a`,
      }),
    ).toThrow('Missing/invalid: INITIAL_ADMIN_PASSWORD.');

    expect(() =>
      validateEnv({ ...minimal, IMPORT_DEFAULT_PASSWORD: 'é'.repeat(37) }),
    ).toThrow('Missing/invalid: IMPORT_DEFAULT_PASSWORD.');

    const env = validateEnv({ ...minimal, IMPORT_DEFAULT_PASSWORD: 'é'.repeat(36) });
    expect(env.IMPORT_DEFAULT_PASSWORD).toBe('é'.repeat(36));
  });
});
