/**
 * Injection tokens for the auth library.
 *
 * String tokens because both values are interfaces, not classes, and
 * the store implementation lives in another package.
 */
export const AUTH_OPTIONS = 'AUTH_OPTIONS';
export const USER_STORE = 'USER_STORE';

/** Token type reported to clients, per the OAuth2 bearer convention */
export const TOKEN_TYPE = 'bearer';
