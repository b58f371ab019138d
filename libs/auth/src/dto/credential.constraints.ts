/**
 * Input limits shared by every DTO that accepts credentials.
 *
 * bcrypt only reads the first 72 bytes of a password, so the upper
 * bound is counted in UTF-8 bytes, not characters: 36 × "é" is already
 * at the limit.
 */
export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 100;
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_BYTES = 72;

export function passwordByteLength(password: string): number {
  return Buffer.byteLength(password, 'utf8');
}

export function fitsPasswordLimit(password: string): boolean {
  return passwordByteLength(password) <= PASSWORD_MAX_BYTES;
}
