import { Expose } from 'class-transformer';
import { TOKEN_TYPE } from '../auth.constants';

/**
 * Response shape for a successful login.
 *
 * Serialized with OAuth2 token-response field names
 * (`access_token`, `token_type`, `expires_in`).
 */
export class TokenResponseDto {
  @Expose({ name: 'access_token' })
  accessToken: string;

  @Expose({ name: 'token_type' })
  tokenType: typeof TOKEN_TYPE;

  @Expose({ name: 'expires_in' })
  expiresIn: number;

  constructor(accessToken: string, expiresIn: number) {
    this.accessToken = accessToken;
    this.tokenType = TOKEN_TYPE;
    this.expiresIn = expiresIn;
  }
}
