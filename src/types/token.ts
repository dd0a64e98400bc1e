/**
 * Token and TokenStore type definitions
 */

/**
 * Current OAuth tokens. Every field is absent until the first exchange.
 */
export interface TokenState {
  accessToken?: string;
  refreshToken?: string;
  expiresAt?: number; // Unix timestamp in milliseconds, refresh margin already subtracted
}

/**
 * Body returned by the token endpoint on success
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  id_token?: string;
  scope?: string;
  token_type?: string;
}

/**
 * Holder of the current token state
 */
export interface TokenStore {
  /**
   * Current state; never a partially written one
   */
  snapshot(): Readonly<TokenState>;

  /**
   * Replace the state
   */
  save(state: TokenState): void;

  /**
   * Forget every token
   */
  clear(): void;

  /**
   * True when there is no access token or it is past its expiry
   */
  isExpired(now?: number): boolean;
}
