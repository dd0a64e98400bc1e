import type { TokenStore, TokenState } from '../types/token.js';

const EMPTY: Readonly<TokenState> = Object.freeze({});

/**
 * In-memory implementation of TokenStore
 * Tokens live for the process only and are never written anywhere.
 */
export class InMemoryTokenStore implements TokenStore {
  // Replaced wholesale on every write so a reader never sees a torn update
  private state: Readonly<TokenState> = EMPTY;

  snapshot(): Readonly<TokenState> {
    return this.state;
  }

  save(state: TokenState): void {
    this.state = Object.freeze({ ...state });
  }

  clear(): void {
    this.state = EMPTY;
  }

  isExpired(now: number = Date.now()): boolean {
    const { accessToken, expiresAt } = this.state;

    if (!accessToken) {
      return true; // No token means it's "expired"
    }

    if (expiresAt === undefined) {
      return false;
    }

    return now >= expiresAt;
  }
}
