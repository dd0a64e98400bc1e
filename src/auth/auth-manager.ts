import axios from 'axios';
import open from 'open';
import { randomBytes } from 'crypto';
import { AUDIENCE, AUTHORIZE_URL, SCOPES, TOKEN_URL } from '../config/types.js';
import type { BrowserOpener, ClientConfig, TokenResponse, TokenState, TokenStore } from '../types/index.js';
import { AuthenticationError } from '../errors/index.js';
import { CallbackServer, type CallbackReply } from './callback-server.js';
import { getAuthSuccessHTML } from './success-page.js';
import { createDeferred, type Deferred } from '../utils/deferred.js';
import logger from '../config/logger.js';

export const DEFAULT_EXPIRES_IN_SECONDS = 1200;
// Floor between two scheduled refreshes; only the first one may fire at once
export const MIN_REFRESH_INTERVAL_MS = 10_000;

type AuthConfig = Pick<
  ClientConfig,
  'clientId' | 'clientSecret' | 'port' | 'refreshMarginMs' | 'authTimeoutMs' | 'requestTimeoutMs' | 'openBrowser'
>;

/**
 * State of one authorization-code flow, captured by the redirect handler
 */
interface PendingAuthorization {
  state: string;
  redirectUri: string;
  gate: Deferred<TokenState>;
  /** Set once a redirect has been accepted for processing */
  claimed: boolean;
}

export const defaultBrowserOpener: BrowserOpener = async (url: string) => {
  await open(url);
};

/**
 * Parse the token endpoint body. Anything without a string access_token is rejected.
 */
export function parseTokenResponse(text: string): TokenResponse {
  const body = parseJson(text);

  if (!body || typeof body !== 'object' || !('access_token' in body) || typeof body.access_token !== 'string') {
    throw new AuthenticationError(`Token endpoint response has no access_token: ${text}`, text);
  }

  const response: TokenResponse = { access_token: body.access_token };
  if ('refresh_token' in body && typeof body.refresh_token === 'string') {
    response.refresh_token = body.refresh_token;
  }
  if ('expires_in' in body && typeof body.expires_in === 'number') {
    response.expires_in = body.expires_in;
  }
  return response;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new AuthenticationError(`Token endpoint returned invalid JSON: ${text}`, text);
  }
}

function responseText(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * AuthManager handles the authorization-code flow and the token lifecycle
 */
export class AuthManager {
  private tokenStore: TokenStore;
  private config: AuthConfig;
  private refreshTimer?: NodeJS.Timeout;
  private refreshLoopActive = false;

  constructor(tokenStore: TokenStore, config: AuthConfig) {
    this.tokenStore = tokenStore;
    this.config = config;
  }

  /**
   * Authorize URL the user is sent to
   */
  buildAuthorizeUrl(redirectUri: string, state: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.config.clientId,
      audience: AUDIENCE,
      redirect_uri: redirectUri,
      scope: SCOPES,
      state,
    });
    return `${AUTHORIZE_URL}?${params.toString()}`;
  }

  /**
   * Run the authorization-code flow: listen for the redirect, open the
   * browser, wait for the code and exchange it. Rejects with
   * AuthenticationError on a failed exchange, a denied consent or a timeout.
   */
  async authenticate(): Promise<TokenState> {
    const pending: PendingAuthorization = {
      state: randomBytes(32).toString('hex'),
      redirectUri: '',
      gate: createDeferred<TokenState>(),
      claimed: false,
    };

    const server = new CallbackServer((query) => this.handleRedirect(query, pending));
    const port = await server.start(this.config.port);
    pending.redirectUri = `http://localhost:${port}/`;

    const timer = setTimeout(() => {
      pending.gate.reject(
        new AuthenticationError(`Authorization was not completed within ${this.config.authTimeoutMs} ms`)
      );
    }, this.config.authTimeoutMs);

    try {
      const authorizeUrl = this.buildAuthorizeUrl(pending.redirectUri, pending.state);
      logger.info({ redirectUri: pending.redirectUri }, 'Starting authorization flow');

      // The redirect can settle the gate before the opener returns
      const browserOpened = this.launchBrowser(authorizeUrl);
      try {
        return await pending.gate.promise;
      } finally {
        await browserOpened;
      }
    } finally {
      clearTimeout(timer);
      await server.stop();
    }
  }

  private async launchBrowser(authorizeUrl: string): Promise<void> {
    const openBrowser = this.config.openBrowser ?? defaultBrowserOpener;
    try {
      await openBrowser(authorizeUrl);
    } catch (error) {
      logger.warn({ authorizeUrl, error: String(error) }, 'Could not open a browser, open the URL manually');
    }
  }

  /**
   * Decide the reply for one inbound redirect and settle the flow when it is final.
   * The flow is settled here, not when the reply is delivered: the browser may
   * hang up while the code is being exchanged.
   */
  private async handleRedirect(query: URLSearchParams, pending: PendingAuthorization): Promise<CallbackReply> {
    if (pending.claimed || pending.gate.settled) {
      return { status: 410, contentType: 'text/plain', body: 'Authorization already completed.' };
    }

    const stateMatches = query.get('state') === pending.state;
    const stateMismatch: CallbackReply = { status: 400, contentType: 'text/plain', body: 'State mismatch.' };

    const error = query.get('error');
    if (error) {
      if (!stateMatches) {
        logger.warn('Error redirect with a foreign state, ignoring');
        return stateMismatch;
      }
      pending.claimed = true;
      const description = query.get('error_description');
      const message = description ? `${error}: ${description}` : error;
      logger.error({ error: message }, 'Authorization denied');
      pending.gate.reject(new AuthenticationError(`Authorization failed: ${message}`, message));
      return { status: 400, contentType: 'text/plain', body: `Authorization failed: ${message}` };
    }

    const code = query.get('code');
    if (!code) {
      return { status: 400, contentType: 'text/plain', body: 'No authorization code found.' };
    }

    if (!stateMatches) {
      logger.warn('Redirect state does not match, ignoring');
      return stateMismatch;
    }

    pending.claimed = true;
    try {
      const tokens = await this.exchangeCodeForToken(code, pending.redirectUri);
      pending.gate.resolve(tokens);
      return { status: 200, contentType: 'text/html', body: getAuthSuccessHTML() };
    } catch (exchangeError) {
      const authError =
        exchangeError instanceof AuthenticationError ? exchangeError : new AuthenticationError(String(exchangeError));
      pending.gate.reject(authError);
      return { status: 502, contentType: 'text/plain', body: authError.message };
    }
  }

  /**
   * Exchange an authorization code for tokens
   */
  async exchangeCodeForToken(code: string, redirectUri: string): Promise<TokenState> {
    logger.info('Exchanging authorization code');

    const tokenSet = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    this.tokenStore.save(tokenSet);
    logger.info({ expiresAt: tokenSet.expiresAt }, 'Authorization code exchanged');
    return tokenSet;
  }

  /**
   * Exchange the refresh token for a new access token
   */
  async refreshToken(): Promise<TokenState> {
    const current = this.tokenStore.snapshot();

    if (!current.refreshToken) {
      throw new AuthenticationError('No refresh token available');
    }

    logger.info('Refreshing token');

    try {
      const refreshed = await this.requestToken({
        grant_type: 'refresh_token',
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        refresh_token: current.refreshToken,
      });

      const tokenSet: TokenState = {
        ...refreshed,
        refreshToken: refreshed.refreshToken || current.refreshToken,
      };

      this.tokenStore.save(tokenSet);
      logger.info({ expiresAt: tokenSet.expiresAt }, 'Token refreshed successfully');

      return tokenSet;
    } catch (error) {
      logger.error({ error: String(error) }, 'Failed to refresh token');

      // If refresh fails, the session is over
      this.tokenStore.clear();

      throw error;
    }
  }

  /**
   * Get the current tokens, refreshing first if they have expired
   */
  async getValidToken(): Promise<TokenState> {
    if (this.tokenStore.isExpired()) {
      const token = this.tokenStore.snapshot();
      if (token.refreshToken) {
        return await this.refreshToken();
      }
      throw new AuthenticationError('Token expired and no refresh token available. Please re-authenticate.');
    }

    return this.tokenStore.snapshot();
  }

  /**
   * Keep refreshing ahead of expiry until stopped or no refresh token is left
   */
  startRefreshLoop(): void {
    if (this.refreshLoopActive) {
      logger.warn('Refresh loop already started');
      return;
    }
    this.refreshLoopActive = true;
    this.scheduleNextRefresh(0);
  }

  stopRefreshLoop(): void {
    this.refreshLoopActive = false;
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = undefined;
      logger.info('Refresh loop stopped');
    }
  }

  isRefreshLoopActive(): boolean {
    return this.refreshLoopActive;
  }

  private scheduleNextRefresh(minDelayMs: number): void {
    if (!this.refreshLoopActive) {
      return;
    }

    const { refreshToken, expiresAt } = this.tokenStore.snapshot();
    if (!refreshToken) {
      logger.info('No refresh token available, refresh loop ended');
      this.refreshLoopActive = false;
      return;
    }

    const now = Date.now();
    const dueInMs = (expiresAt ?? now) - now - this.config.refreshMarginMs;
    const delayMs = Math.max(dueInMs, minDelayMs, 0);
    if (minDelayMs > 0 && dueInMs < minDelayMs) {
      logger.warn(
        { refreshMarginMs: this.config.refreshMarginMs, delayMs },
        'Refresh margin leaves no room before the next refresh, spacing refreshes out'
      );
    }
    logger.debug({ delayMs }, 'Next token refresh scheduled');

    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = undefined;
      this.refreshToken().then(
        () => this.scheduleNextRefresh(MIN_REFRESH_INTERVAL_MS),
        (error: unknown) => {
          logger.error({ error: String(error) }, 'Scheduled refresh failed, refresh loop ended');
          this.refreshLoopActive = false;
        }
      );
    }, delayMs);
    this.refreshTimer.unref();
  }

  /**
   * POST a form-encoded grant to the token endpoint and turn a 200 into TokenState
   */
  private async requestToken(form: Record<string, string>): Promise<TokenState> {
    let status: number;
    let text: string;

    try {
      const response = await axios.post(TOKEN_URL, new URLSearchParams(form).toString(), {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded'
        },
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        timeout: this.config.requestTimeoutMs,
      });
      status = response.status;
      text = responseText(response.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(`Token request failed: ${message}`);
    }

    const receivedAt = Date.now();

    if (status !== 200) {
      throw new AuthenticationError(`Error obtaining token: ${text}`, text);
    }

    const body = parseTokenResponse(text);
    const expiresIn = body.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;

    return {
      accessToken: body.access_token,
      refreshToken: body.refresh_token,
      expiresAt: receivedAt + expiresIn * 1000 - this.config.refreshMarginMs,
    };
  }
}
