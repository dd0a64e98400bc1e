// Configuration types for the brokerage client

// ============================================================================
// Endpoints
// ============================================================================

export const AUTHORIZE_URL = 'https://signin.tradestation.com/authorize';
export const TOKEN_URL = 'https://signin.tradestation.com/oauth/token';
export const AUDIENCE = 'https://api.tradestation.com';
export const SCOPES = 'openid profile offline_access MarketData ReadAccount Trade';
export const LIVE_API_URL = 'https://api.tradestation.com/v3';
export const DEMO_API_URL = 'https://sim-api.tradestation.com/v3';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Opens the authorize URL for the user. Defaults to the system browser.
 */
export type BrowserOpener = (url: string) => Promise<void>;

/**
 * Options accepted by the client. Everything except the credentials has a
 * default; credentials fall back to CLIENT_ID / CLIENT_SECRET.
 */
export interface ClientOptions {
  clientId?: string;
  clientSecret?: string;
  /** Local port for the OAuth redirect listener. 0 picks a free port. */
  port?: number;
  /** Simulation environment when true (the default), live otherwise. */
  demo?: boolean;
  refreshMarginMs?: number;
  authTimeoutMs?: number;
  requestTimeoutMs?: number;
  autoRefresh?: boolean;
  openBrowser?: BrowserOpener;
}

export interface ClientConfig {
  clientId: string;
  clientSecret: string;
  port: number;
  demo: boolean;
  apiUrl: string;
  refreshMarginMs: number;
  authTimeoutMs: number;
  requestTimeoutMs: number;
  autoRefresh: boolean;
  openBrowser?: BrowserOpener;
}

/**
 * Shape of the YAML file read by the CLI.
 */
export interface ConfigFile {
  client?: {
    clientId?: string;
    clientSecret?: string;
    port?: number;
    demo?: boolean;
  };
  auth?: {
    refreshMarginMs?: number;
    timeoutMs?: number;
    autoRefresh?: boolean;
  };
  http?: {
    timeoutMs?: number;
  };
}
