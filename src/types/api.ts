// Request and response shapes for the brokerage REST and streaming surface.
// Payloads are owned by the provider; only the fields this client reads or
// builds are typed, the rest pass through.

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export type JsonObject = Record<string, unknown>;

// ============================================================================
// Market Data
// ============================================================================

export type BarUnit = 'Minute' | 'Daily' | 'Weekly' | 'Monthly';

export type SessionTemplate = 'USEQPre' | 'USEQPost' | 'USEQPreAndPost' | 'USEQ24Hour' | 'Default';

export interface BarsQuery {
  interval?: number;
  unit?: BarUnit;
  barsBack?: number;
  firstDate?: Date;
  lastDate?: Date;
  sessionTemplate?: SessionTemplate;
}

export interface StreamBarsQuery {
  interval?: number;
  unit?: BarUnit;
  barsBack?: number;
  sessionTemplate?: SessionTemplate;
}

export interface Bar {
  High: string;
  Low: string;
  Open: string;
  Close: string;
  TimeStamp: string;
  TotalVolume: string;
  [key: string]: unknown;
}

export interface BarsResponse {
  Bars?: Bar[];
}

// ============================================================================
// Brokerage
// ============================================================================

export type IdList = string | string[];

export interface StreamPositionsQuery {
  changes?: boolean;
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * One decoded line of a streaming response
 */
export type StreamMessage = JsonObject;

export type StreamEventKind = 'heartbeat' | 'error' | 'status' | 'deleted' | 'data';
