import type { BarsQuery, IdList, QueryParams, StreamBarsQuery } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { toProviderTimestamp } from '../utils/time.js';

export const MAX_TICK_INTERVAL = 64999;
export const MAX_STREAM_BARS_BACK = 57600;

/**
 * "A" or ["A", "B"] -> "A,B", the form the provider takes in paths and queries
 */
export function joinIds(ids: IdList): string {
  const list = typeof ids === 'string' ? [ids] : ids;
  if (list.length === 0) {
    throw new ConfigurationError('At least one identifier is required');
  }
  return list.join(',');
}

export function buildBarsParams(query: BarsQuery = {}): QueryParams {
  if (query.barsBack && query.firstDate) {
    throw new ConfigurationError('barsBack and firstDate are mutually exclusive. Choose one.');
  }

  const params: QueryParams = {
    interval: query.interval ?? 1,
    unit: query.unit ?? 'Daily',
    sessiontemplate: query.sessionTemplate ?? 'Default',
  };

  if (query.firstDate) {
    params.firstdate = toProviderTimestamp(query.firstDate);
  } else {
    params.barsback = query.barsBack || 1;
  }

  if (query.lastDate) {
    params.lastdate = toProviderTimestamp(query.lastDate);
  }

  return params;
}

export function buildStreamBarsParams(query: StreamBarsQuery = {}): QueryParams {
  const interval = query.interval ?? 1;
  if (!Number.isInteger(interval) || interval < 1 || interval > MAX_TICK_INTERVAL) {
    throw new ConfigurationError(`Interval must be between 1 and ${MAX_TICK_INTERVAL} ticks.`);
  }
  if (query.barsBack !== undefined && (query.barsBack < 1 || query.barsBack > MAX_STREAM_BARS_BACK)) {
    throw new ConfigurationError(`BarsBack must be between 1 and ${MAX_STREAM_BARS_BACK}.`);
  }

  return {
    interval,
    unit: query.unit ?? 'Daily',
    sessiontemplate: query.sessionTemplate ?? 'Default',
    barsback: query.barsBack,
  };
}

export function buildPositionsParams(symbols?: IdList): QueryParams {
  if (!symbols || symbols.length === 0) {
    return {};
  }
  return { symbol: joinIds(symbols) };
}
