import { ConfigurationError } from '../errors/index.js';

/**
 * Format a date the way the provider expects timestamps: UTC, whole seconds,
 * ISO-8601 with a trailing Z (e.g. 2024-03-01T14:30:00Z).
 */
export function toProviderTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError('Invalid date');
  }
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
