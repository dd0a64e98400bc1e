import type { StreamEventKind, StreamMessage } from '../types/index.js';
import logger from '../config/logger.js';

/**
 * One method per kind of message a stream can carry
 */
export interface StreamHandlers {
  onData(message: StreamMessage): void;
  onError(message: StreamMessage): void;
  onHeartbeat(message: StreamMessage): void;
  onStatus(message: StreamMessage): void;
  onDeleted(message: StreamMessage): void;
}

// Marker keys, checked in this order
const MARKERS: ReadonlyArray<[string, StreamEventKind]> = [
  ['Heartbeat', 'heartbeat'],
  ['Error', 'error'],
  ['StreamStatus', 'status'],
  ['Deleted', 'deleted'],
];

export function classifyStreamMessage(message: StreamMessage): StreamEventKind {
  for (const [key, kind] of MARKERS) {
    if (key in message) return kind;
  }
  return 'data';
}

export const defaultStreamHandlers: StreamHandlers = {
  onData: (message) => logger.info({ message }, 'Stream data'),
  onError: (message) => logger.error({ message }, 'Stream error'),
  onHeartbeat: (message) => logger.debug({ message }, 'Stream heartbeat'),
  onStatus: (message) => logger.info({ message }, 'Stream status'),
  onDeleted: (message) => logger.info({ message }, 'Stream deletion'),
};

/**
 * Route a single message to exactly one handler
 */
export function dispatchStreamMessage(message: StreamMessage, handlers: StreamHandlers): StreamEventKind {
  const kind = classifyStreamMessage(message);
  switch (kind) {
    case 'heartbeat':
      handlers.onHeartbeat(message);
      break;
    case 'error':
      handlers.onError(message);
      break;
    case 'status':
      handlers.onStatus(message);
      break;
    case 'deleted':
      handlers.onDeleted(message);
      break;
    case 'data':
      handlers.onData(message);
      break;
  }
  return kind;
}

/**
 * Drain a stream into handlers. Resolves when the stream ends and rejects
 * with whatever ended it early (a non-200 or a malformed line).
 */
export async function consumeStream(
  stream: AsyncIterable<StreamMessage>,
  handlers: Partial<StreamHandlers> = {}
): Promise<void> {
  const resolved: StreamHandlers = { ...defaultStreamHandlers, ...handlers };
  for await (const message of stream) {
    dispatchStreamMessage(message, resolved);
  }
}
