/**
 * Hearthside - Console Event Logger
 *
 * Stock event listener. Pass to `addEventListener` to see a beat unfold.
 */

import { isAtLeast, type EventHandler, type EventLevel, type SceneEvent } from '../core/types.js';

export interface ConsoleSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Events below this level are dropped. Default INFO. */
  minLevel?: EventLevel;
  sink?: ConsoleSink;
}

export function formatEvent(event: SceneEvent): string {
  const where = `S${event.sceneNumber}.B${event.beatNumber}.R${event.round}`;
  const who = event.actorId
    ? event.targetId ? ` ${event.actorId} -> ${event.targetId}` : ` ${event.actorId}`
    : '';
  const message = typeof event.payload.message === 'string' ? ` ${event.payload.message}` : '';
  return `[${where}] ${event.category}/${event.eventType}${who}${message}`;
}

export function createConsoleEventLogger(options: ConsoleLoggerOptions = {}): EventHandler {
  const minLevel = options.minLevel ?? 'INFO';
  const sink = options.sink ?? console;

  return (event) => {
    if (!isAtLeast(event.level, minLevel)) return;

    const line = formatEvent(event);
    switch (event.level) {
      case 'DEBUG':
        sink.debug(line);
        break;
      case 'INFO':
        sink.info(line);
        break;
      case 'WARN':
        sink.warn(line, event.payload);
        break;
      case 'ERROR':
        sink.error(line, event.payload);
        break;
    }
  };
}
