import { describe, expect, it, vi } from 'vitest';

import type { SceneEvent } from '../../src/core/types.js';
import { createConsoleEventLogger, formatEvent } from '../../src/logging/console-logger.js';

function makeEvent(overrides: Partial<SceneEvent> = {}): SceneEvent {
  return {
    id: 'evt-1',
    sceneNumber: 1,
    beatNumber: 2,
    round: 3,
    category: 'CONVERSATION',
    eventType: 'PRIORITY_SET',
    level: 'INFO',
    actorId: 'Alice',
    targetId: 'Bob',
    payload: { message: 'Alice targeted Bob; they speak next' },
    timestamp: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides
  };
}

function makeSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('formatEvent', () => {
  it('renders position, type, participants and message', () => {
    expect(formatEvent(makeEvent())).toBe(
      '[S1.B2.R3] CONVERSATION/PRIORITY_SET Alice -> Bob Alice targeted Bob; they speak next'
    );
  });

  it('omits missing parts', () => {
    expect(formatEvent(makeEvent({ actorId: undefined, targetId: undefined, payload: {} })))
      .toBe('[S1.B2.R3] CONVERSATION/PRIORITY_SET');
    expect(formatEvent(makeEvent({ targetId: undefined, payload: { message: 7 } })))
      .toBe('[S1.B2.R3] CONVERSATION/PRIORITY_SET Alice');
  });
});

describe('createConsoleEventLogger', () => {
  it('drops events below the minimum level', () => {
    const sink = makeSink();
    const log = createConsoleEventLogger({ sink });
    log(makeEvent({ level: 'DEBUG' }));
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
  });

  it('routes each level to its console method', () => {
    const sink = makeSink();
    const log = createConsoleEventLogger({ sink, minLevel: 'DEBUG' });
    const warning = makeEvent({ level: 'WARN', eventType: 'MALFORMED_RESPONSE', payload: { operation: 'generateTurn' } });

    log(makeEvent({ level: 'DEBUG' }));
    log(makeEvent());
    log(warning);
    log(makeEvent({ level: 'ERROR', eventType: 'WORLD_SAVE_FAILED', actorId: undefined, targetId: undefined, payload: {} }));

    expect(sink.debug).toHaveBeenCalledTimes(1);
    expect(sink.info).toHaveBeenCalledTimes(1);
    expect(sink.warn).toHaveBeenCalledWith(
      '[S1.B2.R3] CONVERSATION/MALFORMED_RESPONSE Alice -> Bob',
      { operation: 'generateTurn' }
    );
    expect(sink.error).toHaveBeenCalledWith('[S1.B2.R3] CONVERSATION/WORLD_SAVE_FAILED', {});
  });

  it('writes to the global console by default', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    createConsoleEventLogger()(makeEvent());
    expect(info).toHaveBeenCalledWith('[S1.B2.R3] CONVERSATION/PRIORITY_SET Alice -> Bob Alice targeted Bob; they speak next');
    info.mockRestore();
  });
});
