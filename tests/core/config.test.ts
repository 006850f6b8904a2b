import { describe, expect, it } from 'vitest';

import { DEFAULT_SCENE_CONFIG, resolveSceneConfig, sceneConfigFromEnv } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('SceneConfig: resolution', () => {
  it('fills every default', () => {
    expect(resolveSceneConfig()).toEqual({ ...DEFAULT_SCENE_CONFIG, maxTurnsPerBeat: undefined });
  });

  it('keeps overrides', () => {
    const config = resolveSceneConfig({ turnCap: 3, forcedExitRound: 6, exitWindow: { start: 2, end: 5 } });
    expect(config.turnCap).toBe(3);
    expect(config.forcedExitRound).toBe(6);
    expect(config.exitWindow).toEqual({ start: 2, end: 5 });
    expect(config.recentTurnLimit).toBe(3);
  });

  it('rejects an inverted exit window', () => {
    expect(() => resolveSceneConfig({ exitWindow: { start: 6, end: 4 } })).toThrow(ConfigError);
  });

  it('rejects a forced exit round at or before the window start', () => {
    expect(() => resolveSceneConfig({ forcedExitRound: 4 })).toThrow(
      'Invalid scene config: forcedExitRound: forcedExitRound must come after the start of the exit window'
    );
  });

  it('rejects a zero turn cap', () => {
    expect(() => resolveSceneConfig({ turnCap: 0 })).toThrow(ConfigError);
  });
});

describe('SceneConfig: environment', () => {
  it('reads numeric overrides and ignores blank values', () => {
    const config = sceneConfigFromEnv({
      HEARTHSIDE_TURN_CAP: '3',
      HEARTHSIDE_FORCED_EXIT_ROUND: '',
      HEARTHSIDE_COLLABORATOR_TIMEOUT_MS: '500'
    });
    expect(config.turnCap).toBe(3);
    expect(config.forcedExitRound).toBe(8);
    expect(config.collaboratorTimeoutMs).toBe(500);
    expect(config.exitWindow).toEqual({ start: 4, end: 7 });
  });

  it('throws ConfigError on a non-numeric value', () => {
    expect(() => sceneConfigFromEnv({ HEARTHSIDE_TURN_CAP: 'lots' })).toThrow(ConfigError);
  });

  it('returns defaults for an empty environment', () => {
    expect(sceneConfigFromEnv({})).toEqual({ ...DEFAULT_SCENE_CONFIG, maxTurnsPerBeat: undefined });
  });
});
