/**
 * Hearthside - Scene Configuration
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface ExitWindow {
  start: number;
  end: number;
}

export interface SceneConfig {
  /** Turns an agent may take in one round before targeting them is ignored */
  turnCap?: number;
  /** Round at which a beat ends regardless of exit requests */
  forcedExitRound?: number;
  /** Rounds (inclusive) in which agents may ask to leave */
  exitWindow?: ExitWindow;
  /** Rotation turns before the orchestrator gives up on a beat; defaults to forcedExitRound × participants */
  maxTurnsPerBeat?: number;
  /** Timeout for a dialogue collaborator call in ms */
  collaboratorTimeoutMs?: number;
  /** Recent turns handed to the collaborator with each turn context */
  recentTurnLimit?: number;
  /** Beat events handed to the collaborator for reflection */
  reflectionEventLimit?: number;
  interjectionsEnabled?: boolean;
}

export type ResolvedSceneConfig = Required<Omit<SceneConfig, 'maxTurnsPerBeat'>> & {
  maxTurnsPerBeat?: number;
};

const positiveInt = z.number().int().positive();

export const ResolvedSceneConfigSchema = z.object({
  turnCap: positiveInt,
  forcedExitRound: positiveInt,
  exitWindow: z.object({ start: positiveInt, end: positiveInt }),
  maxTurnsPerBeat: positiveInt.optional(),
  collaboratorTimeoutMs: positiveInt,
  recentTurnLimit: z.number().int().nonnegative(),
  reflectionEventLimit: z.number().int().nonnegative(),
  interjectionsEnabled: z.boolean()
})
  .refine(c => c.exitWindow.start <= c.exitWindow.end, {
    message: 'exitWindow.start must not be after exitWindow.end',
    path: ['exitWindow']
  })
  .refine(c => c.forcedExitRound > c.exitWindow.start, {
    message: 'forcedExitRound must come after the start of the exit window',
    path: ['forcedExitRound']
  });

export const DEFAULT_SCENE_CONFIG: ResolvedSceneConfig = {
  turnCap: 2,
  forcedExitRound: 8,
  exitWindow: { start: 4, end: 7 },
  collaboratorTimeoutMs: 30000,
  recentTurnLimit: 3,
  reflectionEventLimit: 10,
  interjectionsEnabled: true
};

/**
 * Fill defaults and validate. Throws ConfigError on an inconsistent config.
 */
export function resolveSceneConfig(config: SceneConfig = {}): ResolvedSceneConfig {
  const resolved: ResolvedSceneConfig = {
    turnCap: config.turnCap ?? DEFAULT_SCENE_CONFIG.turnCap,
    forcedExitRound: config.forcedExitRound ?? DEFAULT_SCENE_CONFIG.forcedExitRound,
    exitWindow: config.exitWindow ?? { ...DEFAULT_SCENE_CONFIG.exitWindow },
    maxTurnsPerBeat: config.maxTurnsPerBeat,
    collaboratorTimeoutMs: config.collaboratorTimeoutMs ?? DEFAULT_SCENE_CONFIG.collaboratorTimeoutMs,
    recentTurnLimit: config.recentTurnLimit ?? DEFAULT_SCENE_CONFIG.recentTurnLimit,
    reflectionEventLimit: config.reflectionEventLimit ?? DEFAULT_SCENE_CONFIG.reflectionEventLimit,
    interjectionsEnabled: config.interjectionsEnabled ?? DEFAULT_SCENE_CONFIG.interjectionsEnabled
  };

  const result = ResolvedSceneConfigSchema.safeParse(resolved);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigError(`Invalid scene config: ${details.join('; ')}`);
  }
  return resolved;
}

// ============================================================================
// Environment
// ============================================================================

const envNumber = z.coerce.number().int().positive().optional();

const SceneEnvSchema = z.object({
  HEARTHSIDE_TURN_CAP: envNumber,
  HEARTHSIDE_FORCED_EXIT_ROUND: envNumber,
  HEARTHSIDE_EXIT_WINDOW_START: envNumber,
  HEARTHSIDE_EXIT_WINDOW_END: envNumber,
  HEARTHSIDE_COLLABORATOR_TIMEOUT_MS: envNumber
});

/**
 * Read scene config overrides from environment variables. Unset or empty
 * variables fall back to the defaults.
 */
export function sceneConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedSceneConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(SceneEnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = SceneEnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${details.join('; ')}`);
  }

  const vars = parsed.data;
  return resolveSceneConfig({
    turnCap: vars.HEARTHSIDE_TURN_CAP,
    forcedExitRound: vars.HEARTHSIDE_FORCED_EXIT_ROUND,
    exitWindow: {
      start: vars.HEARTHSIDE_EXIT_WINDOW_START ?? DEFAULT_SCENE_CONFIG.exitWindow.start,
      end: vars.HEARTHSIDE_EXIT_WINDOW_END ?? DEFAULT_SCENE_CONFIG.exitWindow.end
    },
    collaboratorTimeoutMs: vars.HEARTHSIDE_COLLABORATOR_TIMEOUT_MS
  });
}
