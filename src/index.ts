/**
 * Hearthside - Emergent Village Scenes
 *
 * Multi-agent narrative beats with:
 * - Round-based turn scheduling with targeting, caps and exit negotiation
 * - A directed, decaying trust/affection graph between villagers
 * - Nature/nurture personalities that drive interjections
 * - Versioned world snapshots, SQLite history and beat tracking
 *
 * Dialogue text comes from an external collaborator; the engine only
 * guarantees turn order, round/termination bookkeeping and relationship
 * arithmetic.
 *
 * @license MIT
 */

// Core types & configuration
export {
  AgentSchema,
  EventCategorySchema,
  EventLevelSchema,
  SceneEventSchema,
  isAtLeast,
  wholeDays
} from './core/types.js';
export type {
  Agent,
  EventCategory,
  EventLevel,
  SceneEvent,
  EventHandler
} from './core/types.js';

export {
  DEFAULT_SCENE_CONFIG,
  ResolvedSceneConfigSchema,
  resolveSceneConfig,
  sceneConfigFromEnv
} from './core/config.js';
export type { SceneConfig, ResolvedSceneConfig, ExitWindow } from './core/config.js';

export {
  UnknownAgentError,
  SceneStateError,
  SnapshotSchemaError,
  ConfigError,
  CollaboratorTimeoutError
} from './core/errors.js';

export { BoundedBuffer } from './core/bounded-buffer.js';

// Conversation
export { TurnScheduler, energyForRound } from './conversation/scheduler.js';
export {
  TurnSchema,
  TurnKindSchema,
  EnergyLevelSchema,
  EndReasonSchema,
  isSkipped
} from './conversation/types.js';
export type {
  Turn,
  TurnKind,
  TurnInput,
  TurnRecord,
  EnergyLevel,
  EndReason,
  EndDecision,
  SchedulerStatus,
  SchedulerNotice,
  SchedulerNoticeType,
  SpeakerSelection,
  ConversationSnapshot,
  ConversationSummary,
  TurnStatistics
} from './conversation/types.js';

// Relationships
export { RelationshipMatrix, deriveLabel, labelForStanding, clampScore } from './relationships/matrix.js';
export type { RelationshipView } from './relationships/matrix.js';
export {
  StandingSchema,
  RelationshipRecordSchema,
  HISTORY_CAPACITY,
  GOSSIP_CAPACITY,
  NEUTRAL_SCORE,
  DECAY_PER_DAY,
  FORGET_AFTER_DAYS,
  ASYMMETRY_THRESHOLD
} from './relationships/types.js';
export type {
  Standing,
  RelationshipStatus,
  RelationshipLabel,
  RelationshipRecord,
  RelationshipContext,
  RelationshipUpdateResult,
  ScoreSnapshot,
  Asymmetry,
  DecayReport
} from './relationships/types.js';

// Personality
export { PersonalityState, Nurture, PersonalityGenerator } from './personality/personality.js';
export {
  NatureSchema,
  NurtureRecordSchema,
  PersonalityRecordSchema,
  ExperienceKindSchema,
  ArchetypeSchema
} from './personality/types.js';
export type {
  Nature,
  NurtureRecord,
  PersonalityRecord,
  PersonalitySnapshot,
  ExperienceKind,
  Archetype
} from './personality/types.js';

// Interjections
export { InterjectionEvaluator, evaluateInterjection, TRIGGER_PRIORITY } from './interjection/evaluator.js';
export type {
  InterjectionTrigger,
  InterjectionInput,
  InterjectionDecision,
  ObserverSource
} from './interjection/evaluator.js';

// Scenes
export { Cast, AgentStateRecordSchema } from './scene/cast.js';
export type { AgentStatus, AgentStateRecord, ReflectionOutcome, TimeReport } from './scene/cast.js';
export { StoryState, DEFAULT_RESOURCES } from './scene/story.js';
export type { StorySummary } from './scene/story.js';
export { SceneOrchestrator, describeTurn } from './scene/orchestrator.js';
export type { OrchestratorOptions, BeatResult } from './scene/orchestrator.js';
export { ScriptedDialogueGenerator } from './scene/scripted.js';
export type { ScriptedReply, ScriptedGeneratorOptions } from './scene/scripted.js';
export { parseTurnIntentText, parseReflectionText, extractJsonBlock, normalizeQuotes } from './scene/parsing.js';
export {
  SceneRecordSchema,
  BeatRecordSchema,
  BeatSetupSchema,
  ResourcesSchema,
  StoryRecordSchema,
  TurnIntentSchema,
  ReflectionSchema,
  RelationshipDeltaSchema,
  emptyReflection
} from './scene/types.js';
export type {
  SceneRecord,
  BeatRecord,
  BeatSetup,
  Resources,
  StoryRecord,
  TurnIntent,
  TurnIntentInput,
  Reflection,
  ReflectionInput,
  RelationshipDelta,
  TurnContext,
  ReflectionContext,
  InterjectionCue,
  DialogueGenerator
} from './scene/types.js';

// Persistence
export {
  WORLD_SNAPSHOT_VERSION,
  WorldSnapshotSchema,
  serializeWorld,
  deserializeWorld
} from './persistence/snapshot.js';
export type { WorldSnapshot, World, WorldStore } from './persistence/snapshot.js';

// Database layer
export { HearthsideDatabase } from './db/database.js';
export type { DatabaseConfig, SnapshotInfo, EventQuery } from './db/database.js';

// Tracking & logging
export { BeatTracker } from './tracking/tracker.js';
export type { ExperimentConfig, RunStatus } from './tracking/tracker.js';
export { createConsoleEventLogger, formatEvent } from './logging/console-logger.js';
export type { ConsoleLoggerOptions, ConsoleSink } from './logging/console-logger.js';

// ============================================================================
// Quick Start Factory
// ============================================================================

import type { Agent } from './core/types.js';
import type { SceneConfig } from './core/config.js';
import { HearthsideDatabase } from './db/database.js';
import { BeatTracker } from './tracking/tracker.js';
import { Cast } from './scene/cast.js';
import { SceneOrchestrator } from './scene/orchestrator.js';
import { StoryState } from './scene/story.js';
import type { DialogueGenerator } from './scene/types.js';

export interface HearthsideConfig {
  generator: DialogueGenerator;
  /** Defaults to the three-villager starter cast */
  agents?: readonly (Agent | string)[];
  storyTitle?: string;
  dbPath?: string;
  trackingUri?: string;
  experimentName?: string;
  sceneConfig?: SceneConfig;
  /** Reload the most recent world from the database instead of starting fresh */
  resume?: boolean;
}

/** A fresh village starts with everyone already introduced. */
function newVillage(agents: readonly (Agent | string)[]): Cast {
  const cast = Cast.create(agents);
  cast.establishFirstMeetings();
  return cast;
}

/**
 * Create a complete Hearthside setup. Events are persisted to the
 * database and every beat's world is saved through it. Without a world to
 * resume, the cast starts with every pair introduced at neutral scores.
 */
export function createHearthside(config: HearthsideConfig): {
  orchestrator: SceneOrchestrator;
  db: HearthsideDatabase;
  tracker: BeatTracker;
} {
  const db = new HearthsideDatabase({
    path: config.dbPath ?? './hearthside.db'
  });

  const tracker = new BeatTracker({
    trackingUri: config.trackingUri ?? './mlruns',
    experimentName: config.experimentName ?? 'hearthside-experiment'
  });

  const saved = config.resume ? db.loadLatestWorld() : null;
  const cast = saved?.cast ?? newVillage(config.agents ?? ['Alice', 'Bob', 'Charlie']);
  const story = saved?.story ?? new StoryState(config.storyTitle);

  const orchestrator = new SceneOrchestrator(cast, config.generator, {
    config: config.sceneConfig,
    story,
    store: db
  });

  // Wire up event persistence
  orchestrator.addEventListener((event) => {
    db.saveEvent(event);
  });

  return { orchestrator, db, tracker };
}
