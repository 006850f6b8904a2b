/**
 * Hearthside - Scene Types
 *
 * Story structure (scenes, beats, village resources) and the contract with
 * the dialogue collaborator. The collaborator only ever sees context
 * records built here and answers with intents and reflections validated
 * here.
 */

import { z } from 'zod';
import type { Turn, TurnKind, EnergyLevel } from '../conversation/types.js';
import type { InterjectionTrigger } from '../interjection/evaluator.js';
import type { PersonalitySnapshot } from '../personality/types.js';
import type { RelationshipContext } from '../relationships/types.js';

// ============================================================================
// Story Structure
// ============================================================================

export const SceneRecordSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  premise: z.string(),   // What's happening and why
  stakes: z.string(),    // What could go wrong
  resolution: z.string().optional(),
  startedAt: z.string().optional(),
  endedAt: z.string().optional()
});
export type SceneRecord = z.infer<typeof SceneRecordSchema>;

export const BeatRecordSchema = z.object({
  number: z.number().int().positive(),
  sceneNumber: z.number().int().positive(),
  situation: z.string(),  // Immediate challenge
  location: z.string(),
  time: z.string(),
  participants: z.array(z.string()).min(1),
  /** Present but not speaking */
  witnesses: z.array(z.string()),
  /** agent -> secret complication for this beat */
  complications: z.record(z.string()),
  outcome: z.string().optional()
});
export type BeatRecord = z.infer<typeof BeatRecordSchema>;

export const BeatSetupSchema = z.object({
  situation: z.string(),
  location: z.string(),
  time: z.string(),
  participants: z.array(z.string()).min(1),
  witnesses: z.array(z.string()).default([]),
  complications: z.record(z.string()).default({})
});
export type BeatSetup = z.input<typeof BeatSetupSchema>;

export const ResourcesSchema = z.object({
  food: z.number().int().nonnegative(),
  wood: z.number().int().nonnegative(),
  medicine: z.number().int().nonnegative(),
  morale: z.number().int().nonnegative()
});
export type Resources = z.infer<typeof ResourcesSchema>;

export const StoryRecordSchema = z.object({
  title: z.string(),
  currentScene: z.number().int().nonnegative(),
  currentBeat: z.number().int().nonnegative(),
  totalDays: z.number().int().nonnegative(),
  scenes: z.array(SceneRecordSchema),
  beats: z.array(BeatRecordSchema),
  resources: ResourcesSchema
});
export type StoryRecord = z.infer<typeof StoryRecordSchema>;

// ============================================================================
// Collaborator Responses
// ============================================================================

/**
 * What the collaborator wants the speaker to do this turn. A null or blank
 * `content` is a skip.
 */
export const TurnIntentSchema = z.object({
  content: z.string().nullable(),
  tone: z.string().optional(),
  action: z.string().optional(),
  targetId: z.string().optional(),
  emotionalStateLabel: z.string().default('neutral'),
  wantsExit: z.boolean().default(false)
});
export type TurnIntent = z.output<typeof TurnIntentSchema>;
export type TurnIntentInput = z.input<typeof TurnIntentSchema>;

export const RelationshipDeltaSchema = z.object({
  trustDelta: z.number().finite().default(0),
  affectionDelta: z.number().finite().default(0),
  memory: z.string().optional()
});
export type RelationshipDelta = z.output<typeof RelationshipDeltaSchema>;

export const ReflectionSchema = z.object({
  /** other agent -> how this beat changed the reflecting agent's view of them */
  relationshipDeltas: z.record(RelationshipDeltaSchema).default({}),
  gossipWorthy: z.array(z.string()).default([])
});
export type Reflection = z.output<typeof ReflectionSchema>;
export type ReflectionInput = z.input<typeof ReflectionSchema>;

export function emptyReflection(): Reflection {
  return { relationshipDeltas: {}, gossipWorthy: [] };
}

// ============================================================================
// Collaborator Contexts
// ============================================================================

export interface InterjectionCue {
  reason: InterjectionTrigger;
  respondingTo: Turn;
}

export interface TurnContext {
  speakerId: string;
  sceneNumber: number;
  beatNumber: number;
  roundNumber: number;
  energyLevel: EnergyLevel;
  turnKind: TurnKind;
  situation: string;
  location: string;
  time: string;
  presentAgents: string[];
  recentTurns: Turn[];
  addressee?: string;
  relationshipSnapshot: {
    addressee?: RelationshipContext;
    others: Record<string, RelationshipContext>;
  };
  personalitySnapshot: PersonalitySnapshot;
  /** Secret the speaker carries into this beat */
  complication?: string;
  canRequestExit: boolean;
  mustExit: boolean;
  interjection?: InterjectionCue;
}

export interface ReflectionContext {
  agentId: string;
  sceneNumber: number;
  beatNumber: number;
  personalitySnapshot: PersonalitySnapshot;
  beatSummary: string;
  otherParticipants: string[];
  recentEvents: string[];
}

/**
 * The dialogue collaborator (usually a language-model caller). Returning
 * null means "no response" and is treated as a skip.
 */
export interface DialogueGenerator {
  generateTurn(context: TurnContext): Promise<TurnIntentInput | null>;
  generateReflection(context: ReflectionContext): Promise<ReflectionInput | null>;
}
