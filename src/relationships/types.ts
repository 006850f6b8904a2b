/**
 * Hearthside - Relationship Types
 *
 * Relationships are directed: A→B and B→A are independent and may diverge
 * arbitrarily. Scores only exist while a relationship is KNOWN.
 *
 * Key concepts:
 * - Trust: will they do what they say? (0-10)
 * - Affection: do I enjoy their company? (0-10)
 * - Standing: UNKNOWN (never met), KNOWN (scored), FORGOTTEN (faded)
 */

import { z } from 'zod';

export const HISTORY_CAPACITY = 5;
export const GOSSIP_CAPACITY = 3;
export const NEUTRAL_SCORE = 5;
export const DECAY_PER_DAY = 0.1;
export const FORGET_AFTER_DAYS = 10;
export const ASYMMETRY_THRESHOLD = 3;

// ============================================================================
// Standing
// ============================================================================

export const ScoreSchema = z.number().min(0).max(10);

export const RelationshipStatusSchema = z.enum(['UNKNOWN', 'KNOWN', 'FORGOTTEN']);
export type RelationshipStatus = z.infer<typeof RelationshipStatusSchema>;

export const StandingSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('UNKNOWN') }),
  z.object({ status: z.literal('KNOWN'), trust: ScoreSchema, affection: ScoreSchema }),
  z.object({ status: z.literal('FORGOTTEN') })
]);
export type Standing = z.infer<typeof StandingSchema>;

export type RelationshipLabel =
  | 'beloved friend'
  | 'trusted ally'
  | 'reliable stranger'
  | 'charming liar'
  | 'dangerous enemy'
  | 'cautious ally'
  | 'likeable acquaintance'
  | 'complicated person'
  | 'unknown person';

// ============================================================================
// Persisted Form
// ============================================================================

export const RelationshipRecordSchema = z.object({
  from: z.string(),
  to: z.string(),
  standing: StandingSchema,
  label: z.string(),
  lastInteraction: z.string().optional(),
  history: z.array(z.string()).max(HISTORY_CAPACITY),
  gossip: z.array(z.string()).max(GOSSIP_CAPACITY),
  /** Days of decay applied since the last first meeting */
  decayDays: z.number().nonnegative()
});
export type RelationshipRecord = z.infer<typeof RelationshipRecordSchema>;

// ============================================================================
// Projections
// ============================================================================

export interface ScoreSnapshot {
  trust: number;
  affection: number;
  label: RelationshipLabel;
}

/**
 * What the dialogue collaborator is allowed to see about one direction of a
 * relationship.
 */
export type RelationshipContext =
  | { status: 'NOT_FOUND'; from: string; to: string; message: string }
  | { status: 'UNKNOWN'; label: 'stranger'; gossip: string[] }
  | {
      status: 'KNOWN';
      trust: number;
      affection: number;
      label: RelationshipLabel;
      lastInteraction?: string;
      recentMemories: string[];
      gossip: string[];
    }
  | {
      status: 'FORGOTTEN';
      label: RelationshipLabel;
      lastInteraction?: string;
      recentMemories: string[];
      gossip: string[];
    };

export type RelationshipUpdateResult =
  | {
      applied: true;
      from: string;
      to: string;
      before: ScoreSnapshot;
      after: ScoreSnapshot;
      memory?: string;
    }
  | { applied: false; from: string; to: string; reason: 'NOT_FOUND' | 'NOT_KNOWN' };

export interface Asymmetry {
  agentA: string;
  agentB: string;
  aToB: ScoreSnapshot;
  bToA: ScoreSnapshot;
  trustGap: number;
  affectionGap: number;
}

export interface DecayReport {
  daysPassed: number;
  adjusted: number;
  forgotten: { from: string; to: string }[];
}
