/**
 * Hearthside - Core Types
 *
 * Shared ontology for scene simulation.
 *
 * Key concepts:
 * - Agent: A named participant with a free-form role tag
 * - Beat: One bounded conversation among a fixed set of agents
 * - SceneEvent: Anything worth surfacing (unified log, not separate channels)
 */

import { z } from 'zod';

// ============================================================================
// Agents
// ============================================================================

export const AgentSchema = z.object({
  id: z.string().min(1),
  /** Free-form; only collaborators read it */
  role: z.string().optional()
});
export type Agent = z.infer<typeof AgentSchema>;

// ============================================================================
// Time
// ============================================================================

/**
 * Simulation time moves in whole days. Fractions are dropped; negative and
 * non-finite counts become zero.
 */
export function wholeDays(days: number): number {
  return Number.isFinite(days) && days > 0 ? Math.floor(days) : 0;
}

// ============================================================================
// Unified Event Log
// ============================================================================

/**
 * All events go in one stream, typed by eventType.
 */
export const EventCategorySchema = z.enum([
  'CONVERSATION',  // Turns, rounds, targeting, exits
  'RELATIONSHIP',  // Score changes, meetings, gossip, decay
  'PERSONALITY',   // Nurture changes
  'COLLABORATOR',  // Dialogue generator calls and failures
  'SYSTEM'         // Scene/beat lifecycle
]);
export type EventCategory = z.infer<typeof EventCategorySchema>;

export const EventLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']);
export type EventLevel = z.infer<typeof EventLevelSchema>;

export const SceneEventSchema = z.object({
  id: z.string(),
  sceneNumber: z.number().int().nonnegative(),
  beatNumber: z.number().int().nonnegative(),
  round: z.number().int().nonnegative(),

  category: EventCategorySchema,
  eventType: z.string(),
  level: EventLevelSchema,

  // Who is involved
  actorId: z.string().optional(),
  targetId: z.string().optional(),

  payload: z.record(z.unknown()),
  timestamp: z.date()
});
export type SceneEvent = z.infer<typeof SceneEventSchema>;

export type EventHandler = (event: SceneEvent) => void;

const LEVEL_ORDER: Record<EventLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
};

export function isAtLeast(level: EventLevel, minimum: EventLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
}
