/**
 * Hearthside - Conversation Types
 *
 * A beat is split into rounds; a round is made of turns. Turns are immutable
 * once recorded and form an append-only history for the beat.
 */

import { z } from 'zod';

// ============================================================================
// Turns
// ============================================================================

export const TurnKindSchema = z.enum([
  'STANDARD',      // Scheduled by rotation or targeting
  'INTERJECTION'   // Out-of-rotation act by an observer, one per round
]);
export type TurnKind = z.infer<typeof TurnKindSchema>;

export const TurnSchema = z.object({
  speaker: z.string(),
  kind: TurnKindSchema,
  round: z.number().int().positive(),
  /** 1-based position in the beat */
  index: z.number().int().positive(),
  /** null when the speaker skipped (declined or collaborator failed) */
  content: z.string().nullable(),
  action: z.string().optional(),
  tone: z.string().optional(),
  target: z.string().optional()
});
export type Turn = Readonly<z.infer<typeof TurnSchema>>;

export interface TurnInput {
  speaker: string;
  content?: string | null;
  tone?: string;
  action?: string;
  target?: string;
  kind?: TurnKind;
}

export function isSkipped(turn: Turn): boolean {
  return turn.content === null;
}

// ============================================================================
// Round / Termination Bookkeeping
// ============================================================================

export const EnergyLevelSchema = z.enum(['high', 'medium', 'low']);
export type EnergyLevel = z.infer<typeof EnergyLevelSchema>;

export const EndReasonSchema = z.enum([
  'maximum_rounds_reached',
  'majority_exit_request',
  'turn_limit_reached'
]);
export type EndReason = z.infer<typeof EndReasonSchema>;

export type SchedulerStatus =
  | { state: 'IN_PROGRESS' }
  | { state: 'ENDED'; reason: EndReason };

export type EndDecision =
  | { shouldEnd: true; reason: EndReason }
  | { shouldEnd: false; reason: '' };

export interface SpeakerSelection {
  speaker: string;
  source: 'PRIORITY' | 'ROTATION';
}

// ============================================================================
// Notices
// ============================================================================

export type SchedulerNoticeType =
  | 'TURN_RECORDED'
  | 'TURN_SKIPPED'
  | 'PRIORITY_SET'
  | 'TARGET_AT_CAP'
  | 'INVALID_TARGET'
  | 'ROUND_ADVANCED';

/**
 * Structured record of something the scheduler decided. Returned to the
 * caller instead of being written to a logger.
 */
export interface SchedulerNotice {
  type: SchedulerNoticeType;
  level: 'INFO' | 'WARN';
  round: number;
  speaker?: string;
  target?: string;
  message: string;
  payload?: Record<string, unknown>;
}

export interface TurnRecord {
  turn: Turn;
  notices: SchedulerNotice[];
  roundAdvanced: boolean;
}

export interface ConversationSnapshot {
  roster: string[];
  currentRound: number;
  turnCount: number;
  turns: Turn[];
  speakersThisRound: string[];
  turnsThisRound: Record<string, number>;
  interjectedThisRound: string[];
  exitRequests: string[];
  forcedExitRound: number;
  exitWindow: { start: number; end: number };
  energy: EnergyLevel;
  priorityOverride?: string;
  status: SchedulerStatus;
}

export interface ConversationSummary {
  currentRound: number;
  currentTurn: number;
  totalTurns: number;
  canExit: boolean;
  mustExit: boolean;
  energy: EnergyLevel;
}

export interface TurnStatistics {
  totalTurns: number;
  skippedTurns: number;
  interjections: number;
  turnsByAgent: Record<string, number>;
  roundsCompleted: number;
}
