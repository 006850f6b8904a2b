/**
 * Hearthside - Cast
 *
 * The durable state of a roster: one personality per agent, the shared
 * relationship matrix, and the per-agent scene state a beat reads and
 * writes (secret complication, exit wish, last action and tone).
 */

import { z } from 'zod';
import { UnknownAgentError } from '../core/errors.js';
import { wholeDays, type Agent } from '../core/types.js';
import type { ObserverSource } from '../interjection/evaluator.js';
import { PersonalityGenerator, PersonalityState } from '../personality/personality.js';
import { RelationshipMatrix } from '../relationships/matrix.js';
import {
  NEUTRAL_SCORE,
  type DecayReport,
  type RelationshipContext,
  type RelationshipUpdateResult
} from '../relationships/types.js';
import type { Reflection, TurnIntent } from './types.js';

// ============================================================================
// Agent Scene State
// ============================================================================

export const AgentStateRecordSchema = z.object({
  agentId: z.string(),
  complication: z.string().optional(),
  wantsToExit: z.boolean(),
  lastAction: z.string().optional(),
  lastTone: z.string().optional()
});
export type AgentStateRecord = z.infer<typeof AgentStateRecordSchema>;

interface AgentSceneState {
  complication?: string;
  wantsToExit: boolean;
  lastAction?: string;
  lastTone?: string;
}

export interface AgentStatus {
  primaryTrait: string;
  confidence: number;
  emotionalState: string;
  emotionalIntensity: number;
  wantsToExit: boolean;
  /** Whether a secret is held; the secret itself is never exposed here */
  hasComplication: boolean;
}

export interface ReflectionOutcome {
  agentId: string;
  /** Agents the reflecting agent met for the first time while reflecting */
  meetings: string[];
  updates: RelationshipUpdateResult[];
  gossip: { about: string; text: string; added: boolean }[];
  /** Reflection entries naming the agent itself or someone outside the roster */
  ignored: string[];
}

export interface TimeReport {
  days: number;
  relationships: DecayReport;
  emotionalIntensity: Record<string, number>;
}

export interface RelationshipSnapshot {
  addressee?: RelationshipContext;
  others: Record<string, RelationshipContext>;
}

// ============================================================================
// Cast
// ============================================================================

export class Cast implements ObserverSource {
  readonly relationships: RelationshipMatrix;
  private readonly agents: readonly Agent[];
  private readonly personalities: Map<string, PersonalityState>;
  private readonly states = new Map<string, AgentSceneState>();

  constructor(
    agents: readonly Agent[],
    personalities: readonly PersonalityState[],
    relationships?: RelationshipMatrix
  ) {
    this.agents = agents.map(agent => ({ ...agent }));
    const roster = this.agents.map(agent => agent.id);
    this.relationships = relationships ?? new RelationshipMatrix(roster);

    this.personalities = new Map(personalities.map(p => [p.name, p]));
    for (const id of roster) {
      if (!this.personalities.has(id)) {
        throw new UnknownAgentError(id, 'no personality supplied');
      }
      this.states.set(id, { wantsToExit: false });
    }
  }

  /**
   * Build a cast with generated personalities. Names from the starter cast
   * get their archetype; everyone else is balanced.
   */
  static create(
    agents: readonly (Agent | string)[],
    generator: PersonalityGenerator = new PersonalityGenerator()
  ): Cast {
    const normalized = agents.map(agent => typeof agent === 'string' ? { id: agent } : agent);
    const starters = generator.defaultNatures();

    const personalities = normalized.map(agent =>
      new PersonalityState(agent.id, starters[agent.id] ?? generator.generateNature('balanced'))
    );
    return new Cast(normalized, personalities);
  }

  roster(): string[] {
    return this.agents.map(agent => agent.id);
  }

  has(agent: string): boolean {
    return this.states.has(agent);
  }

  agent(id: string): Agent {
    const agent = this.agents.find(a => a.id === id);
    if (!agent) throw new UnknownAgentError(id, 'not in cast');
    return { ...agent };
  }

  listAgents(): Agent[] {
    return this.agents.map(agent => ({ ...agent }));
  }

  personality(agent: string): PersonalityState {
    const personality = this.personalities.get(agent);
    if (!personality) throw new UnknownAgentError(agent, 'no personality');
    return personality;
  }

  state(agent: string): Readonly<AgentSceneState> {
    return { ...this.requireState(agent) };
  }

  complication(agent: string): string | undefined {
    return this.requireState(agent).complication;
  }

  private requireState(agent: string): AgentSceneState {
    const state = this.states.get(agent);
    if (!state) throw new UnknownAgentError(agent, 'not in cast');
    return state;
  }

  // --------------------------------------------------------------------------
  // Setup
  // --------------------------------------------------------------------------

  /**
   * Every pair meets with the same first impression in both directions.
   * Returns the number of pairs introduced.
   */
  establishFirstMeetings(trust: number = NEUTRAL_SCORE, affection: number = NEUTRAL_SCORE): number {
    const roster = this.roster();
    let pairs = 0;
    for (let i = 0; i < roster.length; i++) {
      for (let j = i + 1; j < roster.length; j++) {
        if (this.relationships.establishFirstMeeting(roster[i], roster[j], trust, affection, trust, affection)) {
          pairs++;
        }
      }
    }
    return pairs;
  }

  /**
   * Replace the beat's secret complications and clear exit wishes left over
   * from the previous beat. Returns names that are not in the cast; those
   * are skipped.
   */
  prepareForBeat(complications: Record<string, string>): string[] {
    for (const state of this.states.values()) {
      state.complication = undefined;
      state.wantsToExit = false;
    }

    const unknown: string[] = [];
    for (const [agent, complication] of Object.entries(complications)) {
      const state = this.states.get(agent);
      if (!state) {
        unknown.push(agent);
        continue;
      }
      state.complication = complication;
    }
    return unknown;
  }

  // --------------------------------------------------------------------------
  // Turn & Reflection Results
  // --------------------------------------------------------------------------

  applyTurnIntent(agent: string, intent: TurnIntent): void {
    const state = this.requireState(agent);
    state.lastAction = intent.action;
    state.lastTone = intent.tone;
    state.wantsToExit = intent.wantsExit;
    this.personality(agent).nurture.emotionalState = intent.emotionalStateLabel;
  }

  adjustIntensity(agent: string, delta: number): number {
    return this.personality(agent).nurture.adjustIntensity(delta);
  }

  /**
   * Fold one agent's end-of-beat reflection into the matrix. Entries are
   * applied in roster order. An agent still UNKNOWN to the reflecting
   * agent is met with neutral scores first, in that direction only. A
   * FORGOTTEN relationship stays forgotten and its update is not applied.
   */
  applyReflection(agent: string, reflection: Reflection): ReflectionOutcome {
    this.requireState(agent);

    const outcome: ReflectionOutcome = { agentId: agent, meetings: [], updates: [], gossip: [], ignored: [] };
    const deltas = new Map(Object.entries(reflection.relationshipDeltas));

    for (const other of this.roster()) {
      const delta = deltas.get(other);
      if (!delta) continue;
      deltas.delete(other);

      if (other === agent) {
        outcome.ignored.push(other);
        continue;
      }

      const status = this.relationships.context(agent, other).status;
      if (status === 'UNKNOWN') {
        this.relationships.meet(agent, other);
        outcome.meetings.push(other);
      }

      outcome.updates.push(
        this.relationships.updateRelationship(agent, other, delta.trustDelta, delta.affectionDelta, delta.memory)
      );
    }
    outcome.ignored.push(...deltas.keys());

    for (const text of reflection.gossipWorthy) {
      const about = this.firstMentioned(agent, text);
      if (about === undefined) continue;
      outcome.gossip.push({ about, text, added: this.relationships.addGossip(agent, about, text) });
    }

    return outcome;
  }

  /**
   * First roster member other than `listener` whose name appears in the text.
   */
  private firstMentioned(listener: string, text: string): string | undefined {
    const lowered = text.toLowerCase();
    return this.roster().find(other => other !== listener && lowered.includes(other.toLowerCase()));
  }

  // --------------------------------------------------------------------------
  // Time
  // --------------------------------------------------------------------------

  advanceTime(days: number = 1): TimeReport {
    const whole = wholeDays(days);
    const relationships = this.relationships.decay(whole);
    const emotionalIntensity: Record<string, number> = {};
    for (const [name, personality] of this.personalities) {
      emotionalIntensity[name] = personality.nurture.decayPerDay(whole);
    }
    return { days: whole, relationships, emotionalIntensity };
  }

  // --------------------------------------------------------------------------
  // Projections
  // --------------------------------------------------------------------------

  relationshipSnapshot(agent: string, addressee: string | undefined, present: readonly string[]): RelationshipSnapshot {
    this.requireState(agent);

    const others: Record<string, RelationshipContext> = {};
    for (const other of present) {
      if (other !== agent && other !== addressee) {
        others[other] = this.relationships.context(agent, other);
      }
    }

    return {
      addressee: addressee === undefined ? undefined : this.relationships.context(agent, addressee),
      others
    };
  }

  statusSummary(): Record<string, AgentStatus> {
    const summary: Record<string, AgentStatus> = {};
    for (const id of this.roster()) {
      const personality = this.personality(id);
      const state = this.requireState(id);
      summary[id] = {
        primaryTrait: personality.primaryTrait(),
        confidence: personality.nurture.confidence,
        emotionalState: personality.nurture.emotionalState,
        emotionalIntensity: personality.nurture.emotionalIntensity,
        wantsToExit: state.wantsToExit,
        hasComplication: state.complication !== undefined
      };
    }
    return summary;
  }

  agentStateRecords(): AgentStateRecord[] {
    return this.roster().map(agentId => ({ agentId, ...this.requireState(agentId) }));
  }

  restoreAgentStates(records: readonly AgentStateRecord[]): void {
    for (const record of records) {
      const state = this.requireState(record.agentId);
      state.complication = record.complication;
      state.wantsToExit = record.wantsToExit;
      state.lastAction = record.lastAction;
      state.lastTone = record.lastTone;
    }
  }

  personalityStates(): PersonalityState[] {
    return this.roster().map(id => this.personality(id));
  }
}
