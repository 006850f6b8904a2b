/**
 * Hearthside - Relationship Matrix
 *
 * Directed graph of trust/affection over every ordered pair of distinct
 * roster members. Entries start UNKNOWN and are created on first access.
 * Outlives beats and scenes; mutate it only through the methods below.
 */

import { BoundedBuffer } from '../core/bounded-buffer.js';
import { SnapshotSchemaError } from '../core/errors.js';
import { wholeDays } from '../core/types.js';
import {
  ASYMMETRY_THRESHOLD,
  DECAY_PER_DAY,
  FORGET_AFTER_DAYS,
  GOSSIP_CAPACITY,
  HISTORY_CAPACITY,
  NEUTRAL_SCORE,
  type Asymmetry,
  type DecayReport,
  type RelationshipContext,
  type RelationshipLabel,
  type RelationshipRecord,
  type RelationshipUpdateResult,
  type ScoreSnapshot,
  type Standing
} from './types.js';

// ============================================================================
// Labels
// ============================================================================

/**
 * Two-word summary of a directed relationship. Rows are checked top to
 * bottom; the first match wins.
 */
export function deriveLabel(trust?: number, affection?: number): RelationshipLabel {
  if (trust === undefined || affection === undefined) return 'unknown person';

  if (trust >= 8 && affection >= 8) return 'beloved friend';
  if (trust >= 7 && affection >= 7) return 'trusted ally';
  if (trust >= 7 && affection <= 3) return 'reliable stranger';
  if (trust <= 3 && affection >= 7) return 'charming liar';
  if (trust <= 3 && affection <= 3) return 'dangerous enemy';
  if (trust >= 6 && affection >= 4 && affection <= 6) return 'cautious ally';
  if (trust >= 4 && trust <= 6 && affection >= 7) return 'likeable acquaintance';
  return 'complicated person';
}

export function labelForStanding(standing: Standing): RelationshipLabel {
  switch (standing.status) {
    case 'KNOWN':
      return deriveLabel(standing.trust, standing.affection);
    case 'UNKNOWN':
    case 'FORGOTTEN':
      return deriveLabel();
    default:
      return assertNever(standing);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled relationship standing: ${JSON.stringify(value)}`);
}

function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Keep a score in [0, 10]. A non-finite score has no meaning and falls
 * back to neutral.
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return NEUTRAL_SCORE;
  return roundScore(Math.min(10, Math.max(0, value)));
}

/** A non-finite delta moves nothing. */
function finiteDelta(delta: number): number {
  return Number.isFinite(delta) ? delta : 0;
}

/**
 * Move a score toward neutral by `step`, never past it.
 */
function towardNeutral(score: number, step: number): number {
  if (score > NEUTRAL_SCORE) return Math.max(NEUTRAL_SCORE, roundScore(score - step));
  if (score < NEUTRAL_SCORE) return Math.min(NEUTRAL_SCORE, roundScore(score + step));
  return score;
}

// ============================================================================
// Entries
// ============================================================================

interface RelationshipEntry {
  readonly from: string;
  readonly to: string;
  standing: Standing;
  label: RelationshipLabel;
  lastInteraction?: string;
  history: BoundedBuffer<string>;
  gossip: BoundedBuffer<string>;
  decayDays: number;
}

export interface RelationshipView {
  from: string;
  to: string;
  standing: Standing;
  label: RelationshipLabel;
  lastInteraction?: string;
  history: string[];
  gossip: string[];
  decayDays: number;
}

function createEntry(from: string, to: string): RelationshipEntry {
  return {
    from,
    to,
    standing: { status: 'UNKNOWN' },
    label: 'unknown person',
    history: new BoundedBuffer<string>(HISTORY_CAPACITY),
    gossip: new BoundedBuffer<string>(GOSSIP_CAPACITY),
    decayDays: 0
  };
}

function scoresOf(entry: RelationshipEntry): ScoreSnapshot | undefined {
  if (entry.standing.status !== 'KNOWN') return undefined;
  return {
    trust: entry.standing.trust,
    affection: entry.standing.affection,
    label: entry.label
  };
}

// ============================================================================
// Matrix
// ============================================================================

export class RelationshipMatrix {
  private readonly roster: readonly string[];
  private readonly members: ReadonlySet<string>;
  private readonly entries = new Map<string, Map<string, RelationshipEntry>>();

  constructor(roster: readonly string[]) {
    this.roster = [...new Set(roster)];
    this.members = new Set(this.roster);
  }

  /**
   * Rebuild a matrix from persisted records. Records must name distinct
   * roster members.
   */
  static fromRecords(roster: readonly string[], records: readonly RelationshipRecord[]): RelationshipMatrix {
    const matrix = new RelationshipMatrix(roster);

    for (const record of records) {
      const entry = matrix.entry(record.from, record.to);
      if (!entry) {
        throw new SnapshotSchemaError(
          `Relationship ${record.from}->${record.to} does not connect two distinct roster members`
        );
      }
      entry.standing = record.standing;
      entry.label = labelForStanding(record.standing);
      entry.lastInteraction = record.lastInteraction;
      entry.history = BoundedBuffer.from(HISTORY_CAPACITY, record.history);
      entry.gossip = BoundedBuffer.from(GOSSIP_CAPACITY, record.gossip);
      entry.decayDays = record.decayDays;
    }

    return matrix;
  }

  agents(): readonly string[] {
    return this.roster;
  }

  /**
   * Entry for a valid ordered pair, created as UNKNOWN on first access.
   * Undefined for self pairs and agents outside the roster.
   */
  private entry(from: string, to: string): RelationshipEntry | undefined {
    if (from === to || !this.members.has(from) || !this.members.has(to)) return undefined;

    let row = this.entries.get(from);
    if (!row) {
      row = new Map();
      this.entries.set(from, row);
    }

    let entry = row.get(to);
    if (!entry) {
      entry = createEntry(from, to);
      row.set(to, entry);
    }
    return entry;
  }

  private *existingEntries(): Generator<RelationshipEntry> {
    for (const from of this.roster) {
      const row = this.entries.get(from);
      if (!row) continue;
      for (const to of this.roster) {
        const entry = row.get(to);
        if (entry) yield entry;
      }
    }
  }

  // --------------------------------------------------------------------------
  // Meetings & Updates
  // --------------------------------------------------------------------------

  /**
   * Both directions become KNOWN, each with its own first impression.
   * Returns false when the pair is not two distinct roster members.
   */
  establishFirstMeeting(
    a: string,
    b: string,
    trustAB: number = NEUTRAL_SCORE,
    affectionAB: number = NEUTRAL_SCORE,
    trustBA: number = NEUTRAL_SCORE,
    affectionBA: number = NEUTRAL_SCORE
  ): boolean {
    const ab = this.entry(a, b);
    const ba = this.entry(b, a);
    if (!ab || !ba) return false;

    this.know(ab, trustAB, affectionAB);
    this.know(ba, trustBA, affectionBA);
    return true;
  }

  /**
   * One-sided first impression (the other direction is left untouched).
   */
  meet(from: string, to: string, trust: number = NEUTRAL_SCORE, affection: number = NEUTRAL_SCORE): boolean {
    const entry = this.entry(from, to);
    if (!entry) return false;

    this.know(entry, trust, affection);
    return true;
  }

  private know(entry: RelationshipEntry, trust: number, affection: number): void {
    entry.standing = { status: 'KNOWN', trust: clampScore(trust), affection: clampScore(affection) };
    entry.label = labelForStanding(entry.standing);
    entry.decayDays = 0;
  }

  /**
   * Apply score deltas and remember the interaction. Only KNOWN
   * relationships change; the clamp, label and history append happen
   * together or not at all.
   */
  updateRelationship(
    from: string,
    to: string,
    trustDelta: number = 0,
    affectionDelta: number = 0,
    memory?: string
  ): RelationshipUpdateResult {
    const entry = this.entry(from, to);
    if (!entry) return { applied: false, from, to, reason: 'NOT_FOUND' };

    const before = scoresOf(entry);
    if (entry.standing.status !== 'KNOWN' || !before) {
      return { applied: false, from, to, reason: 'NOT_KNOWN' };
    }

    const standing: Standing = {
      status: 'KNOWN',
      trust: clampScore(entry.standing.trust + finiteDelta(trustDelta)),
      affection: clampScore(entry.standing.affection + finiteDelta(affectionDelta))
    };
    entry.standing = standing;
    entry.label = labelForStanding(standing);

    if (memory !== undefined && memory.trim() !== '') {
      entry.history.push(memory);
      entry.lastInteraction = memory;
    }

    return {
      applied: true,
      from,
      to,
      before,
      after: { trust: standing.trust, affection: standing.affection, label: entry.label },
      memory
    };
  }

  /**
   * Remember something heard about `about`. Works before the two ever meet.
   * Returns false for an invalid pair or a duplicate.
   */
  addGossip(listener: string, about: string, text: string): boolean {
    const entry = this.entry(listener, about);
    if (!entry) return false;
    return entry.gossip.pushUnique(text);
  }

  // --------------------------------------------------------------------------
  // Time
  // --------------------------------------------------------------------------

  /**
   * Drift every KNOWN score toward neutral by 0.1 per day, never past it.
   * A relationship with no remembered history fades to FORGOTTEN once it
   * has accumulated ten days of decay.
   */
  decay(days: number): DecayReport {
    const daysPassed = wholeDays(days);
    const report: DecayReport = { daysPassed, adjusted: 0, forgotten: [] };
    if (daysPassed === 0) return report;

    const step = DECAY_PER_DAY * daysPassed;

    for (const entry of this.existingEntries()) {
      if (entry.standing.status !== 'KNOWN') continue;

      const trust = towardNeutral(entry.standing.trust, step);
      const affection = towardNeutral(entry.standing.affection, step);
      if (trust !== entry.standing.trust || affection !== entry.standing.affection) {
        report.adjusted++;
      }

      entry.standing = { status: 'KNOWN', trust, affection };
      entry.label = labelForStanding(entry.standing);
      entry.decayDays += daysPassed;

      if (entry.history.size === 0 && entry.decayDays >= FORGET_AFTER_DAYS) {
        entry.standing = { status: 'FORGOTTEN' };
        entry.label = labelForStanding(entry.standing);
        report.forgotten.push({ from: entry.from, to: entry.to });
      }
    }

    return report;
  }

  // --------------------------------------------------------------------------
  // Analysis
  // --------------------------------------------------------------------------

  /**
   * Pairs where both directions are KNOWN and either score differs by at
   * least three points.
   */
  detectAsymmetries(): Asymmetry[] {
    const asymmetries: Asymmetry[] = [];

    for (let i = 0; i < this.roster.length; i++) {
      for (let j = i + 1; j < this.roster.length; j++) {
        const agentA = this.roster[i];
        const agentB = this.roster[j];
        const ab = this.peek(agentA, agentB);
        const ba = this.peek(agentB, agentA);
        const aToB = ab && scoresOf(ab);
        const bToA = ba && scoresOf(ba);
        if (!aToB || !bToA) continue;

        const trustGap = roundScore(Math.abs(aToB.trust - bToA.trust));
        const affectionGap = roundScore(Math.abs(aToB.affection - bToA.affection));

        if (trustGap >= ASYMMETRY_THRESHOLD || affectionGap >= ASYMMETRY_THRESHOLD) {
          asymmetries.push({ agentA, agentB, aToB, bToA, trustGap, affectionGap });
        }
      }
    }

    return asymmetries;
  }

  private peek(from: string, to: string): RelationshipEntry | undefined {
    return this.entries.get(from)?.get(to);
  }

  // --------------------------------------------------------------------------
  // Projections
  // --------------------------------------------------------------------------

  /**
   * Read-only projection for the dialogue collaborator. Strangers only
   * expose gossip heard in advance.
   */
  context(from: string, to: string): RelationshipContext {
    const entry = this.entry(from, to);
    if (!entry) {
      return { status: 'NOT_FOUND', from, to, message: 'relationship not found' };
    }

    const gossip = entry.gossip.latest(2);
    const standing = entry.standing;

    switch (standing.status) {
      case 'UNKNOWN':
        return { status: 'UNKNOWN', label: 'stranger', gossip };
      case 'KNOWN':
        return {
          status: 'KNOWN',
          trust: standing.trust,
          affection: standing.affection,
          label: entry.label,
          lastInteraction: entry.lastInteraction,
          recentMemories: entry.history.latest(3),
          gossip
        };
      case 'FORGOTTEN':
        return {
          status: 'FORGOTTEN',
          label: entry.label,
          lastInteraction: entry.lastInteraction,
          recentMemories: entry.history.latest(3),
          gossip
        };
      default:
        return assertNever(standing);
    }
  }

  contextsFor(agent: string): Record<string, RelationshipContext> {
    const contexts: Record<string, RelationshipContext> = {};
    for (const other of this.roster) {
      if (other !== agent) contexts[other] = this.context(agent, other);
    }
    return contexts;
  }

  relationship(from: string, to: string): RelationshipView | undefined {
    const entry = this.entry(from, to);
    if (!entry) return undefined;

    return {
      from: entry.from,
      to: entry.to,
      standing: { ...entry.standing },
      label: entry.label,
      lastInteraction: entry.lastInteraction,
      history: entry.history.toArray(),
      gossip: entry.gossip.toArray(),
      decayDays: entry.decayDays
    };
  }

  /**
   * KNOWN scores grouped by the agent who holds them.
   */
  summary(): Record<string, Record<string, ScoreSnapshot>> {
    const summary: Record<string, Record<string, ScoreSnapshot>> = {};
    for (const agent of this.roster) summary[agent] = {};

    for (const entry of this.existingEntries()) {
      const scores = scoresOf(entry);
      if (scores) summary[entry.from][entry.to] = scores;
    }
    return summary;
  }

  toRecords(): RelationshipRecord[] {
    const records: RelationshipRecord[] = [];
    for (const entry of this.existingEntries()) {
      records.push({
        from: entry.from,
        to: entry.to,
        standing: { ...entry.standing },
        label: entry.label,
        lastInteraction: entry.lastInteraction,
        history: entry.history.toArray(),
        gossip: entry.gossip.toArray(),
        decayDays: entry.decayDays
      });
    }
    return records;
  }
}
