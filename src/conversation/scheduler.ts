/**
 * Hearthside - Turn Scheduler
 *
 * Owns round/turn bookkeeping for one beat:
 * - Speaker selection (targeted priority, else round-robin rotation)
 * - Per-agent per-round turn cap, enforced on targeting
 * - Round advancement (everyone at the cap, or everyone spoke once)
 * - Exit negotiation and forced termination
 *
 * One instance per beat. Discard it once the beat ends.
 */

import { resolveSceneConfig, type SceneConfig, type ResolvedSceneConfig } from '../core/config.js';
import { SceneStateError, UnknownAgentError } from '../core/errors.js';
import type {
  ConversationSnapshot,
  ConversationSummary,
  EndDecision,
  EndReason,
  EnergyLevel,
  SchedulerNotice,
  SchedulerStatus,
  SpeakerSelection,
  Turn,
  TurnInput,
  TurnRecord,
  TurnStatistics
} from './types.js';
import { isSkipped } from './types.js';

export function energyForRound(round: number): EnergyLevel {
  if (round <= 3) return 'high';
  if (round <= 6) return 'medium';
  return 'low';
}

export class TurnScheduler {
  private readonly roster: readonly string[];
  private readonly members: ReadonlySet<string>;
  private readonly config: ResolvedSceneConfig;

  private currentRound = 1;
  private turnCount = 0;
  private rotationIndex = 0;
  private priorityOverride: string | undefined;
  private status: SchedulerStatus = { state: 'IN_PROGRESS' };

  private readonly history: Turn[] = [];
  private speakersThisRound = new Set<string>();
  private turnsThisRound = new Map<string, number>();
  private interjectedThisRound = new Set<string>();
  private readonly exitRequests = new Set<string>();

  constructor(roster: readonly string[], config: SceneConfig = {}) {
    if (roster.length === 0) {
      throw new SceneStateError('A beat needs at least one participant');
    }
    const members = new Set(roster);
    if (members.size !== roster.length) {
      throw new SceneStateError(`Duplicate participant in roster: ${roster.join(', ')}`);
    }

    this.roster = [...roster];
    this.members = members;
    this.config = resolveSceneConfig(config);
  }

  // --------------------------------------------------------------------------
  // Speaker Selection
  // --------------------------------------------------------------------------

  /**
   * Who speaks next. A pending priority override wins and is consumed;
   * otherwise rotation continues where it left off.
   */
  nextSpeaker(): string {
    return this.selectSpeaker().speaker;
  }

  selectSpeaker(): SpeakerSelection {
    this.assertInProgress('select a speaker');

    const override = this.priorityOverride;
    if (override !== undefined) {
      this.priorityOverride = undefined;
      return { speaker: override, source: 'PRIORITY' };
    }

    const speaker = this.roster[this.rotationIndex % this.roster.length];
    this.rotationIndex++;
    return { speaker, source: 'ROTATION' };
  }

  pendingPriority(): string | undefined {
    return this.priorityOverride;
  }

  // --------------------------------------------------------------------------
  // Turn Recording
  // --------------------------------------------------------------------------

  /**
   * Append a turn. Missing or blank content records a skipped turn, which
   * still counts toward round completion.
   */
  recordTurn(input: TurnInput): TurnRecord {
    this.assertInProgress('record a turn');
    this.assertMember(input.speaker, 'recordTurn');

    const { speaker } = input;
    const content = input.content === undefined || input.content === null || input.content.trim() === ''
      ? null
      : input.content;

    this.turnCount++;
    const turn: Turn = Object.freeze({
      speaker,
      kind: input.kind ?? 'STANDARD',
      round: this.currentRound,
      index: this.turnCount,
      content,
      action: input.action,
      tone: input.tone,
      target: input.target
    });
    this.history.push(turn);

    this.speakersThisRound.add(speaker);
    const countThisRound = (this.turnsThisRound.get(speaker) ?? 0) + 1;
    this.turnsThisRound.set(speaker, countThisRound);

    const notices: SchedulerNotice[] = [{
      type: content === null ? 'TURN_SKIPPED' : 'TURN_RECORDED',
      level: 'INFO',
      round: this.currentRound,
      speaker,
      message: content === null
        ? `${speaker} skipped turn ${this.turnCount}`
        : `Turn ${this.turnCount}: ${speaker} (turn ${countThisRound}/${this.config.turnCap} this round)`,
      payload: { index: turn.index, kind: turn.kind, turnsThisRound: countThisRound }
    }];

    if (input.target !== undefined) {
      notices.push(this.applyTarget(input.target, speaker));
    }

    let roundAdvanced = false;
    if (this.shouldAdvanceRound()) {
      notices.push(this.advanceRound());
      roundAdvanced = true;
    }

    return { turn, notices, roundAdvanced };
  }

  private applyTarget(target: string, speaker: string): SchedulerNotice {
    const base = { round: this.currentRound, speaker, target };

    if (target === speaker) {
      return {
        ...base,
        type: 'INVALID_TARGET',
        level: 'WARN',
        message: `${speaker} targeted themselves; ignored`,
        payload: { reason: 'SELF' }
      };
    }

    if (!this.members.has(target)) {
      return {
        ...base,
        type: 'INVALID_TARGET',
        level: 'WARN',
        message: `${speaker} targeted "${target}" but no matching participant found`,
        payload: { reason: 'UNKNOWN_AGENT' }
      };
    }

    const targetTurns = this.turnsThisRound.get(target) ?? 0;
    if (targetTurns >= this.config.turnCap) {
      return {
        ...base,
        type: 'TARGET_AT_CAP',
        level: 'INFO',
        message: `${speaker} targeted ${target} but they reached the ${this.config.turnCap}-turn limit this round`,
        payload: { turnsThisRound: targetTurns }
      };
    }

    this.priorityOverride = target;
    return {
      ...base,
      type: 'PRIORITY_SET',
      level: 'INFO',
      message: `${speaker} targeted ${target}; they speak next`
    };
  }

  // --------------------------------------------------------------------------
  // Rounds
  // --------------------------------------------------------------------------

  /**
   * Every participant at the cap, or every participant has spoken at least
   * once. The second rule lets rounds end after a single pass.
   */
  shouldAdvanceRound(): boolean {
    const allAtCap = this.roster.every(
      agent => (this.turnsThisRound.get(agent) ?? 0) >= this.config.turnCap
    );
    if (allAtCap) return true;

    return this.roster.every(agent => this.speakersThisRound.has(agent));
  }

  advanceRound(): SchedulerNotice {
    const completed = this.currentRound;
    this.currentRound++;

    this.speakersThisRound = new Set();
    this.turnsThisRound = new Map();
    this.interjectedThisRound = new Set();

    return {
      type: 'ROUND_ADVANCED',
      level: 'INFO',
      round: this.currentRound,
      message: `Round ${this.currentRound} begins`,
      payload: { completedRound: completed, energy: this.energy }
    };
  }

  get round(): number {
    return this.currentRound;
  }

  get energy(): EnergyLevel {
    return energyForRound(this.currentRound);
  }

  // --------------------------------------------------------------------------
  // Exit Negotiation
  // --------------------------------------------------------------------------

  canRequestExit(): boolean {
    const { start, end } = this.config.exitWindow;
    return this.currentRound >= start && this.currentRound <= end;
  }

  /**
   * Record an exit request. Outside the exit window this is rejected with
   * `false`, not an error.
   */
  requestExit(agent: string): boolean {
    this.assertMember(agent, 'requestExit');
    if (this.status.state === 'ENDED' || !this.canRequestExit()) return false;

    this.exitRequests.add(agent);
    return true;
  }

  mustEnd(): boolean {
    return this.currentRound >= this.config.forcedExitRound;
  }

  majority(): number {
    return Math.floor(this.roster.length / 2) + 1;
  }

  /**
   * Termination check. A positive answer is latched: the scheduler moves to
   * ENDED and keeps returning the same reason.
   */
  shouldEnd(): EndDecision {
    if (this.status.state === 'ENDED') {
      return { shouldEnd: true, reason: this.status.reason };
    }

    if (this.mustEnd()) {
      return this.conclude('maximum_rounds_reached');
    }

    if (this.canRequestExit() && this.exitRequests.size >= this.majority()) {
      return this.conclude('majority_exit_request');
    }

    return { shouldEnd: false, reason: '' };
  }

  /**
   * End the beat for a reason decided outside the scheduler (turn budget
   * exhausted). The first recorded reason wins.
   */
  end(reason: EndReason): SchedulerStatus {
    if (this.status.state === 'IN_PROGRESS') {
      this.status = { state: 'ENDED', reason };
    }
    return this.status;
  }

  private conclude(reason: EndReason): EndDecision {
    this.status = { state: 'ENDED', reason };
    return { shouldEnd: true, reason };
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  // --------------------------------------------------------------------------
  // Interjections
  // --------------------------------------------------------------------------

  canInterject(agent: string): boolean {
    return this.members.has(agent) && !this.interjectedThisRound.has(agent);
  }

  markInterjected(agent: string): void {
    this.assertMember(agent, 'markInterjected');
    this.interjectedThisRound.add(agent);
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  participants(): readonly string[] {
    return this.roster;
  }

  turns(): readonly Turn[] {
    return this.history;
  }

  recentTurns(limit: number = this.config.recentTurnLimit): Turn[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  turnsThisRoundFor(agent: string): number {
    return this.turnsThisRound.get(agent) ?? 0;
  }

  summary(): ConversationSummary {
    return {
      currentRound: this.currentRound,
      currentTurn: this.turnCount,
      totalTurns: this.history.length,
      canExit: this.canRequestExit(),
      mustExit: this.mustEnd(),
      energy: this.energy
    };
  }

  statistics(): TurnStatistics {
    const turnsByAgent: Record<string, number> = {};
    for (const agent of this.roster) turnsByAgent[agent] = 0;

    let skippedTurns = 0;
    let interjections = 0;
    for (const turn of this.history) {
      turnsByAgent[turn.speaker]++;
      if (isSkipped(turn)) skippedTurns++;
      if (turn.kind === 'INTERJECTION') interjections++;
    }

    return {
      totalTurns: this.history.length,
      skippedTurns,
      interjections,
      turnsByAgent,
      roundsCompleted: this.currentRound - 1
    };
  }

  snapshot(): ConversationSnapshot {
    return {
      roster: [...this.roster],
      currentRound: this.currentRound,
      turnCount: this.turnCount,
      turns: [...this.history],
      speakersThisRound: [...this.speakersThisRound],
      turnsThisRound: Object.fromEntries(this.turnsThisRound),
      interjectedThisRound: [...this.interjectedThisRound],
      exitRequests: [...this.exitRequests],
      forcedExitRound: this.config.forcedExitRound,
      exitWindow: { ...this.config.exitWindow },
      energy: this.energy,
      priorityOverride: this.priorityOverride,
      status: this.status
    };
  }

  private assertMember(agent: string, operation: string): void {
    if (!this.members.has(agent)) {
      throw new UnknownAgentError(agent, `${operation}: not a participant in this beat`);
    }
  }

  private assertInProgress(action: string): void {
    if (this.status.state === 'ENDED') {
      throw new SceneStateError(`Cannot ${action}: conversation ended (${this.status.reason})`);
    }
  }
}
