/**
 * Hearthside - Scene Orchestrator
 *
 * Composition root for one village roster:
 * - Scene and beat setup on the story timeline
 * - Beat loop: fresh scheduler, collaborator call per turn, interjections
 * - End-of-beat reflections folded into relationships
 * - Unified event log fanned out to listeners
 *
 * Collaborator failures (error, timeout, malformed or missing response)
 * never break a beat: turns become skips and reflections become empty.
 */

import { v4 as uuid } from 'uuid';
import { resolveSceneConfig, type ResolvedSceneConfig, type SceneConfig } from '../core/config.js';
import { CollaboratorTimeoutError, SceneStateError, UnknownAgentError } from '../core/errors.js';
import type { EventCategory, EventHandler, EventLevel, SceneEvent } from '../core/types.js';
import { TurnScheduler } from '../conversation/scheduler.js';
import { isSkipped, type EndReason, type SchedulerNotice, type Turn, type TurnKind, type TurnRecord, type TurnStatistics } from '../conversation/types.js';
import { InterjectionEvaluator } from '../interjection/evaluator.js';
import { serializeWorld, type WorldStore } from '../persistence/snapshot.js';
import { NEUTRAL_SCORE, type Asymmetry } from '../relationships/types.js';
import type { Cast, ReflectionOutcome, TimeReport } from './cast.js';
import { StoryState } from './story.js';
import {
  ReflectionSchema,
  TurnIntentSchema,
  emptyReflection,
  type BeatRecord,
  type BeatSetup,
  type DialogueGenerator,
  type InterjectionCue,
  type Reflection,
  type ReflectionContext,
  type SceneRecord,
  type TurnContext,
  type TurnIntent
} from './types.js';

export interface OrchestratorOptions {
  config?: SceneConfig;
  story?: StoryState;
  /** Receives a world snapshot after every beat */
  store?: WorldStore;
}

export interface BeatResult {
  beat: BeatRecord;
  endReason: EndReason;
  turns: Turn[];
  statistics: TurnStatistics;
  reflections: ReflectionOutcome[];
  asymmetries: Asymmetry[];
  /** Id returned by the world store, when one is configured */
  snapshotId?: string;
}

/**
 * One line per turn for summaries and reflection contexts.
 */
export function describeTurn(turn: Turn): string {
  if (isSkipped(turn)) return `${turn.speaker} stayed silent`;
  const prefix = turn.kind === 'INTERJECTION' ? `${turn.speaker} (interjecting)` : turn.speaker;
  const tone = turn.tone ? ` [${turn.tone}]` : '';
  const action = turn.action ? ` *${turn.action}*` : '';
  return `${prefix}${tone}: "${turn.content}"${action}`;
}

export class SceneOrchestrator {
  readonly story: StoryState;
  private readonly config: ResolvedSceneConfig;
  private readonly store?: WorldStore;
  private readonly evaluator: InterjectionEvaluator;
  private readonly eventHandlers: EventHandler[] = [];
  private readonly events: SceneEvent[] = [];

  private pendingBeat?: BeatRecord;
  private scheduler?: TurnScheduler;

  constructor(
    readonly cast: Cast,
    private readonly generator: DialogueGenerator,
    options: OrchestratorOptions = {}
  ) {
    this.config = resolveSceneConfig(options.config);
    this.story = options.story ?? new StoryState();
    this.store = options.store;
    this.evaluator = new InterjectionEvaluator(cast);
  }

  // --------------------------------------------------------------------------
  // Setup
  // --------------------------------------------------------------------------

  createScene(title: string, premise: string, stakes: string): SceneRecord {
    const scene = this.story.createScene(title, premise, stakes);
    this.emitEvent('SYSTEM', 'SCENE_CREATED', 'INFO', { title, premise, stakes });
    return scene;
  }

  completeScene(resolution: string): SceneRecord | undefined {
    const scene = this.story.completeScene(resolution);
    if (scene) this.emitEvent('SYSTEM', 'SCENE_COMPLETED', 'INFO', { resolution });
    return scene;
  }

  /**
   * Open a beat in the current scene. Participants must be distinct cast
   * members; complications for names outside the cast are dropped with a
   * warning event.
   */
  setupBeat(setup: BeatSetup): BeatRecord {
    const seen = new Set<string>();
    for (const participant of setup.participants) {
      if (!this.cast.has(participant)) {
        throw new UnknownAgentError(participant, 'setupBeat: not in cast');
      }
      if (seen.has(participant)) {
        throw new SceneStateError(`Participant ${participant} listed twice`);
      }
      seen.add(participant);
    }

    const beat = this.story.createBeat(setup);
    const unknown = this.cast.prepareForBeat(beat.complications);
    this.pendingBeat = beat;

    this.emitEvent('SYSTEM', 'BEAT_CREATED', 'INFO', {
      situation: beat.situation,
      location: beat.location,
      time: beat.time,
      participants: beat.participants,
      witnesses: beat.witnesses,
      complicatedAgents: Object.keys(beat.complications).filter(agent => !unknown.includes(agent))
    });
    for (const agent of unknown) {
      this.emitEvent('SYSTEM', 'COMPLICATION_IGNORED', 'WARN', { reason: 'UNKNOWN_AGENT' }, agent);
    }

    return beat;
  }

  // --------------------------------------------------------------------------
  // Beat Execution
  // --------------------------------------------------------------------------

  async runBeat(): Promise<BeatResult> {
    const beat = this.pendingBeat;
    if (!beat) {
      throw new SceneStateError('No beat set up; call setupBeat first');
    }
    this.pendingBeat = undefined;

    const scheduler = new TurnScheduler(beat.participants, this.config);
    this.scheduler = scheduler;
    const budget = this.config.maxTurnsPerBeat ?? this.config.forcedExitRound * beat.participants.length;

    this.emitEvent('SYSTEM', 'BEAT_STARTED', 'INFO', { participants: beat.participants, turnBudget: budget });

    let scheduledTurns = 0;
    for (;;) {
      if (scheduler.shouldEnd().shouldEnd) break;

      if (scheduledTurns >= budget) {
        scheduler.end('turn_limit_reached');
        break;
      }

      const selection = scheduler.selectSpeaker();
      this.emitEvent('CONVERSATION', 'SPEAKER_SELECTED', 'DEBUG', { source: selection.source }, selection.speaker);

      const record = await this.takeTurn(scheduler, beat, selection.speaker, 'STANDARD');
      scheduledTurns++;

      if (this.config.interjectionsEnabled && record.turn.content !== null) {
        await this.offerInterjection(scheduler, beat, record.turn);
      }
    }

    return this.finishBeat(scheduler, beat);
  }

  private async takeTurn(
    scheduler: TurnScheduler,
    beat: BeatRecord,
    speaker: string,
    kind: TurnKind,
    interjection?: InterjectionCue
  ): Promise<TurnRecord> {
    const context = this.buildTurnContext(scheduler, beat, speaker, kind, interjection);
    const intent = await this.requestTurn(context);

    // Judged in the round the wish was spoken, before recording can advance it.
    const spokenRound = scheduler.round;
    const exitAccepted = intent?.wantsExit ? scheduler.requestExit(speaker) : undefined;

    const record = scheduler.recordTurn({
      speaker,
      kind,
      content: intent?.content ?? null,
      tone: intent?.tone,
      action: intent?.action,
      target: intent?.targetId
    });
    for (const notice of record.notices) this.emitNotice(notice);

    if (intent) this.cast.applyTurnIntent(speaker, intent);
    if (exitAccepted !== undefined) {
      this.emitEvent('CONVERSATION', exitAccepted ? 'EXIT_REQUESTED' : 'EXIT_REJECTED', 'INFO', {
        accepted: exitAccepted,
        round: spokenRound
      }, speaker);
    }

    return record;
  }

  /**
   * The first observer, in participant order, who may still interject this
   * round and whose evaluation fires gets one out-of-rotation turn.
   */
  private async offerInterjection(scheduler: TurnScheduler, beat: BeatRecord, turn: Turn): Promise<void> {
    if (turn.content === null || scheduler.shouldEnd().shouldEnd) return;

    for (const observer of scheduler.participants()) {
      if (observer === turn.speaker || !scheduler.canInterject(observer)) continue;

      const decision = this.evaluator.evaluate(observer, turn.speaker, turn.content, turn.tone);
      if (!decision.shouldInterject || decision.primaryReason === undefined) continue;

      this.emitEvent('CONVERSATION', 'INTERJECTION_TRIGGERED', 'INFO', {
        triggers: decision.triggers,
        primaryReason: decision.primaryReason,
        emotionalIntensity: decision.emotionalIntensity
      }, observer, turn.speaker);

      scheduler.markInterjected(observer);
      await this.takeTurn(scheduler, beat, observer, 'INTERJECTION', {
        reason: decision.primaryReason,
        respondingTo: turn
      });
      return;
    }
  }

  private buildTurnContext(
    scheduler: TurnScheduler,
    beat: BeatRecord,
    speaker: string,
    kind: TurnKind,
    interjection?: InterjectionCue
  ): TurnContext {
    const present = [...scheduler.participants()];
    const addressee = interjection?.respondingTo.speaker ?? this.pickAddressee(scheduler, speaker);

    return {
      speakerId: speaker,
      sceneNumber: beat.sceneNumber,
      beatNumber: beat.number,
      roundNumber: scheduler.round,
      energyLevel: scheduler.energy,
      turnKind: kind,
      situation: beat.situation,
      location: beat.location,
      time: beat.time,
      presentAgents: present,
      recentTurns: scheduler.recentTurns(),
      addressee,
      relationshipSnapshot: this.cast.relationshipSnapshot(speaker, addressee, present),
      personalitySnapshot: this.cast.personality(speaker).snapshot(),
      complication: this.cast.complication(speaker),
      canRequestExit: scheduler.canRequestExit(),
      mustExit: scheduler.mustEnd(),
      interjection
    };
  }

  /**
   * Whoever spoke last, unless that was the speaker; else the first other
   * participant.
   */
  private pickAddressee(scheduler: TurnScheduler, speaker: string): string | undefined {
    const last = scheduler.recentTurns(1)[0];
    if (last && last.speaker !== speaker) return last.speaker;
    return scheduler.participants().find(agent => agent !== speaker);
  }

  private async requestTurn(context: TurnContext): Promise<TurnIntent | undefined> {
    const speaker = context.speakerId;
    this.emitEvent('COLLABORATOR', 'TURN_REQUESTED', 'DEBUG', {
      turnKind: context.turnKind,
      round: context.roundNumber
    }, speaker);

    let raw: unknown;
    try {
      raw = await this.withTimeout('generateTurn', () => this.generator.generateTurn(context));
    } catch (error) {
      this.emitCollaboratorFailure('generateTurn', error, speaker);
      return undefined;
    }

    if (raw === null || raw === undefined) {
      this.emitEvent('COLLABORATOR', 'NO_RESPONSE', 'INFO', { operation: 'generateTurn' }, speaker);
      return undefined;
    }

    const parsed = TurnIntentSchema.safeParse(raw);
    if (!parsed.success) {
      this.emitEvent('COLLABORATOR', 'MALFORMED_RESPONSE', 'WARN', {
        operation: 'generateTurn',
        issues: parsed.error.issues.map(issue => issue.message)
      }, speaker);
      return undefined;
    }
    return parsed.data;
  }

  private async withTimeout<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const timeoutMs = this.config.collaboratorTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      return await Promise.race([
        call(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new CollaboratorTimeoutError(operation, timeoutMs)), timeoutMs);
        })
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emitCollaboratorFailure(operation: string, error: unknown, agent: string): void {
    const timedOut = error instanceof CollaboratorTimeoutError;
    this.emitEvent('COLLABORATOR', timedOut ? 'COLLABORATOR_TIMEOUT' : 'COLLABORATOR_ERROR', 'WARN', {
      operation,
      error: error instanceof Error ? error.message : String(error)
    }, agent);
  }

  // --------------------------------------------------------------------------
  // Beat End
  // --------------------------------------------------------------------------

  private async finishBeat(scheduler: TurnScheduler, beat: BeatRecord): Promise<BeatResult> {
    const status = scheduler.getStatus();
    if (status.state !== 'ENDED') {
      throw new SceneStateError('Beat loop exited with the conversation still in progress');
    }

    const statistics = scheduler.statistics();
    const turns = [...scheduler.turns()];
    this.emitEvent('SYSTEM', 'BEAT_ENDED', 'INFO', { reason: status.reason, ...statistics });

    const beatSummary = this.summarizeBeat(beat, turns);
    const limit = this.config.reflectionEventLimit;
    const recentEvents = limit > 0 ? turns.slice(-limit).map(describeTurn) : [];

    const reflections: ReflectionOutcome[] = [];
    for (const agent of beat.participants) {
      const reflection = await this.requestReflection({
        agentId: agent,
        sceneNumber: beat.sceneNumber,
        beatNumber: beat.number,
        personalitySnapshot: this.cast.personality(agent).snapshot(),
        beatSummary,
        otherParticipants: beat.participants.filter(other => other !== agent),
        recentEvents
      });
      const outcome = this.cast.applyReflection(agent, reflection);
      this.emitReflectionOutcome(outcome);
      reflections.push(outcome);
    }

    const asymmetries = this.cast.relationships.detectAsymmetries();
    for (const asymmetry of asymmetries) {
      this.emitEvent('RELATIONSHIP', 'ASYMMETRY_DETECTED', 'INFO', {
        trustGap: asymmetry.trustGap,
        affectionGap: asymmetry.affectionGap,
        aToB: asymmetry.aToB.label,
        bToA: asymmetry.bToA.label
      }, asymmetry.agentA, asymmetry.agentB);
    }

    this.story.completeBeat(`Ended (${status.reason}) after ${statistics.totalTurns} turns`);

    let snapshotId: string | undefined;
    if (this.store) {
      try {
        snapshotId = await this.store.saveWorld(serializeWorld(this.cast, this.story));
      } catch (error) {
        this.emitEvent('SYSTEM', 'WORLD_SAVE_FAILED', 'ERROR', {
          error: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }
      this.emitEvent('SYSTEM', 'WORLD_SAVED', 'INFO', { snapshotId });
    }

    this.scheduler = undefined;

    return {
      beat: { ...beat },
      endReason: status.reason,
      turns,
      statistics,
      reflections,
      asymmetries,
      snapshotId
    };
  }

  private summarizeBeat(beat: BeatRecord, turns: readonly Turn[]): string {
    const spoken = turns.filter(turn => turn.content !== null).length;
    return `${beat.situation} (${beat.location}, ${beat.time}). ` +
      `${beat.participants.join(', ')} took ${turns.length} turns, ${spoken} spoken.`;
  }

  private async requestReflection(context: ReflectionContext): Promise<Reflection> {
    const agent = context.agentId;

    let raw: unknown;
    try {
      raw = await this.withTimeout('generateReflection', () => this.generator.generateReflection(context));
    } catch (error) {
      this.emitCollaboratorFailure('generateReflection', error, agent);
      return emptyReflection();
    }

    if (raw === null || raw === undefined) {
      this.emitEvent('COLLABORATOR', 'NO_RESPONSE', 'INFO', { operation: 'generateReflection' }, agent);
      return emptyReflection();
    }

    const parsed = ReflectionSchema.safeParse(raw);
    if (!parsed.success) {
      this.emitEvent('COLLABORATOR', 'MALFORMED_RESPONSE', 'WARN', {
        operation: 'generateReflection',
        issues: parsed.error.issues.map(issue => issue.message)
      }, agent);
      return emptyReflection();
    }
    return parsed.data;
  }

  private emitReflectionOutcome(outcome: ReflectionOutcome): void {
    const agent = outcome.agentId;

    for (const other of outcome.meetings) {
      this.emitEvent('RELATIONSHIP', 'FIRST_MEETING', 'INFO', { trust: NEUTRAL_SCORE, affection: NEUTRAL_SCORE }, agent, other);
    }

    for (const update of outcome.updates) {
      if (update.applied) {
        this.emitEvent('RELATIONSHIP', 'RELATIONSHIP_UPDATED', 'INFO', {
          before: update.before,
          after: update.after,
          memory: update.memory
        }, agent, update.to);
      } else {
        this.emitEvent('RELATIONSHIP', 'RELATIONSHIP_UPDATE_SKIPPED', 'WARN', { reason: update.reason }, agent, update.to);
      }
    }

    for (const gossip of outcome.gossip) {
      if (gossip.added) {
        this.emitEvent('RELATIONSHIP', 'GOSSIP_HEARD', 'INFO', { text: gossip.text }, agent, gossip.about);
      }
    }

    for (const name of outcome.ignored) {
      this.emitEvent('RELATIONSHIP', 'REFLECTION_ENTRY_IGNORED', 'WARN', { name }, agent);
    }
  }

  // --------------------------------------------------------------------------
  // Time
  // --------------------------------------------------------------------------

  advanceTime(days: number = 1): TimeReport {
    const report = this.cast.advanceTime(days);
    this.story.advanceTime(report.days);

    this.emitEvent('RELATIONSHIP', 'RELATIONSHIPS_DECAYED', 'INFO', {
      days: report.days,
      adjusted: report.relationships.adjusted,
      totalDays: this.story.totalDays
    });
    for (const { from, to } of report.relationships.forgotten) {
      this.emitEvent('RELATIONSHIP', 'RELATIONSHIP_FORGOTTEN', 'INFO', {}, from, to);
    }
    this.emitEvent('PERSONALITY', 'EMOTIONS_COOLED', 'DEBUG', { emotionalIntensity: report.emotionalIntensity });

    return report;
  }

  // --------------------------------------------------------------------------
  // Event System
  // --------------------------------------------------------------------------

  addEventListener(handler: EventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emitNotice(notice: SchedulerNotice): void {
    this.emitEvent('CONVERSATION', notice.type, notice.level, {
      message: notice.message,
      ...notice.payload
    }, notice.speaker, notice.target);
  }

  private emitEvent(
    category: EventCategory,
    eventType: string,
    level: EventLevel,
    payload: Record<string, unknown>,
    actorId?: string,
    targetId?: string
  ): void {
    const event: SceneEvent = {
      id: uuid(),
      sceneNumber: this.story.currentScene()?.number ?? 0,
      beatNumber: this.story.currentBeat()?.number ?? 0,
      round: this.scheduler?.round ?? 0,
      category,
      eventType,
      level,
      actorId,
      targetId,
      payload,
      timestamp: new Date()
    };

    this.events.push(event);

    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (e) {
        console.error('Event handler error:', e);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  getEvents(): SceneEvent[] {
    return this.events;
  }

  /** The scheduler of the beat in progress, if any */
  currentScheduler(): TurnScheduler | undefined {
    return this.scheduler;
  }

  getConfig(): ResolvedSceneConfig {
    return this.config;
  }
}
