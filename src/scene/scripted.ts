/**
 * Hearthside - Scripted Dialogue Generator
 *
 * Deterministic in-process collaborator. Replies are queued per agent and
 * consumed in order; once an agent's queue is empty the fallback answers.
 * Used for demos, replays and tests.
 */

import type {
  DialogueGenerator,
  ReflectionContext,
  ReflectionInput,
  TurnContext,
  TurnIntentInput
} from './types.js';

/**
 * A queued reply. `null` is "no response"; an Error is thrown from the
 * call; `'HANG'` never settles (exercises the orchestrator timeout).
 */
export type ScriptedReply<T> = T | null | Error | 'HANG';

export interface ScriptedGeneratorOptions {
  turnFallback?: (context: TurnContext) => TurnIntentInput | null;
  reflectionFallback?: (context: ReflectionContext) => ReflectionInput | null;
}

function defaultTurn(context: TurnContext): TurnIntentInput {
  return {
    content: `${context.speakerId} weighs in on round ${context.roundNumber}.`,
    emotionalStateLabel: 'neutral',
    wantsExit: false
  };
}

export class ScriptedDialogueGenerator implements DialogueGenerator {
  private readonly turnQueues = new Map<string, ScriptedReply<TurnIntentInput>[]>();
  private readonly reflectionQueues = new Map<string, ScriptedReply<ReflectionInput>[]>();
  private readonly turnFallback: (context: TurnContext) => TurnIntentInput | null;
  private readonly reflectionFallback: (context: ReflectionContext) => ReflectionInput | null;

  /** Every context received, in call order */
  readonly turnCalls: TurnContext[] = [];
  readonly reflectionCalls: ReflectionContext[] = [];

  constructor(options: ScriptedGeneratorOptions = {}) {
    this.turnFallback = options.turnFallback ?? defaultTurn;
    this.reflectionFallback = options.reflectionFallback ?? (() => null);
  }

  queueTurn(agent: string, ...replies: ScriptedReply<TurnIntentInput>[]): this {
    enqueue(this.turnQueues, agent, replies);
    return this;
  }

  queueReflection(agent: string, ...replies: ScriptedReply<ReflectionInput>[]): this {
    enqueue(this.reflectionQueues, agent, replies);
    return this;
  }

  pendingTurns(agent: string): number {
    return this.turnQueues.get(agent)?.length ?? 0;
  }

  async generateTurn(context: TurnContext): Promise<TurnIntentInput | null> {
    this.turnCalls.push(context);
    const reply = this.turnQueues.get(context.speakerId)?.shift();
    if (reply === undefined) return this.turnFallback(context);
    return settle(reply);
  }

  async generateReflection(context: ReflectionContext): Promise<ReflectionInput | null> {
    this.reflectionCalls.push(context);
    const reply = this.reflectionQueues.get(context.agentId)?.shift();
    if (reply === undefined) return this.reflectionFallback(context);
    return settle(reply);
  }
}

function enqueue<T>(queues: Map<string, ScriptedReply<T>[]>, agent: string, replies: ScriptedReply<T>[]): void {
  const queue = queues.get(agent) ?? [];
  queue.push(...replies);
  queues.set(agent, queue);
}

function settle<T>(reply: ScriptedReply<T>): Promise<T | null> {
  if (reply === 'HANG') return new Promise<T | null>(() => {});
  if (reply instanceof Error) return Promise.reject(reply);
  return Promise.resolve(reply);
}
