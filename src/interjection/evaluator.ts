/**
 * Hearthside - Interjection Evaluator
 *
 * Decides whether an observing agent should cut in on the current speaker.
 * Triggers are evaluated independently; the primary reason is the first one
 * that fired in priority order.
 */

import type { PersonalityState } from '../personality/personality.js';
import { STRESS_RESPONSE_THRESHOLD } from '../personality/types.js';
import type { RelationshipMatrix } from '../relationships/matrix.js';

export type InterjectionTrigger =
  | 'emotional_trigger'
  | 'relationship_defense'
  | 'stress_response'
  | 'information_correction';

export const TRIGGER_PRIORITY: readonly InterjectionTrigger[] = [
  'emotional_trigger',
  'relationship_defense',
  'stress_response',
  'information_correction'
];

export const EMOTIONAL_TRIGGER_INTENSITY = 8;
export const DEFENSE_TRUST_THRESHOLD = 7;
export const DEFENSIVE_TONES: readonly string[] = ['accusatory', 'hostile'];
export const STRESS_KEYWORDS: readonly string[] = ['liar', 'thief', 'betrayer'];
export const DENIAL_KEYWORDS: readonly string[] = ['never', "didn't"];

export interface InterjectionInput {
  observer: string;
  speaker: string;
  statement: string;
  tone?: string;
  /** Observer's current emotional intensity (0-10) */
  emotionalIntensity: number;
  /** Observer's trust in the speaker; undefined unless the relationship is KNOWN */
  trustInSpeaker?: number;
  /** Observer holds a secret complication this beat */
  hasComplication: boolean;
  /** Stress-response check; defaults to intensity >= 8 */
  stressCheck?: (intensity: number) => boolean;
}

export interface InterjectionDecision {
  shouldInterject: boolean;
  triggers: InterjectionTrigger[];
  primaryReason?: InterjectionTrigger;
  emotionalIntensity: number;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => keyword !== '' && text.includes(keyword));
}

export function evaluateInterjection(input: InterjectionInput): InterjectionDecision {
  const statement = input.statement.toLowerCase();
  const tone = input.tone?.toLowerCase();
  const stressCheck = input.stressCheck ?? ((intensity: number) => intensity >= STRESS_RESPONSE_THRESHOLD);

  const fired = new Set<InterjectionTrigger>();

  if (input.emotionalIntensity >= EMOTIONAL_TRIGGER_INTENSITY) {
    fired.add('emotional_trigger');
  }

  if (
    input.trustInSpeaker !== undefined &&
    input.trustInSpeaker >= DEFENSE_TRUST_THRESHOLD &&
    tone !== undefined &&
    DEFENSIVE_TONES.includes(tone)
  ) {
    fired.add('relationship_defense');
  }

  const stressKeywords = [...STRESS_KEYWORDS, input.observer.toLowerCase()];
  if (containsAny(statement, stressKeywords) && stressCheck(input.emotionalIntensity)) {
    fired.add('stress_response');
  }

  if (input.hasComplication && containsAny(statement, DENIAL_KEYWORDS)) {
    fired.add('information_correction');
  }

  const triggers = TRIGGER_PRIORITY.filter(trigger => fired.has(trigger));

  return {
    shouldInterject: triggers.length > 0,
    triggers,
    primaryReason: triggers[0],
    emotionalIntensity: input.emotionalIntensity
  };
}

// ============================================================================
// Bound Evaluator
// ============================================================================

/**
 * Where the evaluator reads observer state from. The Cast implements this.
 */
export interface ObserverSource {
  readonly relationships: RelationshipMatrix;
  personality(agent: string): PersonalityState;
  complication(agent: string): string | undefined;
}

export class InterjectionEvaluator {
  constructor(private readonly source: ObserverSource) {}

  evaluate(observer: string, speaker: string, statement: string, tone?: string): InterjectionDecision {
    const personality = this.source.personality(observer);
    const relationship = this.source.relationships.context(observer, speaker);

    return evaluateInterjection({
      observer,
      speaker,
      statement,
      tone,
      emotionalIntensity: personality.nurture.emotionalIntensity,
      trustInSpeaker: relationship.status === 'KNOWN' ? relationship.trust : undefined,
      hasComplication: this.source.complication(observer) !== undefined,
      stressCheck: intensity => personality.shouldStressRespond(intensity)
    });
  }
}
