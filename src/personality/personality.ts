/**
 * Hearthside - Personality State
 */

import { BoundedBuffer } from '../core/bounded-buffer.js';
import { wholeDays } from '../core/types.js';
import {
  BELIEF_CAPACITY,
  LEARNED_BEHAVIOR_CAPACITY,
  STRESS_RESPONSE_THRESHOLD,
  type Archetype,
  type ExperienceKind,
  type Nature,
  type NurtureRecord,
  type PersonalityRecord,
  type PersonalitySnapshot
} from './types.js';

function clamp(value: number): number {
  return Math.min(10, Math.max(0, value));
}

function finiteDelta(delta: number): number {
  return Number.isFinite(delta) ? delta : 0;
}

// ============================================================================
// Nurture
// ============================================================================

export class Nurture {
  recentTreatment = 'neutral';
  emotionalState = 'neutral';
  socialMask = 'authentic';
  private _confidence = 5;
  private _emotionalIntensity = 5;
  private readonly learned = new BoundedBuffer<string>(LEARNED_BEHAVIOR_CAPACITY);
  private readonly beliefs = new BoundedBuffer<string>(BELIEF_CAPACITY);

  static fromRecord(record: NurtureRecord): Nurture {
    const nurture = new Nurture();
    nurture.recentTreatment = record.recentTreatment;
    nurture.emotionalState = record.emotionalState;
    nurture.socialMask = record.socialMask;
    nurture._confidence = clamp(record.confidence);
    nurture._emotionalIntensity = clamp(record.emotionalIntensity);
    for (const behavior of record.learnedBehaviors) nurture.learned.push(behavior);
    for (const belief of record.temporaryBeliefs) nurture.beliefs.push(belief);
    return nurture;
  }

  get confidence(): number {
    return this._confidence;
  }

  get emotionalIntensity(): number {
    return this._emotionalIntensity;
  }

  get learnedBehaviors(): string[] {
    return this.learned.toArray();
  }

  get temporaryBeliefs(): string[] {
    return this.beliefs.toArray();
  }

  updateConfidence(delta: number): number {
    this._confidence = clamp(this._confidence + finiteDelta(delta));
    return this._confidence;
  }

  adjustIntensity(delta: number): number {
    this._emotionalIntensity = clamp(this._emotionalIntensity + finiteDelta(delta));
    return this._emotionalIntensity;
  }

  /** Returns false if the behaviour was already known. */
  learnBehavior(behavior: string): boolean {
    return this.learned.pushUnique(behavior);
  }

  adoptBelief(belief: string): boolean {
    return this.beliefs.pushUnique(belief);
  }

  /**
   * Emotions cool by one point per day but never drop below 1. An intensity
   * already at or below 1 is left alone.
   */
  decayPerDay(days: number = 1): number {
    const whole = wholeDays(days);
    if (whole > 0 && this._emotionalIntensity > 1) {
      this._emotionalIntensity = Math.max(1, this._emotionalIntensity - whole);
    }
    return this._emotionalIntensity;
  }

  toRecord(): NurtureRecord {
    return {
      recentTreatment: this.recentTreatment,
      confidence: this._confidence,
      emotionalState: this.emotionalState,
      emotionalIntensity: this._emotionalIntensity,
      learnedBehaviors: this.learned.toArray(),
      temporaryBeliefs: this.beliefs.toArray(),
      socialMask: this.socialMask
    };
  }
}

// ============================================================================
// Personality State
// ============================================================================

export class PersonalityState {
  readonly nature: Nature;
  readonly nurture: Nurture;

  constructor(readonly name: string, nature: Nature, nurture: Nurture = new Nurture()) {
    this.nature = Object.freeze({ ...nature, coreTraits: Object.freeze([...nature.coreTraits]) });
    this.nurture = nurture;
  }

  static fromRecord(record: PersonalityRecord): PersonalityState {
    return new PersonalityState(record.name, record.nature, Nurture.fromRecord(record.nurture));
  }

  primaryTrait(): string {
    return this.nature.coreTraits[0] ?? 'neutral';
  }

  /**
   * Stress response fires at intensity 8 or above. Defaults to the agent's
   * current emotional intensity.
   */
  shouldStressRespond(stressLevel: number = this.nurture.emotionalIntensity): boolean {
    return stressLevel >= STRESS_RESPONSE_THRESHOLD;
  }

  applyExperience(kind: ExperienceKind, details: { betrayer?: string } = {}): void {
    switch (kind) {
      case 'positive_interaction':
        this.nurture.updateConfidence(1);
        this.nurture.recentTreatment = 'appreciated';
        break;
      case 'negative_interaction':
        this.nurture.updateConfidence(-1);
        this.nurture.recentTreatment = 'dismissed';
        break;
      case 'betrayal':
        this.nurture.updateConfidence(-2);
        this.nurture.recentTreatment = 'betrayed';
        if (details.betrayer) {
          this.nurture.learnBehavior(`${details.betrayer} is untrustworthy`);
        }
        break;
      case 'success':
        this.nurture.updateConfidence(2);
        this.nurture.recentTreatment = 'successful';
        break;
      case 'failure':
        this.nurture.updateConfidence(-1);
        this.nurture.emotionalState = 'disappointed';
        break;
    }
  }

  /**
   * One-line description for prompts.
   */
  unifiedContext(): string {
    const parts = [
      `Core traits: ${this.nature.coreTraits.join(', ')}`,
      `Stress response: ${this.nature.stressResponse}`,
      `Moral compass: ${this.nature.moralCompass}`,
      `Confidence: ${this.nurture.confidence}/10`,
      `Emotional state: ${this.nurture.emotionalState}`
    ];

    const learned = this.nurture.learnedBehaviors.slice(-2);
    if (learned.length > 0) parts.push(`Learned: ${learned.join(', ')}`);

    return parts.join(' | ');
  }

  snapshot(): PersonalitySnapshot {
    return {
      name: this.name,
      nature: this.nature,
      nurture: this.nurture.toRecord(),
      primaryTrait: this.primaryTrait(),
      summary: this.unifiedContext()
    };
  }

  toRecord(): PersonalityRecord {
    return {
      name: this.name,
      nature: { ...this.nature, coreTraits: [...this.nature.coreTraits] },
      nurture: this.nurture.toRecord()
    };
  }
}

// ============================================================================
// Generator
// ============================================================================

const TRAIT_POOLS = {
  positive: ['generous', 'brave', 'hardworking', 'optimistic', 'loyal', 'honest', 'patient'],
  negative: ['selfish', 'cowardly', 'lazy', 'pessimistic', 'disloyal', 'deceptive', 'impatient'],
  neutral: ['analytical', 'quiet', 'talkative', 'curious', 'cautious', 'practical', 'creative']
} as const;

const COGNITIVE_STYLES = ['overthinking', 'impulsive', 'analytical', 'intuitive', 'methodical'] as const;
const STRESS_RESPONSES = ['people-pleasing', 'aggressive', 'withdrawal', 'denial', 'hypervigilance'] as const;
const MORAL_COMPASSES = ['fairness-first', 'loyalty-first', 'pragmatic', 'rule-following', 'compassionate'] as const;

const ARCHETYPES: Record<Exclude<Archetype, 'balanced'>, Nature> = {
  generous_anxious: {
    coreTraits: ['generous', 'anxious', 'hardworking'],
    cognitiveStyle: 'overthinking',
    stressResponse: 'people-pleasing',
    moralCompass: 'fairness-first'
  },
  selfish_cunning: {
    coreTraits: ['selfish', 'cunning', 'charismatic'],
    cognitiveStyle: 'analytical',
    stressResponse: 'aggressive',
    moralCompass: 'pragmatic'
  },
  loyal_quiet: {
    coreTraits: ['loyal', 'quiet', 'observant'],
    cognitiveStyle: 'intuitive',
    stressResponse: 'withdrawal',
    moralCompass: 'loyalty-first'
  }
};

export class PersonalityGenerator {
  /**
   * @param random - uniform [0, 1) source; swap in a seeded one for replays
   */
  constructor(private readonly random: () => number = Math.random) {}

  generateNature(archetype: Archetype = 'balanced'): Nature {
    if (archetype !== 'balanced') {
      const preset = ARCHETYPES[archetype];
      return { ...preset, coreTraits: [...preset.coreTraits] };
    }

    return {
      coreTraits: [
        this.pick(TRAIT_POOLS.positive),
        this.pick(TRAIT_POOLS.negative),
        this.pick(TRAIT_POOLS.neutral)
      ],
      cognitiveStyle: this.pick(COGNITIVE_STYLES),
      stressResponse: this.pick(STRESS_RESPONSES),
      moralCompass: this.pick(MORAL_COMPASSES)
    };
  }

  /**
   * The three-villager starter cast.
   */
  defaultNatures(): Record<string, Nature> {
    return {
      Alice: this.generateNature('generous_anxious'),
      Bob: this.generateNature('selfish_cunning'),
      Charlie: this.generateNature('loyal_quiet')
    };
  }

  private pick<T>(options: readonly T[]): T {
    const index = Math.min(options.length - 1, Math.floor(this.random() * options.length));
    return options[index];
  }
}
