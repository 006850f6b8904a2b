/**
 * Hearthside - Personality Types
 *
 * Nature: permanent core traits fixed when the agent is created.
 * Nurture: short-term state shaped by recent scenes; decays between days.
 */

import { z } from 'zod';

export const LEARNED_BEHAVIOR_CAPACITY = 5;
export const BELIEF_CAPACITY = 3;
export const STRESS_RESPONSE_THRESHOLD = 8;

export const NatureSchema = z.object({
  coreTraits: z.array(z.string()),
  cognitiveStyle: z.string(),    // "overthinking", "impulsive", "analytical"
  stressResponse: z.string(),    // "people-pleasing", "aggressive", "withdrawal"
  moralCompass: z.string()       // "fairness-first", "loyalty-first", "pragmatic"
});
export type Nature = Readonly<Omit<z.infer<typeof NatureSchema>, 'coreTraits'> & {
  coreTraits: readonly string[];
}>;

export const NurtureRecordSchema = z.object({
  recentTreatment: z.string(),
  confidence: z.number().min(0).max(10),
  emotionalState: z.string(),
  emotionalIntensity: z.number().min(0).max(10),
  learnedBehaviors: z.array(z.string()).max(LEARNED_BEHAVIOR_CAPACITY),
  temporaryBeliefs: z.array(z.string()).max(BELIEF_CAPACITY),
  socialMask: z.string()
});
export type NurtureRecord = z.infer<typeof NurtureRecordSchema>;

export const PersonalityRecordSchema = z.object({
  name: z.string(),
  nature: NatureSchema,
  nurture: NurtureRecordSchema
});
export type PersonalityRecord = z.infer<typeof PersonalityRecordSchema>;

export const ExperienceKindSchema = z.enum([
  'positive_interaction',
  'negative_interaction',
  'betrayal',
  'success',
  'failure'
]);
export type ExperienceKind = z.infer<typeof ExperienceKindSchema>;

export const ArchetypeSchema = z.enum(['generous_anxious', 'selfish_cunning', 'loyal_quiet', 'balanced']);
export type Archetype = z.infer<typeof ArchetypeSchema>;

/**
 * Read-only view handed to collaborators.
 */
export interface PersonalitySnapshot {
  name: string;
  nature: Nature;
  nurture: NurtureRecord;
  primaryTrait: string;
  summary: string;
}
