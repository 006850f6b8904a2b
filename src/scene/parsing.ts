/**
 * Hearthside - Collaborator Response Parsing
 *
 * Turns raw model text into validated intents and reflections. Accepts the
 * native field names as well as the snake_case prompt format
 * (`speaks`/`does`/`conversation_target`, `trust_delta`, `gossip_worthy`).
 * Anything unparseable yields null, which the orchestrator treats as a skip
 * or an empty reflection.
 */

import { z } from 'zod';
import {
  ReflectionSchema,
  TurnIntentSchema,
  type Reflection,
  type TurnIntent
} from './types.js';

const TYPOGRAPHIC_REPLACEMENTS: [RegExp, string][] = [
  [/[“”„‟]/g, '"'],
  [/[‘’‚‛]/g, "'"],
  [/…/g, '...'],
  [/[–—]/g, '-']
];

export function normalizeQuotes(text: string): string {
  return TYPOGRAPHIC_REPLACEMENTS.reduce((acc, [pattern, plain]) => acc.replace(pattern, plain), text);
}

/**
 * The JSON object inside a model response: the first fenced block if there
 * is one, else the span from the first `{` to the last `}`.
 */
export function extractJsonBlock(raw: string): string | undefined {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = fenced ? fenced[1] : raw;

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) return undefined;
  return body.slice(start, end + 1);
}

function parseJsonObject(raw: string): unknown {
  const block = extractJsonBlock(normalizeQuotes(raw));
  if (block === undefined) return undefined;

  try {
    return JSON.parse(block);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Prompt-Format Shapes
// ============================================================================

/** Models write "null" or "none" when they do not want to target anyone. */
function presentName(value: string | null | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  const trimmed = value.trim();
  if (trimmed === '' || ['null', 'none'].includes(trimmed.toLowerCase())) return undefined;
  return trimmed;
}

const PromptTurnSchema = z.object({
  speaks: z.string().nullable(),
  does: z.string().nullish(),
  tone: z.string().nullish(),
  conversation_target: z.string().nullish(),
  emotional_state: z.string().nullish(),
  wants_to_exit: z.boolean().optional()
}).transform((r): TurnIntent => ({
  content: r.speaks,
  action: presentName(r.does),
  tone: presentName(r.tone),
  targetId: presentName(r.conversation_target),
  emotionalStateLabel: presentName(r.emotional_state) ?? 'neutral',
  wantsExit: r.wants_to_exit ?? false
}));

const PromptReflectionSchema = z.object({
  relationships: z.record(z.object({
    trust_delta: z.number().finite().default(0),
    affection_delta: z.number().finite().default(0),
    memory: z.string().nullish()
  })).default({}),
  knowledge_gained: z.object({
    gossip_worthy: z.array(z.string()).default([])
  }).default({})
}).transform((r): Reflection => ({
  relationshipDeltas: Object.fromEntries(
    Object.entries(r.relationships).map(([agent, d]) => [agent, {
      trustDelta: d.trust_delta,
      affectionDelta: d.affection_delta,
      memory: d.memory ?? undefined
    }])
  ),
  gossipWorthy: r.knowledge_gained.gossip_worthy
}));

const AnyTurnSchema = z.union([TurnIntentSchema, PromptTurnSchema]);

function isPromptReflection(value: unknown): boolean {
  return typeof value === 'object' && value !== null &&
    ('relationships' in value || 'knowledge_gained' in value);
}

// ============================================================================
// Entry Points
// ============================================================================

export function parseTurnIntentText(raw: string): TurnIntent | null {
  const result = AnyTurnSchema.safeParse(parseJsonObject(raw));
  return result.success ? result.data : null;
}

export function parseReflectionText(raw: string): Reflection | null {
  const data = parseJsonObject(raw);
  const result = isPromptReflection(data)
    ? PromptReflectionSchema.safeParse(data)
    : ReflectionSchema.safeParse(data);
  return result.success ? result.data : null;
}
