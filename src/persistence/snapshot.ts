/**
 * Hearthside - World Snapshot
 *
 * Versioned, self-describing form of the durable world: roster,
 * relationships, personalities, agent scene state and story. Reloading a
 * snapshot reproduces identical scheduling and relationship behaviour.
 */

import { z } from 'zod';
import { SnapshotSchemaError } from '../core/errors.js';
import { AgentSchema } from '../core/types.js';
import { PersonalityState } from '../personality/personality.js';
import { PersonalityRecordSchema } from '../personality/types.js';
import { RelationshipMatrix } from '../relationships/matrix.js';
import { RelationshipRecordSchema } from '../relationships/types.js';
import { AgentStateRecordSchema, Cast } from '../scene/cast.js';
import { StoryState } from '../scene/story.js';
import { StoryRecordSchema } from '../scene/types.js';

export const WORLD_SNAPSHOT_VERSION = 1;

export const WorldSnapshotSchema = z.object({
  version: z.literal(WORLD_SNAPSHOT_VERSION),
  savedAt: z.string().datetime(),
  roster: z.array(AgentSchema).min(1),
  relationships: z.array(RelationshipRecordSchema),
  personalities: z.array(PersonalityRecordSchema),
  agentStates: z.array(AgentStateRecordSchema),
  story: StoryRecordSchema
}).superRefine((snapshot, ctx) => {
  const ids = snapshot.roster.map(agent => agent.id);
  const roster = new Set(ids);
  if (roster.size !== ids.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['roster'], message: 'duplicate agent id' });
  }

  const personalityNames = snapshot.personalities.map(p => p.name);
  for (const id of roster) {
    if (personalityNames.filter(name => name === id).length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['personalities'],
        message: `expected exactly one personality for ${id}`
      });
    }
  }
  for (const name of personalityNames) {
    if (!roster.has(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['personalities'], message: `${name} is not in the roster` });
    }
  }
  for (const state of snapshot.agentStates) {
    if (!roster.has(state.agentId)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['agentStates'], message: `${state.agentId} is not in the roster` });
    }
  }
});
export type WorldSnapshot = z.infer<typeof WorldSnapshotSchema>;

export interface World {
  cast: Cast;
  story: StoryState;
}

/**
 * Where the orchestrator hands the world at the end of each beat.
 */
export interface WorldStore {
  saveWorld(snapshot: WorldSnapshot): string | Promise<string>;
}

export function serializeWorld(cast: Cast, story: StoryState, savedAt: Date = new Date()): WorldSnapshot {
  return {
    version: WORLD_SNAPSHOT_VERSION,
    savedAt: savedAt.toISOString(),
    roster: cast.listAgents(),
    relationships: cast.relationships.toRecords(),
    personalities: cast.personalityStates().map(p => p.toRecord()),
    agentStates: cast.agentStateRecords(),
    story: story.toRecord()
  };
}

const VersionProbeSchema = z.object({ version: z.unknown() });

/**
 * Validate and rebuild a world. Throws SnapshotSchemaError on any mismatch;
 * nothing is defaulted.
 */
export function deserializeWorld(data: unknown): World {
  const probe = VersionProbeSchema.safeParse(data);
  if (!probe.success) {
    throw new SnapshotSchemaError('World snapshot must be an object with a version');
  }
  if (probe.data.version !== WORLD_SNAPSHOT_VERSION) {
    throw new SnapshotSchemaError(
      `Unsupported world snapshot version ${JSON.stringify(probe.data.version)} (expected ${WORLD_SNAPSHOT_VERSION})`
    );
  }

  const parsed = WorldSnapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new SnapshotSchemaError(
      'Invalid world snapshot',
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'snapshot'}: ${issue.message}`)
    );
  }

  const snapshot = parsed.data;
  const roster = snapshot.roster.map(agent => agent.id);
  const relationships = RelationshipMatrix.fromRecords(roster, snapshot.relationships);
  const personalities = snapshot.personalities.map(record => PersonalityState.fromRecord(record));

  const cast = new Cast(snapshot.roster, personalities, relationships);
  cast.restoreAgentStates(snapshot.agentStates);

  return { cast, story: StoryState.fromRecord(snapshot.story) };
}
