import { afterEach, describe, expect, it, vi } from 'vitest';

import type { SceneConfig } from '../../src/core/config.js';
import { SceneStateError, UnknownAgentError } from '../../src/core/errors.js';
import type { SceneEvent } from '../../src/core/types.js';
import { PersonalityGenerator } from '../../src/personality/personality.js';
import { Cast } from '../../src/scene/cast.js';
import { SceneOrchestrator, describeTurn } from '../../src/scene/orchestrator.js';
import { ScriptedDialogueGenerator } from '../../src/scene/scripted.js';

function setup(config: SceneConfig = {}, generator = new ScriptedDialogueGenerator()) {
  const cast = Cast.create(['Alice', 'Bob', 'Charlie'], new PersonalityGenerator(() => 0));
  const orchestrator = new SceneOrchestrator(cast, generator, {
    config: { interjectionsEnabled: false, collaboratorTimeoutMs: 20, ...config }
  });
  orchestrator.createScene('First Frost', 'The well froze', 'No water');
  return { cast, generator, orchestrator };
}

function openBeat(orchestrator: SceneOrchestrator, complications: Record<string, string> = {}) {
  return orchestrator.setupBeat({
    situation: 'Who broke the pump?',
    location: 'Square',
    time: 'Dawn',
    participants: ['Alice', 'Bob', 'Charlie'],
    complications
  });
}

function eventTypes(events: readonly SceneEvent[]): string[] {
  return events.map(event => event.eventType);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SceneOrchestrator: setup', () => {
  it('rejects a participant outside the cast', () => {
    const { orchestrator } = setup();
    expect(() => orchestrator.setupBeat({ situation: 's', location: 'l', time: 't', participants: ['Alice', 'Zed'] }))
      .toThrow(UnknownAgentError);
  });

  it('rejects a duplicate participant', () => {
    const { orchestrator } = setup();
    expect(() => orchestrator.setupBeat({ situation: 's', location: 'l', time: 't', participants: ['Alice', 'Alice'] }))
      .toThrow(SceneStateError);
  });

  it('warns about complications for unknown agents', () => {
    const { orchestrator, cast } = setup();
    openBeat(orchestrator, { Bob: 'broke it', Zed: 'a ghost' });

    const warning = orchestrator.getEvents().find(e => e.eventType === 'COMPLICATION_IGNORED');
    expect(warning).toMatchObject({ level: 'WARN', actorId: 'Zed', sceneNumber: 1, beatNumber: 1 });
    expect(cast.complication('Bob')).toBe('broke it');
  });

  it('refuses to run without a beat', async () => {
    const { orchestrator } = setup();
    await expect(orchestrator.runBeat()).rejects.toThrow(SceneStateError);
  });
});

describe('SceneOrchestrator: beat loop', () => {
  it('runs to the forced end when nobody asks to leave', async () => {
    const { orchestrator, generator, cast } = setup();
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.endReason).toBe('maximum_rounds_reached');
    expect(result.statistics).toEqual({
      totalTurns: 21,
      skippedTurns: 0,
      interjections: 0,
      turnsByAgent: { Alice: 7, Bob: 7, Charlie: 7 },
      roundsCompleted: 7
    });
    expect(generator.turnCalls).toHaveLength(21);
    expect(orchestrator.story.currentBeat()?.outcome).toBe('Ended (maximum_rounds_reached) after 21 turns');
    expect(orchestrator.currentScheduler()).toBeUndefined();
    expect(cast.relationships.detectAsymmetries()).toEqual([]);
  });

  it('builds the turn context from the beat and the cast', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 2 });
    openBeat(orchestrator, { Alice: 'took the handle' });
    await orchestrator.runBeat();

    const [first, second] = generator.turnCalls;
    expect(first).toMatchObject({
      speakerId: 'Alice',
      sceneNumber: 1,
      beatNumber: 1,
      roundNumber: 1,
      energyLevel: 'high',
      turnKind: 'STANDARD',
      situation: 'Who broke the pump?',
      presentAgents: ['Alice', 'Bob', 'Charlie'],
      recentTurns: [],
      addressee: 'Bob',
      complication: 'took the handle',
      canRequestExit: false,
      mustExit: false
    });
    expect(first.relationshipSnapshot).toEqual({
      addressee: { status: 'UNKNOWN', label: 'stranger', gossip: [] },
      others: { Charlie: { status: 'UNKNOWN', label: 'stranger', gossip: [] } }
    });
    expect(first.personalitySnapshot.primaryTrait).toBe('generous');

    expect(second.speakerId).toBe('Bob');
    expect(second.addressee).toBe('Alice');
    expect(second.complication).toBeUndefined();
    expect(second.recentTurns.map(describeTurn)).toEqual(['Alice: "Alice weighs in on round 1."']);
  });

  it('ends by majority once two of three ask to leave inside the window', async () => {
    const generator = new ScriptedDialogueGenerator({
      turnFallback: ctx => ({
        content: `${ctx.speakerId} speaks.`,
        wantsExit: ctx.canRequestExit && ctx.speakerId !== 'Charlie'
      })
    });
    const { orchestrator } = setup({}, generator);
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.endReason).toBe('majority_exit_request');
    expect(result.statistics.totalTurns).toBe(11);
    expect(eventTypes(orchestrator.getEvents()).filter(t => t === 'EXIT_REQUESTED')).toHaveLength(2);
  });

  it('rejects an exit request before the window opens', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 1 });
    generator.queueTurn('Alice', { content: 'I should go.', wantsExit: true });
    openBeat(orchestrator);
    await orchestrator.runBeat();

    const rejected = orchestrator.getEvents().find(e => e.eventType === 'EXIT_REJECTED');
    expect(rejected).toMatchObject({ actorId: 'Alice', payload: { accepted: false, round: 1 } });
  });

  it('judges an exit wish in the round it was spoken', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 9 });
    generator.queueTurn('Charlie', { content: 'Hm.' }, { content: 'Hm.' }, { content: 'I am done here.', wantsExit: true });
    openBeat(orchestrator);
    const result = await orchestrator.runBeat();

    expect(result.turns[8]).toMatchObject({ speaker: 'Charlie', round: 3 });
    const types = eventTypes(orchestrator.getEvents());
    expect(types).not.toContain('EXIT_REQUESTED');
    const rejected = orchestrator.getEvents().find(e => e.eventType === 'EXIT_REJECTED');
    expect(rejected).toMatchObject({ actorId: 'Charlie', payload: { accepted: false, round: 3 } });
  });

  it('stops at the turn budget', async () => {
    const { orchestrator } = setup({ maxTurnsPerBeat: 4 });
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.endReason).toBe('turn_limit_reached');
    expect(result.turns.map(t => `${t.speaker}@${t.round}`)).toEqual(['Alice@1', 'Bob@1', 'Charlie@1', 'Alice@2']);
  });

  it('a targeted agent speaks next', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 3 });
    generator.queueTurn('Alice', { content: 'Charlie, you were there.', targetId: 'Charlie', tone: 'sharp' });
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.turns.map(t => t.speaker)).toEqual(['Alice', 'Charlie', 'Bob']);
    expect(describeTurn(result.turns[0])).toBe('Alice [sharp]: "Charlie, you were there."');
    expect(orchestrator.getEvents().find(e => e.eventType === 'PRIORITY_SET')).toMatchObject({
      category: 'CONVERSATION',
      actorId: 'Alice',
      targetId: 'Charlie'
    });
  });
});

describe('SceneOrchestrator: collaborator failures', () => {
  it('turns errors, timeouts, missing and malformed replies into skips', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 4 });
    generator
      .queueTurn('Alice', new Error('model offline'), JSON.parse('{"content": 42}'))
      .queueTurn('Bob', 'HANG')
      .queueTurn('Charlie', null);
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.endReason).toBe('turn_limit_reached');
    expect(result.statistics.skippedTurns).toBe(4);
    expect(result.turns.map(describeTurn)).toEqual([
      'Alice stayed silent',
      'Bob stayed silent',
      'Charlie stayed silent',
      'Alice stayed silent'
    ]);

    const failures = orchestrator.getEvents().filter(e => e.category === 'COLLABORATOR' && e.level !== 'DEBUG');
    expect(failures.map(e => `${e.eventType}:${e.actorId}`)).toEqual([
      'COLLABORATOR_ERROR:Alice',
      'COLLABORATOR_TIMEOUT:Bob',
      'NO_RESPONSE:Charlie',
      'MALFORMED_RESPONSE:Alice',
      'NO_RESPONSE:Alice',
      'NO_RESPONSE:Bob',
      'NO_RESPONSE:Charlie'
    ]);
    expect(failures[1].payload.error).toBe('generateTurn timed out after 20ms');
  });

  it('a failed reflection is treated as empty', async () => {
    const { orchestrator, generator, cast } = setup({ maxTurnsPerBeat: 1 });
    generator.queueReflection('Alice', new Error('model offline'));
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.reflections[0]).toEqual({ agentId: 'Alice', meetings: [], updates: [], gossip: [], ignored: [] });
    expect(cast.relationships.summary()).toEqual({ Alice: {}, Bob: {}, Charlie: {} });
  });
});

describe('SceneOrchestrator: interjections', () => {
  it('an agent at intensity 9 cuts in once, answering the speaker', async () => {
    const { orchestrator, generator, cast } = setup({ interjectionsEnabled: true, maxTurnsPerBeat: 1 });
    cast.adjustIntensity('Charlie', 4);
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.turns.map(t => `${t.speaker}:${t.kind}`)).toEqual(['Alice:STANDARD', 'Charlie:INTERJECTION']);
    expect(result.statistics.interjections).toBe(1);

    const context = generator.turnCalls[1];
    expect(context.turnKind).toBe('INTERJECTION');
    expect(context.addressee).toBe('Alice');
    expect(context.interjection?.reason).toBe('emotional_trigger');
    expect(context.interjection?.respondingTo.speaker).toBe('Alice');

    expect(orchestrator.getEvents().find(e => e.eventType === 'INTERJECTION_TRIGGERED')).toMatchObject({
      actorId: 'Charlie',
      targetId: 'Alice',
      payload: { primaryReason: 'emotional_trigger', triggers: ['emotional_trigger'] }
    });
  });

  it('nobody cuts in on a skipped turn', async () => {
    const { orchestrator, generator, cast } = setup({ interjectionsEnabled: true, maxTurnsPerBeat: 1 });
    cast.adjustIntensity('Charlie', 4);
    generator.queueTurn('Alice', { content: null });
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();
    expect(result.turns).toHaveLength(1);
  });
});

describe('SceneOrchestrator: reflections', () => {
  it('folds reflections into the matrix and reports asymmetries', async () => {
    const { orchestrator, generator, cast } = setup({ maxTurnsPerBeat: 3 });
    generator
      .queueReflection('Alice', {
        relationshipDeltas: { Bob: { trustDelta: 3, affectionDelta: 3, memory: 'Bob carried the water' } },
        gossipWorthy: ['Charlie hid the pump handle']
      })
      .queueReflection('Bob', { relationshipDeltas: { Alice: { trustDelta: -3, affectionDelta: -3 } } });
    openBeat(orchestrator);

    const result = await orchestrator.runBeat();

    expect(generator.reflectionCalls[0]).toEqual({
      agentId: 'Alice',
      sceneNumber: 1,
      beatNumber: 1,
      personalitySnapshot: cast.personality('Alice').snapshot(),
      beatSummary: 'Who broke the pump? (Square, Dawn). Alice, Bob, Charlie took 3 turns, 3 spoken.',
      otherParticipants: ['Bob', 'Charlie'],
      recentEvents: [
        'Alice: "Alice weighs in on round 1."',
        'Bob: "Bob weighs in on round 1."',
        'Charlie: "Charlie weighs in on round 1."'
      ]
    });

    expect(cast.relationships.relationship('Alice', 'Bob')?.label).toBe('beloved friend');
    expect(cast.relationships.relationship('Bob', 'Alice')?.label).toBe('dangerous enemy');
    expect(cast.relationships.relationship('Alice', 'Charlie')?.gossip).toEqual(['Charlie hid the pump handle']);
    expect(result.asymmetries).toHaveLength(1);
    expect(result.asymmetries[0]).toMatchObject({ agentA: 'Alice', agentB: 'Bob', trustGap: 6, affectionGap: 6 });

    const relationshipEvents = orchestrator.getEvents().filter(e => e.category === 'RELATIONSHIP');
    expect(relationshipEvents.map(e => `${e.eventType}:${e.actorId}->${e.targetId}`)).toEqual([
      'FIRST_MEETING:Alice->Bob',
      'RELATIONSHIP_UPDATED:Alice->Bob',
      'GOSSIP_HEARD:Alice->Charlie',
      'FIRST_MEETING:Bob->Alice',
      'RELATIONSHIP_UPDATED:Bob->Alice',
      'ASYMMETRY_DETECTED:Alice->Bob'
    ]);
  });

  it('hands no recent events when the limit is zero', async () => {
    const { orchestrator, generator } = setup({ maxTurnsPerBeat: 2, reflectionEventLimit: 0 });
    openBeat(orchestrator);
    await orchestrator.runBeat();
    expect(generator.reflectionCalls.map(c => c.recentEvents)).toEqual([[], [], []]);
  });
});

describe('SceneOrchestrator: world store', () => {
  it('saves the world after each beat', async () => {
    const cast = Cast.create(['Alice', 'Bob'], new PersonalityGenerator(() => 0));
    const saveWorld = vi.fn(() => 'snapshot-1');
    const orchestrator = new SceneOrchestrator(cast, new ScriptedDialogueGenerator(), {
      config: { interjectionsEnabled: false, maxTurnsPerBeat: 2 },
      store: { saveWorld }
    });
    orchestrator.createScene('Scene', 'Premise', 'Stakes');
    orchestrator.setupBeat({ situation: 's', location: 'l', time: 't', participants: ['Alice', 'Bob'] });

    const result = await orchestrator.runBeat();
    expect(result.snapshotId).toBe('snapshot-1');
    expect(saveWorld).toHaveBeenCalledTimes(1);
    expect(orchestrator.getEvents().find(e => e.eventType === 'WORLD_SAVED')?.payload).toEqual({ snapshotId: 'snapshot-1' });
  });

  it('reports and rethrows a failed save', async () => {
    const cast = Cast.create(['Alice', 'Bob'], new PersonalityGenerator(() => 0));
    const orchestrator = new SceneOrchestrator(cast, new ScriptedDialogueGenerator(), {
      config: { interjectionsEnabled: false, maxTurnsPerBeat: 2 },
      store: { saveWorld: () => { throw new Error('disk full'); } }
    });
    orchestrator.createScene('Scene', 'Premise', 'Stakes');
    orchestrator.setupBeat({ situation: 's', location: 'l', time: 't', participants: ['Alice', 'Bob'] });

    await expect(orchestrator.runBeat()).rejects.toThrow('disk full');
    expect(orchestrator.getEvents().find(e => e.eventType === 'WORLD_SAVE_FAILED')).toMatchObject({
      level: 'ERROR',
      payload: { error: 'disk full' }
    });
  });
});

describe('SceneOrchestrator: time and listeners', () => {
  it('forgets untouched first meetings after ten days', () => {
    const { orchestrator, cast } = setup();
    cast.establishFirstMeetings();

    orchestrator.advanceTime(10);
    expect(orchestrator.story.totalDays).toBe(10);
    expect(eventTypes(orchestrator.getEvents()).filter(t => t === 'RELATIONSHIP_FORGOTTEN')).toHaveLength(6);
  });

  it('a throwing listener does not stop other listeners', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { orchestrator } = setup();
    const seen: string[] = [];
    orchestrator.addEventListener(() => { throw new Error('listener broke'); });
    orchestrator.addEventListener(event => { seen.push(event.eventType); });

    orchestrator.completeScene('Water restored');
    expect(seen).toEqual(['SCENE_COMPLETED']);
    expect(consoleError).toHaveBeenCalledWith('Event handler error:', expect.any(Error));
  });
});
