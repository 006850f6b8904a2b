import { describe, expect, it } from 'vitest';

import { InterjectionEvaluator, evaluateInterjection } from '../../src/interjection/evaluator.js';
import { PersonalityGenerator } from '../../src/personality/personality.js';
import { Cast } from '../../src/scene/cast.js';

const calm = {
  observer: 'Charlie',
  speaker: 'Bob',
  statement: 'The harvest looks fine this year.',
  emotionalIntensity: 5,
  hasComplication: false
};

describe('evaluateInterjection: triggers', () => {
  it('stays quiet when nothing fires', () => {
    expect(evaluateInterjection(calm)).toEqual({
      shouldInterject: false,
      triggers: [],
      primaryReason: undefined,
      emotionalIntensity: 5
    });
  });

  it('intensity 9 is an emotional trigger', () => {
    const decision = evaluateInterjection({ ...calm, emotionalIntensity: 9 });
    expect(decision.shouldInterject).toBe(true);
    expect(decision.primaryReason).toBe('emotional_trigger');
  });

  it('defends a trusted speaker against an accusatory tone', () => {
    const decision = evaluateInterjection({ ...calm, tone: 'Accusatory', trustInSpeaker: 7 });
    expect(decision.triggers).toEqual(['relationship_defense']);
  });

  it('needs trust of at least 7 to defend', () => {
    const decision = evaluateInterjection({ ...calm, tone: 'hostile', trustInSpeaker: 6.99 });
    expect(decision.shouldInterject).toBe(false);
  });

  it('stress keywords include the observer name, matched case-insensitively', () => {
    const decision = evaluateInterjection({
      ...calm,
      statement: 'Ask CHARLIE where the grain went.',
      emotionalIntensity: 8
    });
    expect(decision.triggers).toEqual(['emotional_trigger', 'stress_response']);
    expect(decision.primaryReason).toBe('emotional_trigger');
  });

  it('a custom stress check decides the stress response', () => {
    const decision = evaluateInterjection({
      ...calm,
      statement: 'You are a thief.',
      stressCheck: () => true
    });
    expect(decision.triggers).toEqual(['stress_response']);
  });

  it('a held complication plus a denial prompts a correction', () => {
    const decision = evaluateInterjection({
      ...calm,
      statement: "I never touched the stores, I didn't even go near them.",
      hasComplication: true
    });
    expect(decision.triggers).toEqual(['information_correction']);
  });

  it('lists every fired trigger in priority order', () => {
    const decision = evaluateInterjection({
      ...calm,
      statement: 'I never said Charlie was a liar.',
      tone: 'hostile',
      trustInSpeaker: 9,
      emotionalIntensity: 10,
      hasComplication: true
    });
    expect(decision.triggers).toEqual([
      'emotional_trigger',
      'relationship_defense',
      'stress_response',
      'information_correction'
    ]);
  });
});

describe('InterjectionEvaluator: reads the cast', () => {
  function makeCast(): Cast {
    return Cast.create(['Alice', 'Bob', 'Charlie'], new PersonalityGenerator(() => 0));
  }

  it('ignores trust toward a stranger', () => {
    const cast = makeCast();
    const evaluator = new InterjectionEvaluator(cast);
    expect(evaluator.evaluate('Charlie', 'Bob', 'You!', 'hostile').shouldInterject).toBe(false);
  });

  it('uses trust once the relationship is known', () => {
    const cast = makeCast();
    cast.relationships.establishFirstMeeting('Charlie', 'Bob', 8, 5);
    const evaluator = new InterjectionEvaluator(cast);
    expect(evaluator.evaluate('Charlie', 'Bob', 'You!', 'hostile').triggers).toEqual(['relationship_defense']);
  });

  it('reads intensity and complications from the observer', () => {
    const cast = makeCast();
    cast.prepareForBeat({ Alice: 'took the medicine' });
    cast.adjustIntensity('Alice', 4);
    const evaluator = new InterjectionEvaluator(cast);

    const decision = evaluator.evaluate('Alice', 'Bob', 'Nobody here would never lie.');
    expect(decision.emotionalIntensity).toBe(9);
    expect(decision.triggers).toEqual(['emotional_trigger', 'information_correction']);
  });
});
